/**
 * CodeRunner HTTP service entry point.
 */

import { loadEnvSafely } from '@snippet-sandbox/shared/Utils/env.js';
loadEnvSafely(import.meta.url);

import { getConfig } from './config.js';
import { createRuntime, prepareDirectories } from './runtime.js';
import { createApp, listen } from './server.js';
import { logger } from './utils/logger.js';

const SHUTDOWN_GRACE_MS = 5_000;

async function main(): Promise<void> {
  const config = getConfig();
  await prepareDirectories(config);

  const runtime = createRuntime(config);
  logger.info(`Languages: ${runtime.registry.ids().join(', ')}`);
  logger.info(`Sandbox: ${config.sandboxDir}`);
  if (config.auditLog) logger.info(`Audit log: ${config.logDir}`);
  if (!config.limitsEnabled) logger.warn('Resource limits disabled; snippets run without ulimit');

  const app = createApp({
    dispatcher: runtime.dispatcher,
    limiter: runtime.limiter,
    ollama: runtime.ollama,
    maxBodyBytes: config.maxBodyBytes,
  });

  const { server, port } = await listen(app, config.host, config.port);
  logger.info(`Listening on http://${config.host}:${port}`, {
    maxConcurrent: config.maxConcurrent,
    maxQueue: config.maxQueue,
  });

  const shutdown = (): void => {
    logger.info('Shutting down: refusing new connections, waiting for running executions');
    server.close(() => {
      runtime.dispatcher.flush()
        .catch((error) => logger.error('Audit flush failed', error))
        .finally(() => process.exit(0));
    });
    setTimeout(() => process.exit(0), SHUTDOWN_GRACE_MS).unref();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
