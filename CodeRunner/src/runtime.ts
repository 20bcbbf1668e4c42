/**
 * Wires the configured components together.
 */

import { mkdir } from 'node:fs/promises';
import { ConcurrencyLimiter } from './concurrency/limiter.js';
import type { RunnerConfig } from './config.js';
import { ExecutionDispatcher } from './dispatcher.js';
import type { SnippetRunner } from './dispatcher.js';
import { SandboxRunner } from './executor/sandbox.js';
import { LanguageRegistry } from './languages/registry.js';
import { OllamaClient } from './llm/ollama-client.js';
import { ExecutionAuditLog } from './logging/execution-log.js';

export interface Runtime {
  registry: LanguageRegistry;
  limiter: ConcurrencyLimiter;
  dispatcher: ExecutionDispatcher;
  ollama: OllamaClient;
}

export interface RuntimeOverrides {
  registry?: LanguageRegistry;
  runner?: SnippetRunner;
  fetch?: typeof fetch;
}

export function createRuntime(config: RunnerConfig, overrides: RuntimeOverrides = {}): Runtime {
  const registry = overrides.registry ?? LanguageRegistry.fromFile(config.languagesFile);

  const limiter = new ConcurrencyLimiter({
    maxConcurrent: config.maxConcurrent,
    maxQueue: config.maxQueue,
    queueTimeoutMs: config.queueTimeoutMs,
  });

  const runner = overrides.runner ?? new SandboxRunner({
    sandboxDir: config.sandboxDir,
    killGraceMs: config.killGraceMs,
    maxOutputBytes: config.maxOutputBytes,
    limits: config.limitsEnabled
      ? {
          shell: config.limitShell,
          memoryMb: config.memoryMb,
          maxProcesses: config.maxProcesses,
          maxFileBytes: config.maxFileBytes,
        }
      : null,
  });

  const dispatcher = new ExecutionDispatcher({
    registry,
    runner,
    limiter,
    defaultTimeoutMs: config.defaultTimeoutMs,
    maxTimeoutMs: config.maxTimeoutMs,
    queueTimeoutMs: config.queueTimeoutMs,
    auditLog: config.auditLog ? new ExecutionAuditLog(config.logDir) : null,
  });

  const ollama = new OllamaClient({
    baseUrl: config.ollamaUrl,
    defaultModel: config.ollamaModel,
    timeoutMs: config.ollamaTimeoutMs,
    fetch: overrides.fetch,
  });

  return { registry, limiter, dispatcher, ollama };
}

/**
 * Create the sandbox and log directories up front so permission problems show at startup.
 */
export async function prepareDirectories(config: RunnerConfig): Promise<void> {
  await mkdir(config.sandboxDir, { recursive: true });
  if (config.auditLog) {
    await mkdir(config.logDir, { recursive: true });
  }
}
