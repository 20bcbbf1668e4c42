/**
 * HTTP surface (express).
 *
 *   POST /execute    run a snippet
 *   POST /complete   relay a prompt to Ollama
 *   GET  /languages  registered language ids
 *   GET  /health     liveness plus limiter occupancy
 *   GET  /ping
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import { logger as rootLogger } from './utils/logger.js';
import { NetworkError, TimeoutError, ValidationError } from '@snippet-sandbox/shared/Types/errors.js';
import type { ConcurrencyLimiter } from './concurrency/limiter.js';
import type { ExecutionDispatcher } from './dispatcher.js';
import type { ExecutionErrorKind, ExecutionOutcome } from './executor/types.js';
import type { OllamaClient } from './llm/ollama-client.js';

const logger = rootLogger.child('http');

export const SERVICE_NAME = 'code-runner';
export const SERVICE_VERSION = '0.1.0';

// ── Request schemas ─────────────────────────────────────────────────────────

export const executeBodySchema = z.object({
  language: z.string().min(1).describe('Language id or alias, e.g. "python"'),
  source: z.string().min(1).describe('Snippet source code'),
  stdin: z.string().nullish().describe('Text piped to the program'),
  timeoutMs: z.number().int().positive().nullish().describe('Wall-clock limit in milliseconds'),
});

export const completeBodySchema = z.object({
  prompt: z.string().min(1),
  model: z.string().min(1).nullish(),
  maxTokens: z.number().int().positive().nullish(),
  temperature: z.number().min(0).max(2).nullish(),
});

/** Service-level failures get an error status; execution-level ones are ordinary results. */
const STATUS_BY_KIND: Record<ExecutionErrorKind, number> = {
  UnsupportedLanguage: 400,
  CompileError: 200,
  RuntimeError: 200,
  Timeout: 200,
  Overloaded: 429,
  InternalError: 500,
};

export interface AppDependencies {
  dispatcher: ExecutionDispatcher;
  limiter: ConcurrencyLimiter;
  ollama: OllamaClient;
  maxBodyBytes: number;
  startTime?: number;
}

function sendOutcome(res: Response, outcome: ExecutionOutcome): void {
  if (outcome.ok) {
    res.status(200).json(outcome.result);
    return;
  }
  const { kind, message, result } = outcome.error;
  if (kind === 'Overloaded') {
    res.setHeader('Retry-After', '1');
  }
  res.status(STATUS_BY_KIND[kind]).json({ kind, message, ...result });
}

function sendValidationError(res: Response, error: z.ZodError): void {
  const invalid = new ValidationError(
    error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
    { issues: error.issues },
  );
  logger.debug(`Rejected request body: ${invalid.message}`);
  res.status(400).json({ kind: invalid.name, message: invalid.message });
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createApp(deps: AppDependencies): Express {
  const { dispatcher, limiter, ollama } = deps;
  const startTime = deps.startTime ?? Date.now();
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: deps.maxBodyBytes }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      limiter: limiter.stats(),
    });
  });

  app.get('/ping', (_req: Request, res: Response) => {
    res.json({ message: 'pong' });
  });

  app.get('/languages', (_req: Request, res: Response) => {
    res.json({ languages: dispatcher.languages() });
  });

  app.post('/execute', async (req: Request, res: Response) => {
    const parsed = executeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const outcome = await dispatcher.submit({
        language: parsed.data.language,
        source: parsed.data.source,
        stdin: parsed.data.stdin ?? undefined,
        timeoutMs: parsed.data.timeoutMs ?? undefined,
      });
      sendOutcome(res, outcome);
    } catch (error) {
      logger.error('Dispatcher threw', error);
      res.status(500).json({ kind: 'InternalError', message: 'Unexpected dispatcher failure' });
    }
  });

  app.post('/complete', async (req: Request, res: Response) => {
    const parsed = completeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const completion = await ollama.generate(parsed.data.prompt, {
        model: parsed.data.model ?? undefined,
        maxTokens: parsed.data.maxTokens ?? undefined,
        temperature: parsed.data.temperature ?? undefined,
      });
      res.json(completion);
    } catch (error) {
      if (error instanceof TimeoutError) {
        res.status(504).json({ kind: 'Timeout', message: error.message });
        return;
      }
      if (error instanceof NetworkError) {
        logger.warn('Ollama relay failed', error);
        res.status(502).json({ kind: 'UpstreamError', message: error.message });
        return;
      }
      logger.error('Completion relay failed', error);
      res.status(500).json({ kind: 'InternalError', message: 'Unexpected completion failure' });
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ kind: 'NotFound', message: 'Not found' });
  });

  // Body parser failures (malformed JSON, oversized body) land here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status === 413) {
      res.status(413).json({ kind: 'ValidationError', message: 'Request body too large' });
      return;
    }
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ kind: 'ValidationError', message: 'Malformed JSON body' });
      return;
    }
    logger.error('Unhandled request error', err);
    res.status(500).json({ kind: 'InternalError', message: 'Internal server error' });
  });

  return app;
}

/**
 * Listen and resolve once the socket is bound. Port 0 picks a free port.
 */
export function listen(app: Express, host: string, port: number): Promise<{ server: Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error(`Unexpected listen address: ${String(address)}`));
        return;
      }
      resolve({ server, port: address.port });
    });
  });
}
