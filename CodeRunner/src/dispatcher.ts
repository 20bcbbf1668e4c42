/**
 * Execution dispatcher: resolve the language, take a slot, run, classify.
 *
 * Every failure comes back as a structured outcome. Nothing is retried: a
 * snippet may have side effects, so retrying is the caller's call.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '@snippet-sandbox/shared/Utils/logger.js';
import { logger as rootLogger } from './utils/logger.js';
import type { ConcurrencyLimiter } from './concurrency/limiter.js';
import {
  ExecutionError,
  InternalError,
  RuntimeError,
  UnsupportedLanguageError,
} from './executor/errors.js';
import type {
  ExecutionOutcome,
  ExecutionRequest,
  ExecutionResult,
} from './executor/types.js';
import type { LanguageRegistry } from './languages/registry.js';
import type { LanguageProfile } from './languages/types.js';
import type { ExecutionAuditLog } from './logging/execution-log.js';

/** Anything that can run one request against one profile (the sandbox runner in production). */
export interface SnippetRunner {
  execute(profile: LanguageProfile, request: ExecutionRequest): Promise<ExecutionResult>;
}

export interface SubmitInput {
  language: string;
  source: string;
  stdin?: string;
  /** Defaults to `defaultTimeoutMs`, clamped to `maxTimeoutMs`. */
  timeoutMs?: number;
}

export interface DispatcherOptions {
  registry: LanguageRegistry;
  runner: SnippetRunner;
  limiter: ConcurrencyLimiter;
  defaultTimeoutMs: number;
  maxTimeoutMs: number;
  /** Upper bound on the wait for a slot; the request's own timeout may shorten it. */
  queueTimeoutMs: number;
  auditLog?: ExecutionAuditLog | null;
  logger?: Logger;
}

function generateExecutionId(): string {
  return `exec_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export class ExecutionDispatcher {
  private readonly logger: Logger;
  private readonly pendingAudit = new Set<Promise<void>>();

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? rootLogger.child('dispatch');
  }

  async submit(input: SubmitInput): Promise<ExecutionOutcome> {
    const executionId = generateExecutionId();
    const request: ExecutionRequest = Object.freeze({
      language: input.language,
      source: input.source,
      stdin: input.stdin,
      timeoutMs: this.resolveTimeout(input.timeoutMs),
    });

    const outcome = await this.dispatch(request);

    if (outcome.ok) {
      this.logger.info(`${executionId} ${request.language} ok`, {
        durationMs: outcome.result.durationMs,
        truncated: outcome.result.truncated,
      });
    } else if (outcome.error.kind === 'InternalError') {
      this.logger.error(`${executionId} ${request.language} failed: ${outcome.error.message}`);
    } else {
      this.logger.info(`${executionId} ${request.language} ${outcome.error.kind}`, {
        exitCode: outcome.error.result?.exitCode,
        durationMs: outcome.error.result?.durationMs,
      });
    }

    this.audit(executionId, request, outcome);
    return outcome;
  }

  /**
   * Positional form of `submit`.
   */
  execute(language: string, source: string, stdin?: string, timeoutMs?: number): Promise<ExecutionOutcome> {
    return this.submit({ language, source, stdin, timeoutMs });
  }

  languages(): string[] {
    return this.options.registry.ids();
  }

  /** Wait for audit writes still in flight. */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingAudit]);
  }

  private async dispatch(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const { registry, runner, limiter } = this.options;

    const profile = registry.resolve(request.language);
    if (!profile) {
      return { ok: false, error: new UnsupportedLanguageError(request.language, registry.ids()).toFailure() };
    }

    try {
      const waitMs = Math.min(this.options.queueTimeoutMs, request.timeoutMs);
      const result = await limiter.run(() => runner.execute(profile, request), waitMs);
      if (result.exitCode !== 0) {
        return { ok: false, error: new RuntimeError(result).toFailure() };
      }
      return { ok: true, result };
    } catch (err) {
      if (err instanceof ExecutionError) {
        if (err instanceof InternalError && err.origin !== undefined) {
          this.logger.error(err.message, err.origin);
        }
        return { ok: false, error: err.toFailure() };
      }
      this.logger.error('Unexpected execution failure', err);
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, error: new InternalError(message, err).toFailure() };
    }
  }

  private resolveTimeout(requested: number | undefined): number {
    if (requested === undefined || !Number.isFinite(requested) || requested <= 0) {
      return this.options.defaultTimeoutMs;
    }
    return Math.min(Math.max(1, Math.floor(requested)), this.options.maxTimeoutMs);
  }

  private audit(executionId: string, request: ExecutionRequest, outcome: ExecutionOutcome): void {
    const { auditLog } = this.options;
    if (!auditLog) return;

    const write = auditLog
      .record(executionId, request, outcome)
      .catch((err) => this.logger.error(`Audit log write failed for ${executionId}`, err))
      .finally(() => this.pendingAudit.delete(write));
    this.pendingAudit.add(write);
  }
}
