/**
 * Per-execution audit trail, one JSONL file per day:
 * `<logDir>/executions-YYYY-MM-DD.jsonl`.
 */

import {
  JsonlLogger,
  createTimestamp,
  dailyLogPath,
} from '@snippet-sandbox/shared/Logging/jsonl.js';
import type { AuditReadOptions, BaseAuditEntry } from '@snippet-sandbox/shared/Logging/jsonl.js';
import type { ExecutionErrorKind, ExecutionOutcome, ExecutionRequest } from '../executor/types.js';

export interface ExecutionLogEntry extends BaseAuditEntry {
  type: 'execution';
  execution_id: string;
  language: string;
  outcome: 'ok' | ExecutionErrorKind;
  message: string | null;
  source: string;
  stdin_bytes: number;
  timeout_ms: number;
  stdout: string;
  stderr: string;
  exit_code: number | null;
  duration_ms: number | null;
  truncated: boolean;
}

export class ExecutionAuditLog {
  private readonly log: JsonlLogger<ExecutionLogEntry>;

  constructor(logDir: string, now?: () => Date) {
    this.log = new JsonlLogger<ExecutionLogEntry>(dailyLogPath(logDir, 'executions', now));
  }

  async record(executionId: string, request: ExecutionRequest, outcome: ExecutionOutcome): Promise<void> {
    const result = outcome.ok ? outcome.result : outcome.error.result;
    await this.log.write({
      timestamp: createTimestamp(),
      type: 'execution',
      execution_id: executionId,
      language: request.language,
      outcome: outcome.ok ? 'ok' : outcome.error.kind,
      message: outcome.ok ? null : outcome.error.message,
      source: request.source,
      stdin_bytes: Buffer.byteLength(request.stdin ?? ''),
      timeout_ms: request.timeoutMs,
      stdout: result?.stdout ?? '',
      stderr: result?.stderr ?? '',
      exit_code: result?.exitCode ?? null,
      duration_ms: result?.durationMs ?? null,
      truncated: result?.truncated ?? false,
    });
  }

  read(options?: AuditReadOptions<ExecutionLogEntry>): Promise<ExecutionLogEntry[]> {
    return this.log.read(options);
  }

  getPath(): string {
    return this.log.getPath();
  }
}
