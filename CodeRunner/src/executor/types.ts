/**
 * Core types for snippet execution.
 */

export interface ExecutionRequest {
  /** Language id or alias, resolved against the registry. */
  readonly language: string;
  readonly source: string;
  readonly stdin?: string;
  readonly timeoutMs: number;
}

export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  /** Process exit code; `-1` after a timeout, `128 + signo` when killed by a signal. */
  readonly exitCode: number;
  readonly durationMs: number;
  /** True when stdout or stderr hit the capture bound. */
  readonly truncated: boolean;
}

export type ExecutionErrorKind =
  | 'UnsupportedLanguage'
  | 'CompileError'
  | 'RuntimeError'
  | 'Timeout'
  | 'Overloaded'
  | 'InternalError';

export interface ExecutionFailure {
  readonly kind: ExecutionErrorKind;
  readonly message: string;
  /** Output captured before the failure, when a process ran. */
  readonly result?: ExecutionResult;
}

export type ExecutionOutcome =
  | { readonly ok: true; readonly result: ExecutionResult }
  | { readonly ok: false; readonly error: ExecutionFailure };
