/**
 * Execution error taxonomy.
 *
 * Each class maps to one `ExecutionErrorKind`. The dispatcher converts them to
 * structured outcomes; they never reach callers as exceptions.
 */

import { BaseError } from '@snippet-sandbox/shared/Types/errors.js';
import type { ExecutionErrorKind, ExecutionFailure, ExecutionResult } from './types.js';

export class ExecutionError extends BaseError {
  constructor(
    public readonly kind: ExecutionErrorKind,
    code: string,
    message: string,
    public readonly result?: ExecutionResult,
  ) {
    super(message, code, result);
    this.name = 'ExecutionError';
  }

  toFailure(): ExecutionFailure {
    return this.result
      ? { kind: this.kind, message: this.message, result: this.result }
      : { kind: this.kind, message: this.message };
  }
}

export class UnsupportedLanguageError extends ExecutionError {
  constructor(language: string, supported: readonly string[]) {
    super(
      'UnsupportedLanguage',
      'UNSUPPORTED_LANGUAGE',
      `Language "${language}" is not supported. Supported: ${supported.join(', ')}`,
    );
    this.name = 'UnsupportedLanguageError';
  }
}

export class CompileError extends ExecutionError {
  constructor(result: ExecutionResult) {
    super('CompileError', 'COMPILE_ERROR', `Compilation failed with exit code ${result.exitCode}`, result);
    this.name = 'CompileError';
  }
}

export class RuntimeError extends ExecutionError {
  constructor(result: ExecutionResult) {
    super('RuntimeError', 'RUNTIME_ERROR', `Process exited with code ${result.exitCode}`, result);
    this.name = 'RuntimeError';
  }
}

export class ExecutionTimeoutError extends ExecutionError {
  constructor(timeoutMs: number, phase: 'compile' | 'run', result: ExecutionResult) {
    super('Timeout', 'EXECUTION_TIMEOUT', `Execution exceeded ${timeoutMs}ms during ${phase} phase`, result);
    this.name = 'ExecutionTimeoutError';
  }
}

export class OverloadedError extends ExecutionError {
  constructor(message: string) {
    super('Overloaded', 'OVERLOADED', message);
    this.name = 'OverloadedError';
  }
}

/**
 * Host or environment problem (temp dir creation, missing interpreter binary).
 */
export class InternalError extends ExecutionError {
  constructor(message: string, public readonly origin?: unknown) {
    super('InternalError', 'INTERNAL_ERROR', message);
    this.name = 'InternalError';
  }
}
