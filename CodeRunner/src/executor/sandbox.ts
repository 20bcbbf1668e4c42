/**
 * Sandbox runner: one snippet, one scratch directory, one (or two) subprocesses.
 *
 * - Source goes into a fresh directory from mkdtemp, removed on every exit path
 * - Optional compile phase; a failed compile never reaches the run phase
 * - One deadline covers compile and run
 * - Stripped environment, ulimit prelude, bounded output (see process.ts)
 *
 * Isolation is best-effort: processes run as the service user. Stronger
 * containment belongs to the host (containers, seccomp, a dedicated uid).
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '@snippet-sandbox/shared/Utils/logger.js';
import { logger as rootLogger } from '../utils/logger.js';
import { getStrippedEnv } from '../config.js';
import { renderCommand, resolveEntryName } from '../languages/registry.js';
import type { LanguageProfile } from '../languages/types.js';
import {
  CompileError,
  ExecutionTimeoutError,
  InternalError,
} from './errors.js';
import type { ResourceLimits } from './limits.js';
import { runProcess } from './process.js';
import type { ProcessResult } from './process.js';
import type { ExecutionRequest, ExecutionResult } from './types.js';

export interface SandboxOptions {
  /** Parent of the per-execution scratch directories. */
  sandboxDir: string;
  killGraceMs: number;
  maxOutputBytes: number;
  /** Null disables the ulimit prelude. The CPU limit is derived per phase from the time left. */
  limits: SandboxLimits | null;
  logger?: Logger;
}

export type SandboxLimits = Omit<ResourceLimits, 'cpuSeconds'>;

type Phase = 'compile' | 'run';

/**
 * CPU seconds for a phase with `timeoutMs` left: one second past the wall
 * clock, so a single-threaded loop always meets the deadline first.
 */
export function cpuSecondsFor(timeoutMs: number): number {
  return Math.ceil(timeoutMs / 1000) + 1;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class SandboxRunner {
  private readonly logger: Logger;

  constructor(private readonly options: SandboxOptions) {
    this.logger = options.logger ?? rootLogger.child('sandbox');
  }

  async execute(profile: LanguageProfile, request: ExecutionRequest): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const deadline = startedAt + request.timeoutMs;

    return this.withWorkDir(async (dir) => {
      const name = resolveEntryName(profile, request.source);
      const file = join(dir, `${name}${profile.fileExtension}`);
      try {
        await writeFile(file, request.source, 'utf-8');
      } catch (err) {
        throw new InternalError(`Failed to write snippet to ${file}`, err);
      }

      const ctx = { file, dir, name };

      if (profile.compileCommand) {
        const compiled = await this.spawnPhase('compile', profile, renderCommand(profile.compileCommand, ctx), dir, undefined, deadline);
        if (compiled.timedOut) {
          throw new ExecutionTimeoutError(request.timeoutMs, 'compile', toResult(compiled, startedAt));
        }
        if (compiled.exitCode !== 0) {
          throw new CompileError(toResult(compiled, startedAt));
        }
      }

      const ran = await this.spawnPhase('run', profile, renderCommand(profile.runCommand, ctx), dir, request.stdin, deadline);
      if (ran.timedOut) {
        throw new ExecutionTimeoutError(request.timeoutMs, 'run', toResult(ran, startedAt));
      }
      return toResult(ran, startedAt);
    });
  }

  /**
   * Scoped scratch directory: created before `fn`, removed after it whatever happens.
   */
  private async withWorkDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    let dir: string;
    try {
      await mkdir(this.options.sandboxDir, { recursive: true });
      dir = await mkdtemp(join(this.options.sandboxDir, 'run-'));
    } catch (err) {
      throw new InternalError(`Failed to create scratch directory in ${this.options.sandboxDir}`, err);
    }

    try {
      return await fn(dir);
    } finally {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch (err) {
        this.logger.warn(`Failed to remove scratch directory ${dir}`, err);
      }
    }
  }

  private async spawnPhase(
    phase: Phase,
    profile: LanguageProfile,
    command: string[],
    dir: string,
    stdin: string | undefined,
    deadline: number,
  ): Promise<ProcessResult> {
    const timeoutMs = Math.max(1, deadline - Date.now());
    const limits: ResourceLimits | null = this.options.limits
      ? {
          ...this.options.limits,
          cpuSeconds: cpuSecondsFor(timeoutMs),
          memoryMb: profile.memoryLimit ? this.options.limits.memoryMb : undefined,
        }
      : null;

    this.logger.debug(`${profile.id} ${phase}: ${command.join(' ')}`);

    let result: ProcessResult;
    try {
      result = await runProcess({
        command,
        cwd: dir,
        env: getStrippedEnv(dir),
        stdin,
        timeoutMs,
        killGraceMs: this.options.killGraceMs,
        maxOutputBytes: this.options.maxOutputBytes,
        limits,
      });
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new InternalError(`${profile.id} ${phase} command not found: ${command[0]}`, err);
      }
      throw new InternalError(`Failed to spawn ${profile.id} ${phase} command`, err);
    }

    if (result.missingCommand !== undefined) {
      throw new InternalError(`${profile.id} ${phase} command not found: ${result.missingCommand}`);
    }
    return result;
  }
}

function toResult(proc: ProcessResult, startedAt: number): ExecutionResult {
  return Object.freeze({
    stdout: proc.stdout,
    stderr: proc.stderr,
    exitCode: proc.exitCode,
    durationMs: Date.now() - startedAt,
    truncated: proc.truncated,
  });
}
