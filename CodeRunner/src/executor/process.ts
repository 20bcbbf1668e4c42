/**
 * Single subprocess run with bounded capture and a hard deadline.
 *
 * The child is spawned as the leader of its own process group so that a
 * timeout (SIGTERM, grace period, SIGKILL) reaches everything it forked.
 * When the leader exits, stragglers left in the group are killed so they
 * cannot hold the output pipes open. A descendant that moved to its own
 * session is out of reach; its pipes are abandoned after a short drain window
 * or at the deadline, whichever comes first.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { Readable } from 'node:stream';
import { logger as rootLogger } from '../utils/logger.js';
import { BoundedOutput } from '../utils/output-buffer.js';
import { parseSideChannel, wrapWithLimits } from './limits.js';
import type { ResourceLimits } from './limits.js';

const logger = rootLogger.child('process');

export interface ProcessOptions {
  command: readonly string[];
  cwd: string;
  env: Record<string, string>;
  stdin?: string;
  timeoutMs: number;
  killGraceMs: number;
  maxOutputBytes: number;
  /** Null spawns the command directly, without the ulimit prelude. */
  limits: ResourceLimits | null;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** `-1` after a timeout, `128 + signo` when killed by a signal. */
  exitCode: number;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
  /** Limits the host refused to apply. */
  refusedLimits: string[];
  /** Set when the prelude could not find the target binary. */
  missingCommand?: string;
}

/** Shortest wait for the output pipes to close once the main process has exited. */
const MIN_DRAIN_MS = 100;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Limits already reported, so each refusal is logged once per process lifetime. */
const reportedLimits = new Set<string>();

function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return -1;
}

export function runProcess(options: ProcessOptions): Promise<ProcessResult> {
  const [file, args]: [string, string[]] = options.limits
    ? wrapWithLimits(options.command, options.limits)
    : [options.command[0], options.command.slice(1)];

  const startTime = Date.now();
  const drainMs = Math.max(options.killGraceMs, MIN_DRAIN_MS);

  return new Promise<ProcessResult>((resolve, reject) => {
    const stdout = new BoundedOutput(options.maxOutputBytes);
    const stderr = new BoundedOutput(options.maxOutputBytes);
    const sideChannel: Buffer[] = [];
    let timedOut = false;
    let settled = false;
    let exited: { code: number | null; signal: NodeJS.Signals | null } | null = null;
    let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let drainTimer: ReturnType<typeof setTimeout> | null = null;

    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['pipe', 'pipe', 'pipe', options.limits ? 'pipe' : 'ignore'],
      detached: true,
    });

    function killGroup(signal: NodeJS.Signals): void {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, signal);
      } catch (err) {
        // ESRCH: the whole group is already gone
        logger.debug(`Process group ${child.pid} not signalled with ${signal}`, err);
      }
    }

    function clearTimers(): void {
      if (timeoutTimer) clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      if (drainTimer) clearTimeout(drainTimer);
      timeoutTimer = null;
      killTimer = null;
      drainTimer = null;
    }

    /**
     * Settle with whatever was captured. Streams still open at this point are
     * held by a descendant that escaped the process group; they are dropped.
     */
    function finish(code: number | null, signal: NodeJS.Signals | null): void {
      if (settled) return;
      settled = true;
      clearTimers();
      child.stdout?.destroy();
      child.stderr?.destroy();
      const channel = child.stdio[3];
      if (channel instanceof Readable) channel.destroy();

      const report = parseSideChannel(Buffer.concat(sideChannel).toString('utf-8'));
      for (const name of report.refusedLimits) {
        if (!reportedLimits.has(name)) {
          reportedLimits.add(name);
          logger.warn(`Host refused resource limit "${name}"; continuing without it`);
        }
      }

      resolve({
        stdout: stdout.text(),
        stderr: stderr.text(),
        exitCode: timedOut ? -1 : toExitCode(code, signal),
        signal,
        timedOut,
        truncated: stdout.truncated || stderr.truncated,
        durationMs: Date.now() - startTime,
        refusedLimits: report.refusedLimits,
        missingCommand: report.missingCommand,
      });
    }

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    const channel = child.stdio[3];
    if (channel instanceof Readable) {
      channel.on('data', (chunk: Buffer) => sideChannel.push(chunk));
    }

    // The child may exit without reading its input
    child.stdin?.on('error', (err) => {
      logger.debug('stdin closed early', err);
    });
    child.stdin?.end(options.stdin ?? '');

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimers();
      reject(err);
    });

    child.on('exit', (code, signal) => {
      exited = { code, signal };
      killGroup('SIGKILL');
      if (killTimer) {
        clearTimeout(killTimer);
        killTimer = null;
      }
      // Pipes normally close right after exit; give buffered output a moment.
      // A run that already hit its deadline has used up its grace period.
      const waitMs = timedOut ? MIN_DRAIN_MS : drainMs;
      drainTimer = setTimeout(() => {
        logger.warn(`Output pipes of pid ${child.pid} still open ${waitMs}ms after exit; a descendant left the process group`);
        finish(code, signal);
      }, waitMs);
    });

    child.on('close', (code, signal) => {
      finish(code, signal);
    });

    // Stays armed until the result settles, whether or not the main process has exited
    timeoutTimer = setTimeout(() => {
      timeoutTimer = null;
      timedOut = true;
      if (exited) {
        finish(exited.code, exited.signal);
        return;
      }
      killGroup('SIGTERM');
      killTimer = setTimeout(() => killGroup('SIGKILL'), options.killGraceMs);
    }, options.timeoutMs);
  });
}
