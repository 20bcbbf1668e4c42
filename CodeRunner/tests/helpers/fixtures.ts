/**
 * Test fixtures: language profiles backed by the running Node binary, so the
 * suite needs no other toolchain on the host.
 */

import { readFileSync } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { LanguageRegistry } from '../../src/languages/registry.js';
import type { ExecutionResult } from '../../src/executor/types.js';

export const NODE = process.execPath;

/**
 * `node` runs the file directly; `checked` runs `node --check` as its compile step.
 */
export function nodeRegistry(): LanguageRegistry {
  return LanguageRegistry.fromTable({
    node: {
      fileExtension: '.cjs',
      aliases: ['js'],
      runCommand: [NODE, '{file}'],
      memoryLimit: false,
    },
    checked: {
      fileExtension: '.cjs',
      compileCommand: [NODE, '--check', '{file}'],
      runCommand: [NODE, '{file}'],
      memoryLimit: false,
    },
  });
}

export function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    stdout: '',
    stderr: '',
    exitCode: 0,
    durationMs: 5,
    truncated: false,
    ...overrides,
  };
}

/**
 * Unique scratch directories, removed by `cleanup()`.
 */
export class TempDirs {
  private readonly dirs: string[] = [];

  async create(prefix: string): Promise<string> {
    const dir = join(tmpdir(), `${prefix}-${randomUUID().slice(0, 8)}`);
    await mkdir(dir, { recursive: true });
    this.dirs.push(dir);
    return dir;
  }

  async cleanup(): Promise<void> {
    for (const dir of this.dirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

/**
 * True while `pid` is a live process. Zombies (exited, waiting to be reaped
 * by whoever adopted them) count as gone. Falls back to signal 0 where there
 * is no /proc.
 */
export function isRunning(pid: number): boolean {
  let stat: string;
  try {
    stat = readFileSync(`/proc/${pid}/stat`, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT' && !procAvailable()) {
      return signalZero(pid);
    }
    return false;
  }
  // Format: "pid (comm) S ..."; comm may itself contain parentheses
  const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
  return state !== 'Z' && state !== 'X';
}

function procAvailable(): boolean {
  try {
    readFileSync('/proc/self/stat', 'utf-8');
    return true;
  } catch {
    return false;
  }
}

function signalZero(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/** Kill a process the test started outside the sandbox's reach. */
export function killQuietly(pid: number): void {
  if (!Number.isInteger(pid) || pid <= 0) return;
  try {
    process.kill(pid, 'SIGKILL');
  } catch {
    // already gone
  }
}
