/**
 * Tests for the low-level subprocess runner. Commands are `node -e` one-liners.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runProcess } from '../../src/executor/process.js';
import type { ProcessOptions } from '../../src/executor/process.js';
import { NODE, TempDirs, isRunning, killQuietly } from '../helpers/fixtures.js';

const temp = new TempDirs();
let cwd: string;

beforeEach(async () => {
  cwd = await temp.create('code-runner-process');
});

afterEach(async () => {
  await temp.cleanup();
});

function node(script: string, overrides: Partial<ProcessOptions> = {}): ProcessOptions {
  return {
    command: [NODE, '-e', script],
    cwd,
    env: { PATH: process.env.PATH ?? '/usr/bin:/bin' },
    timeoutMs: 10_000,
    killGraceMs: 200,
    maxOutputBytes: 64 * 1024,
    limits: null,
    ...overrides,
  };
}

describe('runProcess', () => {
  it('should capture stdout, stderr and the exit code', async () => {
    const result = await runProcess(node('console.log("out"); console.error("err"); process.exitCode = 4'));

    expect(result.stdout).toBe('out\n');
    expect(result.stderr).toBe('err\n');
    expect(result.exitCode).toBe(4);
    expect(result.timedOut).toBe(false);
    expect(result.truncated).toBe(false);
    expect(result.refusedLimits).toEqual([]);
  });

  it('should feed stdin and close it', async () => {
    const script = 'let d = ""; process.stdin.on("data", (c) => d += c); process.stdin.on("end", () => process.stdout.write(d.toUpperCase()))';
    const result = await runProcess(node(script, { stdin: 'hello\nworld' }));

    expect(result.stdout).toBe('HELLO\nWORLD');
  });

  it('should see end of input immediately when no stdin is given', async () => {
    const script = 'let n = 0; process.stdin.on("data", (c) => n += c.length); process.stdin.on("end", () => console.log(n))';
    const result = await runProcess(node(script, { timeoutMs: 5_000 }));

    expect(result.stdout).toBe('0\n');
    expect(result.timedOut).toBe(false);
  });

  it('should bound captured output and flag truncation', async () => {
    const result = await runProcess(node('process.stdout.write("x".repeat(100))', { maxOutputBytes: 16 }));

    expect(result.stdout).toBe('x'.repeat(16));
    expect(result.truncated).toBe(true);
    expect(result.exitCode).toBe(0);
  });

  it('should report death by signal as 128 + signal number', async () => {
    const result = await runProcess(node('process.kill(process.pid, "SIGKILL")'));

    expect(result.signal).toBe('SIGKILL');
    expect(result.exitCode).toBe(137);
  });

  it('should terminate on timeout and leave no process behind', async () => {
    const started = Date.now();
    const result = await runProcess(node('console.log(process.pid); for (;;) {}', { timeoutMs: 300 }));
    const elapsed = Date.now() - started;

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
    expect(elapsed).toBeLessThan(2_000);

    const pid = Number(result.stdout.trim());
    expect(pid).toBeGreaterThan(0);
    expect(isRunning(pid)).toBe(false);
  });

  it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
    const script = 'process.on("SIGTERM", () => {}); console.log("ready"); for (;;) {}';
    const result = await runProcess(node(script, { timeoutMs: 1_000, killGraceMs: 200 }));

    expect(result.stdout).toBe('ready\n');
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGKILL');
    expect(result.exitCode).toBe(-1);
    expect(result.durationMs).toBeGreaterThanOrEqual(1_000);
  });

  it('should kill background children once the main process exits', async () => {
    const script = [
      'const { spawn } = require("node:child_process");',
      'const child = spawn(process.execPath, ["-e", "setTimeout(() => {}, 30000)"], { stdio: "inherit" });',
      'console.log(child.pid);',
    ].join('\n');
    const started = Date.now();
    const result = await runProcess(node(`${script}\nprocess.exit(0)`));

    expect(result.exitCode).toBe(0);
    expect(Date.now() - started).toBeLessThan(10_000);

    const sleeper = Number(result.stdout.trim());
    expect(sleeper).toBeGreaterThan(0);
    expect(isRunning(sleeper)).toBe(false);
  });

  it('should kill children of a timed-out program', async () => {
    const script = [
      'const { spawn } = require("node:child_process");',
      'const child = spawn(process.execPath, ["-e", "setTimeout(() => {}, 30000)"], { stdio: "inherit" });',
      'console.log(child.pid);',
      'for (;;) {}',
    ].join('\n');
    const result = await runProcess(node(script, { timeoutMs: 500 }));

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);

    const sleeper = Number(result.stdout.trim());
    expect(sleeper).toBeGreaterThan(0);
    expect(isRunning(sleeper)).toBe(false);
  });

  describe('descendants that leave the process group', () => {
    // The sleeper is detached into its own session and inherits stdout, so the
    // pipe stays open after the main process is gone
    const escapee = [
      'const { spawn } = require("node:child_process");',
      'const child = spawn(process.execPath, ["-e", "setTimeout(() => {}, 20000)"], { stdio: "inherit", detached: true });',
      'child.unref();',
      'console.log(child.pid);',
    ].join('\n');

    it('should settle shortly after the main process exits', async () => {
      const started = Date.now();
      const result = await runProcess(node(escapee, { timeoutMs: 5_000, killGraceMs: 200 }));
      killQuietly(Number(result.stdout.trim()));

      expect(result.timedOut).toBe(false);
      expect(result.exitCode).toBe(0);
      expect(Number(result.stdout.trim())).toBeGreaterThan(0);
      expect(Date.now() - started).toBeLessThan(2_000);
    });

    it('should warn that a descendant kept the pipes open', async () => {
      vi.stubEnv('LOG_LEVEL', 'warn');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      try {
        const result = await runProcess(node(escapee, { timeoutMs: 5_000, killGraceMs: 200 }));
        killQuietly(Number(result.stdout.trim()));

        const lines = spy.mock.calls.map((call) => String(call[0]));
        expect(lines.some((line) =>
          line.includes('[WARN] [code-runner:process]') && line.includes('a descendant left the process group'),
        )).toBe(true);
      } finally {
        spy.mockRestore();
        vi.unstubAllEnvs();
      }
    });

    it('should still honour the deadline when the main process hangs', async () => {
      const started = Date.now();
      const result = await runProcess(node(`${escapee}\nfor (;;) {}`, { timeoutMs: 500, killGraceMs: 200 }));
      killQuietly(Number(result.stdout.trim()));

      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBe(-1);
      expect(Date.now() - started).toBeLessThan(2_000);
    });

    it('should time out when the deadline comes before the drain window ends', async () => {
      const started = Date.now();
      const result = await runProcess(node(escapee, { timeoutMs: 1_000, killGraceMs: 10_000 }));
      killQuietly(Number(result.stdout.trim()));

      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBe(-1);
      expect(Date.now() - started).toBeLessThan(3_000);
    });
  });

  it('should reject when the binary does not exist', async () => {
    await expect(runProcess(node('', { command: ['definitely-not-a-real-binary'] })))
      .rejects.toMatchObject({ code: 'ENOENT' });
  });

  describe('with resource limits', () => {
    it('should run the command through the limit prelude', async () => {
      const result = await runProcess(node('console.log("limited")', {
        limits: { shell: '/bin/sh', cpuSeconds: 10, maxFileBytes: 10 * 1024 * 1024 },
      }));

      expect(result.stdout).toBe('limited\n');
      expect(result.exitCode).toBe(0);
      expect(result.missingCommand).toBeUndefined();
    });

    it('should report a missing binary through the side channel', async () => {
      const result = await runProcess(node('', {
        command: ['definitely-not-a-real-binary', '--version'],
        limits: { shell: '/bin/sh', cpuSeconds: 10 },
      }));

      expect(result.exitCode).toBe(127);
      expect(result.missingCommand).toBe('definitely-not-a-real-binary');
    });

    it('should apply the CPU limit to the child', async () => {
      const result = await runProcess(node('console.log(require("node:child_process").execSync("ulimit -t").toString().trim())', {
        limits: { shell: '/bin/sh', cpuSeconds: 7 },
      }));

      expect(result.stdout).toBe('7\n');
    });
  });
});
