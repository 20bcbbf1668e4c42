/**
 * CodeRunner configuration
 *
 * Zod-validated environment config and the stripped environment handed to
 * sandboxed subprocesses.
 */

import { z } from 'zod';
import { tmpdir } from 'node:os';
import { resolve, join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { expandPath, getEnvBoolean } from '@snippet-sandbox/shared/Utils/config.js';
import { ConfigurationError } from '@snippet-sandbox/shared/Types/errors.js';

const PACKAGE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');

// ── Schema ───────────────────────────────────────────────────────────────────

const configSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  maxBodyBytes: z.coerce.number().int().positive().default(2 * 1024 * 1024),

  sandboxDir: z.string().default(join(tmpdir(), 'snippet-sandbox')),
  logDir: z.string().default('~/.snippet-sandbox/logs'),
  auditLog: z.boolean().default(true),
  languagesFile: z.string().default(join(PACKAGE_ROOT, 'config', 'languages.json')),

  defaultTimeoutMs: z.coerce.number().int().positive().default(10_000),
  maxTimeoutMs: z.coerce.number().int().positive().default(60_000),
  killGraceMs: z.coerce.number().int().nonnegative().default(200),
  maxOutputBytes: z.coerce.number().int().positive().default(1024 * 1024), // 1 MiB per stream

  maxConcurrent: z.coerce.number().int().positive().default(4),
  maxQueue: z.coerce.number().int().nonnegative().default(16),
  queueTimeoutMs: z.coerce.number().int().positive().default(10_000),

  limitsEnabled: z.boolean().default(true),
  limitShell: z.string().min(1).default('/bin/sh'),
  memoryMb: z.coerce.number().int().positive().default(512),
  maxProcesses: z.coerce.number().int().positive().default(256),
  maxFileBytes: z.coerce.number().int().positive().default(52_428_800), // 50MB

  ollamaUrl: z.string().url().default('http://localhost:11434'),
  ollamaModel: z.string().min(1).default('llama3'),
  ollamaTimeoutMs: z.coerce.number().int().positive().default(180_000),
}).refine((c) => c.defaultTimeoutMs <= c.maxTimeoutMs, {
  message: 'defaultTimeoutMs must not exceed maxTimeoutMs',
  path: ['defaultTimeoutMs'],
});

export type RunnerConfig = z.infer<typeof configSchema>;

// ── Loading ──────────────────────────────────────────────────────────────────

/**
 * Build a config from environment variables. Unset variables take the schema default.
 */
export function loadConfig(): RunnerConfig {
  const env = process.env;
  const raw = {
    host: env.SANDBOX_HOST,
    port: env.SANDBOX_PORT,
    maxBodyBytes: env.SANDBOX_MAX_BODY_BYTES,
    sandboxDir: env.SANDBOX_DIR,
    logDir: env.SANDBOX_LOG_DIR,
    auditLog: getEnvBoolean('SANDBOX_AUDIT_LOG'),
    languagesFile: env.SANDBOX_LANGUAGES_FILE,
    defaultTimeoutMs: env.SANDBOX_DEFAULT_TIMEOUT_MS,
    maxTimeoutMs: env.SANDBOX_MAX_TIMEOUT_MS,
    killGraceMs: env.SANDBOX_KILL_GRACE_MS,
    maxOutputBytes: env.SANDBOX_MAX_OUTPUT_BYTES,
    maxConcurrent: env.SANDBOX_MAX_CONCURRENT,
    maxQueue: env.SANDBOX_MAX_QUEUE,
    queueTimeoutMs: env.SANDBOX_QUEUE_TIMEOUT_MS,
    limitsEnabled: getEnvBoolean('SANDBOX_LIMITS_ENABLED'),
    limitShell: env.SANDBOX_LIMIT_SHELL,
    memoryMb: env.SANDBOX_MEMORY_MB,
    maxProcesses: env.SANDBOX_MAX_PROCESSES,
    maxFileBytes: env.SANDBOX_MAX_FILE_BYTES,
    ollamaUrl: env.OLLAMA_URL,
    ollamaModel: env.OLLAMA_MODEL,
    ollamaTimeoutMs: env.OLLAMA_TIMEOUT_MS,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`CodeRunner config error: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }

  const config = result.data;
  config.sandboxDir = resolve(expandPath(config.sandboxDir));
  config.logDir = resolve(expandPath(config.logDir));
  config.languagesFile = resolve(expandPath(config.languagesFile));
  return config;
}

let cached: RunnerConfig | null = null;

export function getConfig(): RunnerConfig {
  if (!cached) cached = loadConfig();
  return cached;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'LANG', 'LC_ALL', 'TERM', 'TZ'];

/**
 * Minimal environment for snippet subprocesses. Only allowlisted vars pass
 * through; HOME and TMPDIR point at the execution's own directory.
 */
export function getStrippedEnv(workDir: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  env.HOME = workDir;
  env.TMPDIR = workDir;
  env.PYTHONIOENCODING = 'utf-8';
  env.PYTHONDONTWRITEBYTECODE = '1';
  return env;
}
