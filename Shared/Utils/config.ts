/**
 * Helpers shared by the service config loaders.
 */

import { homedir } from 'node:os';

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandPath(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return homedir() + p.slice(1);
  return p;
}

/**
 * Boolean env var: `true`/`1` and `false`/`0` (case-insensitive).
 * Anything else yields the default.
 */
export function getEnvBoolean(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return defaultValue;
}
