import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from the package root when one exists. Variables already set in
 * the process environment win over the file.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the entry file to the package root (1 for src/index.ts)
 * @returns the path that was loaded, or null when there was no file
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | null {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) {
    return null;
  }
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
