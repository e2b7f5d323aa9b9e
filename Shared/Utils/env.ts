import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from a package root when the file exists.
 * Values already present in the environment win over the file.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the calling file to the package root (1 for src/index.ts)
 * @returns the loaded path, or null when there was no file
 */
export function loadEnvFile(importMetaUrl: string, levelsUp = 1): string | null {
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
