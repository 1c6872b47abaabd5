import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from a .env file in the given directory.
 *
 * Call this before the configuration is read (or call reloadConfig() after).
 * Variables already present in the environment win over the file.
 */
export function loadEnv(dir: string): boolean {
  // Guard: only load once
  if (process.env.__REPOS_ENV_LOADED) return false;
  process.env.__REPOS_ENV_LOADED = '1';

  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) {
    return false;
  }

  dotenvConfig({ path: envPath });
  return true;
}
