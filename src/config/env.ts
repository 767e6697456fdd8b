import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

let loaded = false;

/**
 * Load environment variables from a .env file in `cwd`.
 *
 * Call before building configuration. Existing process variables win over
 * the file. Loads at most once per process.
 */
export function loadEnv(cwd: string = process.cwd()): boolean {
  if (loaded) return false;

  const envPath = resolve(cwd, '.env');
  if (!existsSync(envPath)) return false;

  const result = dotenvConfig({ path: envPath, debug: false });
  if (result.error) {
    throw result.error;
  }
  loaded = true;
  return true;
}
