import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');

/**
 * Loads `.env` into process.env. Values already exported by the operator's
 * shell win over the file, so `WS_PORT=9000 npm start` behaves as expected.
 */
export function loadEnvironment(envPath: string = DEFAULT_ENV_PATH): void {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: false });
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
}

function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}
