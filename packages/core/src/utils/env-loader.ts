import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

import { ConfigurationError } from '../errors';

import { writeStderr } from './console';

const DEFAULT_ENV_FILENAME = '.env';
const ERROR_ENV_FILE_NOT_FOUND = 'Environment file not found';
const WARN_DEFAULT_ENV_MISSING = 'No .env file found at';
const ERROR_ENV_FILE_LOAD_FAILED = 'Failed to load environment file';

/** Environment variable naming the processing engine executable. */
export const ENGINE_ENV_VAR = 'LONGREAD_QC_ENGINE';

/** Engine executable used when neither the CLI nor the environment names one. */
export const DEFAULT_ENGINE_COMMAND = 'fastp';

/**
 * Loads environment variables from a .env file.
 *
 * A missing default `.env` is not an error (a note is printed in verbose mode);
 * a missing file that was named explicitly is.
 *
 * @param envFilePath - Optional path to a custom .env file, relative to the invocation directory.
 * @param verbose - Whether to report a missing default file.
 * @throws {ConfigurationError} If an explicit env file is missing or dotenv fails to parse it.
 */
export function loadEnvironmentFile(envFilePath?: string, verbose?: boolean): void {
  const fileName = envFilePath || DEFAULT_ENV_FILENAME;
  const baseDir = process.env.INIT_CWD || process.cwd();
  const resolvedPath = path.resolve(baseDir, fileName);

  if (!fs.existsSync(resolvedPath)) {
    if (envFilePath) {
      throw new ConfigurationError(`${ERROR_ENV_FILE_NOT_FOUND}: ${resolvedPath}`);
    }
    if (verbose === true) {
      writeStderr(`${WARN_DEFAULT_ENV_MISSING} ${resolvedPath}. Continuing without loading environment variables.\n`);
    }
    return;
  }

  const result = dotenv.config({ path: resolvedPath });
  if (result.error) {
    throw new ConfigurationError(`${ERROR_ENV_FILE_LOAD_FAILED}: ${result.error.message}`);
  }
}

/**
 * Picks the engine executable: explicit value first, then the environment, then `fastp`.
 */
export function resolveEngineCommand(explicit?: string): string {
  const fromEnv = process.env[ENGINE_ENV_VAR]?.trim();
  if (explicit && explicit.trim() !== '') return explicit.trim();
  if (fromEnv) return fromEnv;
  return DEFAULT_ENGINE_COMMAND;
}
