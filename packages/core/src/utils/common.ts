import fs from 'fs';
import path from 'path';

const FILE_ENCODING_UTF8 = 'utf-8';

/**
 * Validates that a value is a finite number and returns it, or undefined if invalid.
 *
 * @param x - The value to validate as a number.
 * @returns The number if valid and finite, otherwise undefined.
 */
export function numOrUndefined(x: unknown): number | undefined {
  return typeof x === 'number' && Number.isFinite(x) ? x : undefined;
}

/**
 * Safely extracts an error message from an unknown error value.
 * Handles Error objects, objects with message property, and converts other types to strings.
 *
 * @param error - The error value (unknown type from catch clause).
 * @returns A string representation of the error message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Extracts a Node.js system error code (ENOENT, EACCES, ...) from an unknown error value.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Narrows an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Writes content to a file, creating parent directories if needed. Existing files are
 * replaced, never appended to.
 *
 * @param filePath - Target path, resolved against the current working directory.
 * @param content - The content to write to the file.
 * @returns Promise resolving to the absolute path of the file that was written.
 */
export async function writeFileWithDirectories(filePath: string, content: string): Promise<string> {
  const absolutePath = path.resolve(process.cwd(), filePath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, content, FILE_ENCODING_UTF8);
  return absolutePath;
}
