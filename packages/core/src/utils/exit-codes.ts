export const EXIT_GENERAL_ERROR = 1;
export const EXIT_INVALID_ARGS = 2;
export const EXIT_ENGINE_UNAVAILABLE = 3;
export const EXIT_CONFIG_ERROR = 4;
export const EXIT_NO_INPUT = 5;
export const EXIT_SAMPLE_FAILURES = 6;
export const EXIT_INTERRUPTED = 130;

/**
 * Type representing an Error object that may have an optional numeric code property.
 * The CLI maps the code to the process exit status.
 */
export type ErrorWithCode = Error & { code?: number };

/**
 * Reads the numeric exit code carried by an unknown thrown value, if any.
 */
export function exitCodeOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}
