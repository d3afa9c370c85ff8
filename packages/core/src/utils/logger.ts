import { logError, logInfo, logSuccess, logWarning } from './console';

/**
 * Thin logger used by the batch components. `debug` output only appears in verbose mode.
 */
export class Logger {
  constructor(private readonly verbose: boolean = false) {}

  info(message: string): void {
    logInfo(message);
  }

  success(message: string): void {
    logSuccess(message);
  }

  warn(message: string): void {
    logWarning(message);
  }

  error(message: string): void {
    logError(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      logInfo(message);
    }
  }
}
