import {
  EXIT_CONFIG_ERROR, EXIT_ENGINE_UNAVAILABLE, EXIT_GENERAL_ERROR, EXIT_NO_INPUT, ErrorWithCode,
} from './utils/exit-codes';

/**
 * Base class for every error the batch pipeline raises on purpose.
 * The `code` is the exit status the CLI uses when the error reaches it.
 */
export class PipelineError extends Error implements ErrorWithCode {
  readonly code: number;

  constructor(message: string, code: number = EXIT_GENERAL_ERROR) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid or unusable run parameters: missing directories, unwritable output,
 * missing adapter file, out-of-range numbers. Fatal before any sample runs.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, code: number = EXIT_CONFIG_ERROR) {
    super(message, code);
  }
}

/** The processing engine executable cannot be run at all. */
export class EngineUnavailableError extends PipelineError {
  constructor(message: string) {
    super(message, EXIT_ENGINE_UNAVAILABLE);
  }
}

/** Input discovery failed: unreadable directories, no inputs, clashing sample names. */
export class DiscoveryError extends PipelineError {
  constructor(message: string) {
    super(message, EXIT_NO_INPUT);
  }
}

export class NoInputFilesError extends DiscoveryError {
  constructor(readonly inputDir: string) {
    super(`No FASTQ files found in input directory: ${inputDir}`);
  }
}

/**
 * Two or more input files reduce to the same sample identifier, so their
 * outputs would overwrite each other.
 */
export class DuplicateSampleError extends DiscoveryError {
  constructor(readonly duplicates: ReadonlyMap<string, readonly string[]>) {
    const details = [...duplicates.entries()]
      .map(([id, files]) => `${id} (${files.join(', ')})`)
      .join('; ');
    super(`Duplicate sample identifiers: ${details}`);
  }
}

/**
 * The engine process for one sample could not be started. Recovered by the
 * sample processor and recorded as a failed outcome.
 */
export class EngineStartError extends PipelineError {
  constructor(readonly command: string, cause: string) {
    super(`Failed to start ${command}: ${cause}`);
  }
}

/**
 * Engine metrics were missing or unreadable. Never thrown: returned next to the
 * (empty) metrics so the caller can log it.
 */
export class MetricsParseWarning extends PipelineError {
  constructor(readonly metricsPath: string, reason: string) {
    super(`Could not read metrics from ${metricsPath}: ${reason}`);
  }
}
