import { Sample } from './sample.types';

/** Ordered, discrete engine arguments. Never joined into a shell string for execution. */
export type EngineArgs = readonly string[];

/**
 * Result of one engine invocation.
 */
export interface EngineResult {
  /** Exit code, or null when the process was killed by a signal. */
  exitStatus: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  /** JSON metrics file requested from the engine, if any. */
  metricsPath?: string;
}

export interface EngineInvokeOptions {
  /** Aborting terminates the running engine process. */
  signal?: AbortSignal;
}

/**
 * Port to the external FASTQ processing engine. The batch core only builds
 * arguments and reads results; any engine honoring this contract can be used.
 */
export interface ProcessingEngine {
  /** Human-readable engine name, used in logs and the summary. */
  readonly name: string;

  /**
   * Verifies that the engine can be started.
   *
   * @returns The version string reported by the engine.
   * @throws {EngineUnavailableError} When the engine cannot be run at all.
   */
  checkAvailability(): Promise<string>;

  /**
   * Runs the engine for one sample.
   *
   * @throws {EngineStartError} When the process cannot be started.
   */
  invoke(sample: Sample, args: EngineArgs, options?: EngineInvokeOptions): Promise<EngineResult>;
}
