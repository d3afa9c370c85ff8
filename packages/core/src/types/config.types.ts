/** Default number of engine threads for the whole batch */
export const DEFAULT_THREADS = 4;

/** Default minimum read length kept after trimming */
export const DEFAULT_MIN_LENGTH = 1000;

/** Default phred quality threshold passed to the engine */
export const DEFAULT_QUALITY_THRESHOLD = 7;

/** Default low-complexity filter threshold (percent) */
export const DEFAULT_COMPLEXITY_THRESHOLD = 30;

/** Default number of samples processed at the same time */
export const DEFAULT_JOBS = 1;

/** Upper bound of the complexity threshold */
export const MAX_COMPLEXITY_THRESHOLD = 100;

/**
 * Validated, immutable parameter set for one batch invocation.
 *
 * `threads` is the thread budget of the whole batch. With `jobs` samples running
 * at once each engine invocation receives `floor(threads / jobs)` threads, so the
 * total never exceeds the budget.
 */
export interface RunConfig {
  /** Absolute path of the directory scanned for FASTQ files. */
  readonly inputDir: string;
  /** Absolute path of the output root. */
  readonly outputDir: string;
  readonly threads: number;
  readonly minLength: number;
  readonly qualityThreshold: number;
  readonly complexityThreshold: number;
  /** Absolute path of the adapter FASTA, when adapter trimming is wanted. */
  readonly adapterFasta?: string;
  readonly trimPolyG: boolean;
  readonly trimPolyX: boolean;
  readonly generateReport: boolean;
  readonly jobs: number;
  /** Whether discovery descends into subdirectories. */
  readonly recursive: boolean;
}

/**
 * Raw, unvalidated run parameters as they arrive from the CLI or a preset.
 * Numbers may still be strings.
 */
export interface RunConfigInput {
  inputDir?: string;
  outputDir?: string;
  threads?: number | string;
  minLength?: number | string;
  qualityThreshold?: number | string;
  complexityThreshold?: number | string;
  adapterFasta?: string;
  trimPolyG?: boolean;
  trimPolyX?: boolean;
  generateReport?: boolean;
  jobs?: number | string;
  recursive?: boolean;
}

/**
 * A named set of parameter overrides for a sequencing platform or use case.
 */
export interface RunPreset {
  name: string;
  title: string;
  description: string;
  values: Omit<RunConfigInput, 'inputDir' | 'outputDir' | 'adapterFasta' | 'recursive' | 'jobs'>;
}
