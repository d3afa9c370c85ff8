import { RunConfig } from './config.types';

/** Recognized input suffixes, longest first so compound suffixes win. */
export const FASTQ_SUFFIXES = ['.fastq.gz', '.fq.gz', '.fastq', '.fq'] as const;

/** Union type of all recognized input suffixes */
export type FastqSuffix = (typeof FASTQ_SUFFIXES)[number];

/** Subdirectories created under the output root */
export const OUTPUT_SUBDIRS = {
  TRIMMED: 'trimmed',
  REPORTS: 'reports',
  LOGS: 'logs',
} as const;

/** Union type of all output subdirectories */
export type OutputSubdir = (typeof OUTPUT_SUBDIRS)[keyof typeof OUTPUT_SUBDIRS];

/** Name of the aggregate report written at the output root */
export const SUMMARY_FILE_NAME = 'processing_summary.txt';

/** String literal constants for sample outcome statuses */
export const SAMPLE_STATUS = {
  SUCCESS: 'success',
  FAILURE: 'failure',
} as const;

/** Union type of all sample outcome statuses */
export type SampleStatus = (typeof SAMPLE_STATUS)[keyof typeof SAMPLE_STATUS];

/**
 * One input read file and the artifact paths derived from it.
 */
export interface Sample {
  readonly sourcePath: string;
  readonly id: string;
  readonly trimmedPath: string;
  readonly htmlReportPath: string;
  readonly jsonReportPath: string;
  readonly logPath: string;
}

/**
 * Read and base counts reported by the engine. Every field is optional:
 * metrics are best-effort.
 */
export interface ReadMetrics {
  readsBefore?: number;
  readsAfter?: number;
  basesBefore?: number;
  basesAfter?: number;
}

/**
 * Result of processing one sample. Created once by the sample processor.
 */
export interface SampleOutcome extends Readonly<ReadMetrics> {
  readonly sampleId: string;
  readonly sourcePath: string;
  readonly status: SampleStatus;
  readonly trimmedPath: string;
  readonly logPath: string;
  /** Failure detail, including where to find the log. */
  readonly error?: string;
  readonly durationMs: number;
}

/**
 * Aggregate outcome of one batch. Outcomes keep discovery order.
 */
export interface BatchResult {
  readonly config: RunConfig;
  readonly outcomes: readonly SampleOutcome[];
  /** Samples that succeeded. */
  readonly processedCount: number;
  readonly failedCount: number;
  /** Whether the batch was interrupted by a signal. */
  readonly cancelled: boolean;
  readonly startedAt: Date;
  readonly completedAt: Date;
}
