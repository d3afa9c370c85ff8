import path from 'path';

import { getSummaryPath } from '../core/output-layout';
import { BatchResult, OUTPUT_SUBDIRS, SAMPLE_STATUS, SampleOutcome } from '../types/sample.types';
import { writeFileWithDirectories } from '../utils/common';

const SUMMARY_TITLE = 'Long Reads Quality Control and Trimming Summary';
const NONE_TEXT = 'none';
const LIST_ITEM_PREFIX = '- ';

export interface SummaryOptions {
  /** Pipeline version printed in the header. */
  version: string;
  engineName: string;
  /** Defaults to the batch completion time. */
  generatedAt?: Date;
}

/**
 * Formats a date to YYYY-MM-DD HH:mm:ss local time string.
 */
export function formatLocalTime(date: Date): string {
  const pad = (n: number): string => n.toString().padStart(2, '0');
  const year = date.getFullYear();
  const month = pad(date.getMonth() + 1);
  const day = pad(date.getDate());
  const hours = pad(date.getHours());
  const minutes = pad(date.getMinutes());
  const seconds = pad(date.getSeconds());
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

function formatReadCounts(outcome: SampleOutcome): string {
  if (outcome.readsBefore === undefined && outcome.readsAfter === undefined) {
    return '';
  }
  const before = outcome.readsBefore !== undefined ? String(outcome.readsBefore) : 'N/A';
  const after = outcome.readsAfter !== undefined ? String(outcome.readsAfter) : 'N/A';
  return ` (reads before: ${before}, after: ${after})`;
}

function formatParameters(result: BatchResult): string[] {
  const config = result.config;
  return [
    'Parameters Used:',
    `- Input Directory: ${config.inputDir}`,
    `- Output Directory: ${config.outputDir}`,
    `- Threads: ${config.threads}`,
    `- Concurrent Samples: ${config.jobs}`,
    `- Minimum Length: ${config.minLength}`,
    `- Quality Threshold: ${config.qualityThreshold}`,
    `- Complexity Threshold: ${config.complexityThreshold}`,
    `- Adapter FASTA: ${config.adapterFasta ?? NONE_TEXT}`,
    `- Trim Poly-G: ${config.trimPolyG}`,
    `- Trim Poly-X: ${config.trimPolyX}`,
    `- Generate Reports: ${config.generateReport}`,
  ];
}

function formatProcessedFiles(outcomes: readonly SampleOutcome[]): string[] {
  const succeeded = outcomes
    .filter((outcome) => outcome.status === SAMPLE_STATUS.SUCCESS)
    .map((outcome) => ({ fileName: path.basename(outcome.trimmedPath), outcome }))
    .sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));

  if (succeeded.length === 0) {
    return ['Files Processed:', `${LIST_ITEM_PREFIX}${NONE_TEXT}`];
  }
  return [
    'Files Processed:',
    ...succeeded.map(({ fileName, outcome }) => `${LIST_ITEM_PREFIX}${fileName}${formatReadCounts(outcome)}`),
  ];
}

function formatFailures(outcomes: readonly SampleOutcome[]): string[] {
  const failed = outcomes.filter((outcome) => outcome.status === SAMPLE_STATUS.FAILURE);
  if (failed.length === 0) return [];
  return [
    'Failed Samples:',
    ...failed.map((outcome) => `${LIST_ITEM_PREFIX}${outcome.sampleId}: ${outcome.error ?? 'unknown error'}`),
    '',
  ];
}

/**
 * Renders the human-readable batch summary. Pure formatting, no I/O.
 */
export function formatBatchSummary(result: BatchResult, options: SummaryOptions): string {
  const generatedAt = options.generatedAt ?? result.completedAt;
  const lines = [
    SUMMARY_TITLE,
    `Date: ${formatLocalTime(generatedAt)}`,
    `Pipeline Version: ${options.version}`,
    `Processing Engine: ${options.engineName}`,
    '',
    ...formatParameters(result),
    '',
    ...formatProcessedFiles(result.outcomes),
    '',
    ...formatFailures(result.outcomes),
    'Totals:',
    `- Processed: ${result.processedCount}`,
    `- Failed: ${result.failedCount}`,
    ...(result.cancelled ? ['- Interrupted: yes'] : []),
    '',
    'Output Structure:',
    `- ${OUTPUT_SUBDIRS.TRIMMED}/: Processed FASTQ files`,
    `- ${OUTPUT_SUBDIRS.REPORTS}/: HTML and JSON reports`,
    `- ${OUTPUT_SUBDIRS.LOGS}/: Processing logs`,
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Writes `processing_summary.txt` at the output root, replacing any previous summary.
 *
 * @returns The absolute path of the written summary.
 */
export async function writeBatchSummary(result: BatchResult, options: SummaryOptions): Promise<string> {
  const summaryPath = getSummaryPath(result.config.outputDir);
  return await writeFileWithDirectories(summaryPath, formatBatchSummary(result, options));
}
