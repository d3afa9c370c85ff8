import fs from 'fs';

import { MetricsParseWarning } from '../errors';
import { ReadMetrics } from '../types/sample.types';
import { getErrorMessage, isRecord, numOrUndefined } from '../utils/common';

const SUMMARY_KEY = 'summary';
const BEFORE_FILTERING_KEY = 'before_filtering';
const AFTER_FILTERING_KEY = 'after_filtering';
const TOTAL_READS_KEY = 'total_reads';
const TOTAL_BASES_KEY = 'total_bases';

export interface MetricsParseResult {
  metrics: ReadMetrics;
  warning?: MetricsParseWarning;
}

function readSection(summary: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const section = summary[key];
  return isRecord(section) ? section : undefined;
}

/**
 * Extracts read and base counts from a parsed engine report by named field
 * (`summary.before_filtering.total_reads`, `summary.after_filtering.total_reads`, and the
 * matching `total_bases`). Absent or non-numeric fields are left out.
 */
export function extractReadMetrics(report: unknown): ReadMetrics {
  if (!isRecord(report)) return {};
  const summary = report[SUMMARY_KEY];
  if (!isRecord(summary)) return {};

  const before = readSection(summary, BEFORE_FILTERING_KEY);
  const after = readSection(summary, AFTER_FILTERING_KEY);
  const metrics: ReadMetrics = {};

  const readsBefore = numOrUndefined(before?.[TOTAL_READS_KEY]);
  const readsAfter = numOrUndefined(after?.[TOTAL_READS_KEY]);
  const basesBefore = numOrUndefined(before?.[TOTAL_BASES_KEY]);
  const basesAfter = numOrUndefined(after?.[TOTAL_BASES_KEY]);

  if (readsBefore !== undefined) metrics.readsBefore = readsBefore;
  if (readsAfter !== undefined) metrics.readsAfter = readsAfter;
  if (basesBefore !== undefined) metrics.basesBefore = basesBefore;
  if (basesAfter !== undefined) metrics.basesAfter = basesAfter;
  return metrics;
}

/**
 * Reads the engine's JSON metrics file. Best-effort: a missing file, invalid JSON or
 * a report without read counts yields empty metrics plus a warning, never an error.
 *
 * @param metricsPath - Path of the JSON report written by the engine.
 */
export async function parseEngineMetrics(metricsPath: string): Promise<MetricsParseResult> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(metricsPath, 'utf-8');
  } catch (error: unknown) {
    return { metrics: {}, warning: new MetricsParseWarning(metricsPath, getErrorMessage(error)) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    return { metrics: {}, warning: new MetricsParseWarning(metricsPath, `invalid JSON (${getErrorMessage(error)})`) };
  }

  const metrics = extractReadMetrics(parsed);
  if (metrics.readsBefore === undefined && metrics.readsAfter === undefined) {
    return { metrics, warning: new MetricsParseWarning(metricsPath, 'no read counts in report') };
  }
  return { metrics };
}
