import fs from 'fs';
import path from 'path';

import { ConfigurationError } from '../errors';
import {
  DEFAULT_COMPLEXITY_THRESHOLD, DEFAULT_JOBS, DEFAULT_MIN_LENGTH, DEFAULT_QUALITY_THRESHOLD,
  DEFAULT_THREADS, MAX_COMPLEXITY_THRESHOLD, RunConfig, RunConfigInput,
} from '../types/config.types';
import { EXIT_INVALID_ARGS } from '../utils/exit-codes';

const INTEGER_PATTERN = /^\d+$/;

interface IntegerBounds {
  min: number;
  max?: number;
}

/**
 * Parses a non-negative integer option given as a number or a decimal string and
 * checks it against the bounds.
 *
 * @param value - Raw option value; undefined selects the fallback.
 * @param label - Option name used in the error message (e.g. "--threads").
 * @throws {ConfigurationError} With EXIT_INVALID_ARGS for non-integers or out-of-range values.
 */
export function parseIntegerOption(value: number | string | undefined, fallback: number,
                                   label: string, bounds: IntegerBounds): number {
  let parsed: number;
  if (value === undefined) {
    parsed = fallback;
  } else if (typeof value === 'number') {
    parsed = value;
  } else {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      throw new ConfigurationError(`Invalid arguments: ${label} must be an integer, got "${value}"`, EXIT_INVALID_ARGS);
    }
    parsed = parseInt(trimmed, 10);
  }

  if (!Number.isInteger(parsed) || parsed < bounds.min || (bounds.max !== undefined && parsed > bounds.max)) {
    const range = bounds.max !== undefined ? `between ${bounds.min} and ${bounds.max}` : `>= ${bounds.min}`;
    throw new ConfigurationError(`Invalid arguments: ${label} must be ${range}, got ${parsed}`, EXIT_INVALID_ARGS);
  }
  return parsed;
}

function requirePath(value: string | undefined, label: string): string {
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`Invalid arguments: ${label} is required`, EXIT_INVALID_ARGS);
  }
  return path.resolve(process.cwd(), value);
}

function isAccessible(target: string, mode: number): boolean {
  try {
    fs.accessSync(target, mode);
    return true;
  } catch {
    return false;
  }
}

function assertInputDirectory(inputDir: string): void {
  if (!fs.existsSync(inputDir)) {
    throw new ConfigurationError(`Input directory does not exist: ${inputDir}`);
  }
  if (!fs.statSync(inputDir).isDirectory()) {
    throw new ConfigurationError(`Input path is not a directory: ${inputDir}`);
  }
  if (!isAccessible(inputDir, fs.constants.R_OK | fs.constants.X_OK)) {
    throw new ConfigurationError(`Input directory is not readable: ${inputDir}`);
  }
}

function assertOutputWritable(outputDir: string): void {
  if (fs.existsSync(outputDir)) {
    if (!fs.statSync(outputDir).isDirectory()) {
      throw new ConfigurationError(`Output path exists and is not a directory: ${outputDir}`);
    }
    if (!isAccessible(outputDir, fs.constants.W_OK)) {
      throw new ConfigurationError(`Cannot write to output directory: ${outputDir}`);
    }
    return;
  }

  const parent = path.dirname(outputDir);
  if (!fs.existsSync(parent) || !isAccessible(parent, fs.constants.W_OK)) {
    throw new ConfigurationError(`Cannot write to output directory parent: ${parent}`);
  }
}

function resolveAdapterFasta(adapterFasta: string | undefined): string | undefined {
  if (adapterFasta === undefined || adapterFasta.trim() === '') return undefined;
  const resolved = path.resolve(process.cwd(), adapterFasta);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new ConfigurationError(`Adapter FASTA file not found: ${resolved}`);
  }
  return resolved;
}

/**
 * Validates raw run parameters and freezes them into a RunConfig.
 * Paths are resolved against the current working directory.
 *
 * @throws {ConfigurationError} EXIT_INVALID_ARGS for missing or malformed values,
 *         EXIT_CONFIG_ERROR for filesystem preconditions that do not hold.
 */
export function createRunConfig(input: RunConfigInput): RunConfig {
  const inputDir = requirePath(input.inputDir, '--input-dir');
  const outputDir = requirePath(input.outputDir, '--output-dir');

  const threads = parseIntegerOption(input.threads, DEFAULT_THREADS, '--threads', { min: 1 });
  const minLength = parseIntegerOption(input.minLength, DEFAULT_MIN_LENGTH, '--min-length', { min: 1 });
  const qualityThreshold = parseIntegerOption(input.qualityThreshold, DEFAULT_QUALITY_THRESHOLD, '--quality-threshold', { min: 0 });
  const complexityThreshold = parseIntegerOption(input.complexityThreshold, DEFAULT_COMPLEXITY_THRESHOLD, '--complexity',
                                                 { min: 0, max: MAX_COMPLEXITY_THRESHOLD });
  const jobs = parseIntegerOption(input.jobs, DEFAULT_JOBS, '--jobs', { min: 1, max: threads });

  assertInputDirectory(inputDir);
  assertOutputWritable(outputDir);
  const adapterFasta = resolveAdapterFasta(input.adapterFasta);

  const config: RunConfig = {
    inputDir,
    outputDir,
    threads,
    minLength,
    qualityThreshold,
    complexityThreshold,
    ...(adapterFasta !== undefined && { adapterFasta }),
    trimPolyG: input.trimPolyG ?? true,
    trimPolyX: input.trimPolyX ?? true,
    generateReport: input.generateReport ?? true,
    jobs,
    recursive: input.recursive ?? true,
  };
  return Object.freeze(config);
}

/**
 * Engine threads given to each sample so that `jobs` concurrent samples stay
 * within the batch thread budget.
 */
export function threadsPerSample(config: Pick<RunConfig, 'threads' | 'jobs'>): number {
  return Math.max(1, Math.floor(config.threads / Math.max(1, config.jobs)));
}
