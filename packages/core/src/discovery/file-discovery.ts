import fs from 'fs';
import path from 'path';

import { DiscoveryError, DuplicateSampleError, NoInputFilesError } from '../errors';
import { FASTQ_SUFFIXES, Sample } from '../types/sample.types';
import { getErrorCode, getErrorMessage } from '../utils/common';

export interface DiscoveryOptions {
  /** Descend into subdirectories (default true). */
  recursive?: boolean;
  /** Directories to leave out of a recursive scan, such as an output root nested in the input. */
  exclude?: readonly string[];
}

/**
 * Checks whether a file name carries one of the recognized FASTQ suffixes.
 * Matching is case-sensitive.
 */
export function isFastqFileName(fileName: string): boolean {
  return FASTQ_SUFFIXES.some((suffix) => fileName.length > suffix.length && fileName.endsWith(suffix));
}

async function readDirectory(dir: string): Promise<fs.Dirent[]> {
  try {
    return await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error: unknown) {
    const code = getErrorCode(error);
    const reason = code === 'EACCES' || code === 'EPERM' ? 'permission denied' : getErrorMessage(error);
    throw new DiscoveryError(`Cannot read directory ${dir}: ${reason}`);
  }
}

async function resolveEntryKind(entryPath: string, entry: fs.Dirent): Promise<'file' | 'directory' | 'other'> {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (!entry.isSymbolicLink()) return 'other';

  try {
    const stats = await fs.promises.stat(entryPath);
    if (stats.isFile()) return 'file';
    return stats.isDirectory() ? 'directory' : 'other';
  } catch (error: unknown) {
    throw new DiscoveryError(`Cannot resolve link ${entryPath}: ${getErrorMessage(error)}`);
  }
}

interface ScanState {
  recursive: boolean;
  excluded: ReadonlySet<string>;
  found: string[];
}

async function collectFiles(dir: string, state: ScanState): Promise<void> {
  const entries = await readDirectory(dir);
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    const kind = await resolveEntryKind(entryPath, entry);
    if (kind === 'file' && isFastqFileName(entry.name)) {
      state.found.push(entryPath);
    } else if (kind === 'directory' && state.recursive && !state.excluded.has(entryPath)) {
      await collectFiles(entryPath, state);
    }
  }
}

/**
 * Enumerates the FASTQ files (`.fastq`, `.fq`, `.fastq.gz`, `.fq.gz`) below the input root.
 *
 * Discovery is recursive unless `recursive: false` is passed, in which case only the
 * top level is scanned. Subdirectories listed in `exclude` are not entered; the root itself
 * is always scanned. The result is sorted by path so the batch order is reproducible.
 * Unreadable directories fail the discovery instead of being skipped.
 *
 * @param inputDir - Directory to scan.
 * @returns Absolute paths of the matching files.
 * @throws {DiscoveryError} When a directory cannot be read.
 * @throws {NoInputFilesError} When no file matches.
 */
export async function discoverInputFiles(inputDir: string, options: DiscoveryOptions = {}): Promise<string[]> {
  const root = path.resolve(inputDir);
  const found: string[] = [];
  await collectFiles(root, {
    recursive: options.recursive ?? true,
    excluded: new Set((options.exclude ?? []).map((dir) => path.resolve(dir))),
    found,
  });

  if (found.length === 0) {
    throw new NoInputFilesError(root);
  }
  return found.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Rejects a batch in which two input files reduce to the same sample identifier.
 *
 * @throws {DuplicateSampleError} Listing every clashing identifier with its files.
 */
export function assertUniqueSampleIds(samples: readonly Sample[]): void {
  const byId = new Map<string, string[]>();
  for (const sample of samples) {
    const files = byId.get(sample.id) ?? [];
    files.push(sample.sourcePath);
    byId.set(sample.id, files);
  }

  const duplicates = new Map([...byId.entries()].filter(([, files]) => files.length > 1));
  if (duplicates.size > 0) {
    throw new DuplicateSampleError(duplicates);
  }
}
