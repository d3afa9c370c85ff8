import fs from 'fs';
import path from 'path';

import { OUTPUT_SUBDIRS, SUMMARY_FILE_NAME } from '../types/sample.types';

/**
 * Absolute paths of the trimmed/, reports/ and logs/ subdirectories of an output root.
 */
export function getOutputDirectories(outputDir: string): string[] {
  return Object.values(OUTPUT_SUBDIRS).map((subdir) => path.join(outputDir, subdir));
}

/**
 * Creates the output root with its trimmed/, reports/ and logs/ subdirectories.
 * Existing directories are kept.
 *
 * @returns The absolute paths of the created subdirectories.
 */
export async function prepareOutputDirectories(outputDir: string): Promise<string[]> {
  const dirs = getOutputDirectories(outputDir);
  for (const dir of dirs) {
    await fs.promises.mkdir(dir, { recursive: true });
  }
  return dirs;
}

export function getSummaryPath(outputDir: string): string {
  return path.join(outputDir, SUMMARY_FILE_NAME);
}
