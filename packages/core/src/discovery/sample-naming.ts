import path from 'path';

import { OUTPUT_SUBDIRS, Sample } from '../types/sample.types';

const READ_EXTENSIONS = ['.fastq', '.fq'] as const;

const TRIMMED_SUFFIX = '_trimmed.fastq.gz';
const HTML_REPORT_SUFFIX = '_fastp_report.html';
const JSON_REPORT_SUFFIX = '_fastp_report.json';
const LOG_SUFFIX = '_fastp.log';

/**
 * Derives the sample identifier from an input file path.
 *
 * The final path segment loses its rightmost extension; if what remains still ends in
 * `.fastq` or `.fq`, that is removed as well. `a.fastq.gz`, `a.fq.gz`, `a.fastq` and
 * `a.fq` all become `a`, and `sample.v2.fastq.gz` becomes `sample.v2`.
 *
 * @param filePath - Path of the input file (only the basename is used).
 * @returns The sample identifier.
 */
export function deriveSampleId(filePath: string): string {
  const baseName = path.basename(filePath);
  const withoutLast = baseName.slice(0, baseName.length - path.extname(baseName).length);
  const readExtension = READ_EXTENSIONS.find((ext) => withoutLast.endsWith(ext));
  return readExtension ? withoutLast.slice(0, -readExtension.length) : withoutLast;
}

/**
 * Builds the immutable Sample for an input file, with every artifact path placed
 * under the output root.
 */
export function createSample(sourcePath: string, outputDir: string): Sample {
  const id = deriveSampleId(sourcePath);
  const reportsDir = path.join(outputDir, OUTPUT_SUBDIRS.REPORTS);
  return Object.freeze({
    sourcePath,
    id,
    trimmedPath: path.join(outputDir, OUTPUT_SUBDIRS.TRIMMED, `${id}${TRIMMED_SUFFIX}`),
    htmlReportPath: path.join(reportsDir, `${id}${HTML_REPORT_SUFFIX}`),
    jsonReportPath: path.join(reportsDir, `${id}${JSON_REPORT_SUFFIX}`),
    logPath: path.join(outputDir, OUTPUT_SUBDIRS.LOGS, `${id}${LOG_SUFFIX}`),
  });
}
