import { threadsPerSample } from '../core/run-config';
import { RunConfig } from '../types/config.types';
import { EngineArgs } from '../types/engine.types';
import { Sample } from '../types/sample.types';

/** Engine flag names, as the fastp command line spells them. */
export const ENGINE_FLAGS = {
  INPUT: '-i',
  OUTPUT: '-o',
  THREAD: '--thread',
  QUALIFIED_QUALITY: '--qualified_quality_phred',
  LENGTH_REQUIRED: '--length_required',
  LOW_COMPLEXITY_FILTER: '--low_complexity_filter',
  COMPLEXITY_THRESHOLD: '--complexity_threshold',
  DISABLE_QUALITY_FILTERING: '--disable_quality_filtering',
  DISABLE_ADAPTER_TRIMMING: '--disable_adapter_trimming',
  ADAPTER_FASTA: '--adapter_fasta',
  ENABLE_ADAPTER_TRIMMING: '--enable_adapter_trimming',
  TRIM_POLY_G: '--trim_poly_g',
  DISABLE_TRIM_POLY_G: '--disable_trim_poly_g',
  TRIM_POLY_X: '--trim_poly_x',
  HTML_REPORT: '--html',
  JSON_REPORT: '--json',
} as const;

/**
 * Builds the ordered engine argument list for one sample.
 *
 * Policy:
 * - length, complexity and poly-tail trimming always apply;
 * - the engine's generic quality filtering is always disabled;
 * - adapter trimming is disabled unless an adapter FASTA is configured, which
 *   enables it together with the reference;
 * - poly-G trimming is always stated explicitly (enable or disable);
 * - poly-X trimming is only ever enabled, the engine has no disable flag for it;
 * - report paths are passed only when reports are wanted.
 *
 * @param threads - Engine threads for this invocation; defaults to the per-sample share of the batch budget.
 */
export function buildEngineArguments(config: RunConfig, sample: Sample,
                                     threads: number = threadsPerSample(config)): EngineArgs {
  const args: string[] = [
    ENGINE_FLAGS.INPUT, sample.sourcePath,
    ENGINE_FLAGS.OUTPUT, sample.trimmedPath,
    ENGINE_FLAGS.THREAD, String(threads),
    ENGINE_FLAGS.QUALIFIED_QUALITY, String(config.qualityThreshold),
    ENGINE_FLAGS.LENGTH_REQUIRED, String(config.minLength),
    ENGINE_FLAGS.LOW_COMPLEXITY_FILTER,
    ENGINE_FLAGS.COMPLEXITY_THRESHOLD, String(config.complexityThreshold),
    ENGINE_FLAGS.DISABLE_QUALITY_FILTERING,
  ];

  if (config.adapterFasta !== undefined) {
    args.push(ENGINE_FLAGS.ADAPTER_FASTA, config.adapterFasta, ENGINE_FLAGS.ENABLE_ADAPTER_TRIMMING);
  } else {
    args.push(ENGINE_FLAGS.DISABLE_ADAPTER_TRIMMING);
  }

  args.push(config.trimPolyG ? ENGINE_FLAGS.TRIM_POLY_G : ENGINE_FLAGS.DISABLE_TRIM_POLY_G);

  if (config.trimPolyX) {
    args.push(ENGINE_FLAGS.TRIM_POLY_X);
  }

  if (config.generateReport) {
    args.push(ENGINE_FLAGS.HTML_REPORT, sample.htmlReportPath, ENGINE_FLAGS.JSON_REPORT, sample.jsonReportPath);
  }

  return args;
}

/**
 * Returns the JSON metrics path requested in an argument list, if any.
 */
export function findMetricsPath(args: EngineArgs): string | undefined {
  const index = args.indexOf(ENGINE_FLAGS.JSON_REPORT);
  return index >= 0 && index + 1 < args.length ? args[index + 1] : undefined;
}

const SAFE_SHELL_TOKEN = /^[A-Za-z0-9_./:=@%+,-]+$/;

function quoteForShell(token: string): string {
  if (SAFE_SHELL_TOKEN.test(token)) return token;
  return `'${token.replace(/'/g, `'\\''`)}'`;
}

/**
 * Renders a command and its arguments as a single shell-quoted line.
 * For display only (dry runs, verbose output); execution never goes through a shell.
 */
export function formatCommandLine(command: string, args: EngineArgs): string {
  return [command, ...args].map(quoteForShell).join(' ');
}
