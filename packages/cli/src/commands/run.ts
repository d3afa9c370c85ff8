import { Command } from 'commander';
import {
  EXIT_GENERAL_ERROR, EXIT_INTERRUPTED, EXIT_SAMPLE_FAILURES, ErrorWithCode, Logger,
  OrchestratorHooks, PipelineError, RunConfig, RunConfigInput,
  createProcessingEngine, createRunConfig, exitCodeOf, formatCommandLine, getErrorMessage, getPreset,
  loadEnvironmentFile, logError, mergePresetValues, planInvocations, resolveEngineCommand,
  runQcPipeline, threadsPerSample, DEFAULT_COMPLEXITY_THRESHOLD, DEFAULT_JOBS, DEFAULT_MIN_LENGTH,
  DEFAULT_QUALITY_THRESHOLD, DEFAULT_THREADS,
} from 'longread-qc-core';

import { BatchProgressUI } from '../utils/progress-ui';

const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Options as commander parses them; numbers stay strings until validation. */
export interface RunCommandOptions {
  inputDir?: string;
  outputDir?: string;
  threads?: string;
  minLength?: string;
  qualityThreshold?: string;
  adapterFasta?: string;
  trimPolyG: boolean;
  trimPolyX: boolean;
  complexity?: string;
  report: boolean;
  jobs?: string;
  preset?: string;
  recursive: boolean;
  engine?: string;
  envFile?: string;
  dryRun?: boolean;
  allowFailures?: boolean;
  verbose?: boolean;
}

/**
 * Reads a negatable flag only when it was given on the command line, so that an
 * untouched flag leaves room for a preset value.
 */
function explicitFlag(command: Command, key: string, value: boolean): boolean | undefined {
  return command.getOptionValueSource(key) === 'cli' ? value : undefined;
}

/**
 * Maps parsed CLI options (plus an optional preset) to raw run parameters.
 */
export function runConfigInputFromOptions(options: RunCommandOptions, command: Command): RunConfigInput {
  const preset = options.preset !== undefined ? getPreset(options.preset) : undefined;
  return mergePresetValues(preset, {
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    threads: options.threads,
    minLength: options.minLength,
    qualityThreshold: options.qualityThreshold,
    complexityThreshold: options.complexity,
    adapterFasta: options.adapterFasta,
    trimPolyG: explicitFlag(command, 'trimPolyG', options.trimPolyG),
    trimPolyX: explicitFlag(command, 'trimPolyX', options.trimPolyX),
    generateReport: explicitFlag(command, 'report', options.report),
    jobs: options.jobs,
    recursive: options.recursive,
  });
}

/**
 * Orchestrator hooks that drive the progress UI.
 */
function createOrchestratorHooks(progressUI: BatchProgressUI): OrchestratorHooks {
  return {
    onBatchStart: (totalSamples: number): void => {
      progressUI.initialize(totalSamples);
    },
    onSampleStart: (sample, index): void => {
      progressUI.startSample(sample, index);
    },
    onSampleComplete: (outcome, index): void => {
      progressUI.completeSample(outcome, index);
    },
    onBatchComplete: (result): void => {
      progressUI.complete(result);
    },
  };
}

/**
 * Aborts the controller on SIGINT/SIGTERM. Returns a function removing the handlers.
 */
function installSignalHandlers(controller: AbortController, logger: Logger): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}; terminating running samples...`);
    controller.abort();
  };
  TERMINATION_SIGNALS.forEach((signal) => process.once(signal, onSignal));
  return () => {
    TERMINATION_SIGNALS.forEach((signal) => process.removeListener(signal, onSignal));
  };
}

function outputVerboseRunInfo(config: RunConfig, engineCommand: string, logger: Logger): void {
  logger.debug(`Engine executable: ${engineCommand}`);
  logger.debug(`Input directory: ${config.inputDir} (${config.recursive ? 'recursive' : 'top level only'})`);
  logger.debug(`Output directory: ${config.outputDir}`);
  logger.debug(`Threads: ${config.threads} total, ${threadsPerSample(config)} per sample, ${config.jobs} sample(s) at once`);
}

async function printDryRun(config: RunConfig, engineCommand: string): Promise<void> {
  const invocations = await planInvocations(config);
  for (const { args } of invocations) {
    process.stdout.write(`${formatCommandLine(engineCommand, args)}\n`);
  }
}

/**
 * Registers the `run` command (the default command) on the program.
 */
export function runCommand(program: Command): void {
  program
    .command('run', { isDefault: true })
    .description('Quality-control and trim every FASTQ file in a directory')
    .option('-i, --input-dir <dir>', 'Input directory containing FASTQ files')
    .option('-o, --output-dir <dir>', 'Output directory for processed files')
    .option('-t, --threads <n>', `Total number of engine threads (default: ${DEFAULT_THREADS})`)
    .option('-l, --min-length <n>', `Minimum read length after trimming (default: ${DEFAULT_MIN_LENGTH})`)
    .option('-q, --quality-threshold <n>', `Quality score threshold (default: ${DEFAULT_QUALITY_THRESHOLD})`)
    .option('-a, --adapter-fasta <file>', 'FASTA file containing adapter sequences')
    .option('-g, --no-trim-poly-g', 'Disable poly-G trimming')
    .option('-x, --no-trim-poly-x', 'Disable poly-X trimming')
    .option('-c, --complexity <n>', `Low complexity threshold, 0-100 (default: ${DEFAULT_COMPLEXITY_THRESHOLD})`)
    .option('-r, --no-report', 'Skip HTML and JSON report generation')
    .option('-j, --jobs <n>', `Samples processed at the same time, sharing the thread budget (default: ${DEFAULT_JOBS})`)
    .option('-p, --preset <name>', 'Parameter preset (see the presets command)')
    .option('--no-recursive', 'Only scan the top level of the input directory')
    .option('--engine <path>', 'Processing engine executable (default: $LONGREAD_QC_ENGINE or fastp)')
    .option('-e, --env-file <path>', 'Path to environment file (default: .env)')
    .option('--dry-run', 'Print the engine command for each sample without running it')
    .option('--allow-failures', 'Exit with status 0 even when some samples failed')
    .option('--verbose', 'Verbose output')
    .action(async (options: RunCommandOptions, command: Command): Promise<void> => {
      try {
        loadEnvironmentFile(options.envFile, options.verbose);

        const logger = new Logger(options.verbose ?? false);
        const config = createRunConfig(runConfigInputFromOptions(options, command));
        const engineCommand = resolveEngineCommand(options.engine);
        if (options.verbose) outputVerboseRunInfo(config, engineCommand, logger);

        if (options.dryRun) {
          await printDryRun(config, engineCommand);
          return;
        }

        const engine = createProcessingEngine(engineCommand);
        const controller = new AbortController();
        const removeSignalHandlers = installSignalHandlers(controller, logger);
        try {
          const run = await runQcPipeline(config, engine, {
            hooks: createOrchestratorHooks(new BatchProgressUI()),
            signal: controller.signal,
            logger,
          });
          logger.info(`Summary report: ${run.summaryPath}`);
          logger.info(`Results available in: ${config.outputDir}`);

          if (run.result.cancelled) {
            throw new PipelineError('Batch interrupted by signal', EXIT_INTERRUPTED);
          }
          if (run.result.failedCount > 0 && !options.allowFailures) {
            throw new PipelineError(`${run.result.failedCount} sample(s) failed; see logs in ${config.outputDir}/logs`,
                                    EXIT_SAMPLE_FAILURES);
          }
        } finally {
          removeSignalHandlers();
        }
      } catch (err: unknown) {
        const code = exitCodeOf(err) ?? EXIT_GENERAL_ERROR;
        const message = getErrorMessage(err);
        logError(message);
        // Rethrow for runCli catch to set process exit when direct run
        const rethrown: ErrorWithCode = Object.assign(new Error(message), { code });
        throw rethrown;
      }
    });
}
