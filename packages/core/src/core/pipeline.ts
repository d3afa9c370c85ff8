import { assertUniqueSampleIds, discoverInputFiles } from '../discovery/file-discovery';
import { createSample } from '../discovery/sample-naming';
import { buildEngineArguments } from '../engine/engine-arguments';
import { writeBatchSummary } from '../reporting/summary-reporter';
import { RunConfig } from '../types/config.types';
import { EngineArgs, ProcessingEngine } from '../types/engine.types';
import { BatchResult, Sample } from '../types/sample.types';
import { Logger } from '../utils/logger';

import { BatchOrchestrator, OrchestratorHooks } from './batch-orchestrator';
import { getOutputDirectories, prepareOutputDirectories } from './output-layout';
import { SampleProcessor } from './sample-processor';

/** Pipeline version reported by the CLI and written into every summary. */
export const PIPELINE_VERSION = '1.0.0';

export interface PipelineOptions {
  hooks?: OrchestratorHooks;
  signal?: AbortSignal;
  logger?: Logger;
  /** Overrides the summary timestamp (defaults to the batch completion time). */
  generatedAt?: Date;
}

export interface PipelineRun {
  result: BatchResult;
  summaryPath: string;
  engineVersion: string;
}

export interface PlannedInvocation {
  sample: Sample;
  args: EngineArgs;
}

/**
 * Discovers the inputs of a run and turns them into samples, in discovery order.
 * An output root placed inside the input root is never scanned, so earlier results
 * do not come back as new samples.
 *
 * @throws {DiscoveryError} For unreadable directories, no inputs, or clashing sample identifiers.
 */
export async function planSamples(config: RunConfig): Promise<Sample[]> {
  const files = await discoverInputFiles(config.inputDir, {
    recursive: config.recursive,
    exclude: [config.outputDir, ...getOutputDirectories(config.outputDir)],
  });
  const samples = files.map((file) => createSample(file, config.outputDir));
  assertUniqueSampleIds(samples);
  return samples;
}

/**
 * Lists the engine invocations a run would perform, without running anything.
 */
export async function planInvocations(config: RunConfig): Promise<PlannedInvocation[]> {
  const samples = await planSamples(config);
  return samples.map((sample) => ({ sample, args: buildEngineArguments(config, sample) }));
}

/**
 * Runs a complete batch: engine check, discovery, output layout, per-sample processing
 * and the summary report.
 *
 * Fatal problems (engine unavailable, no inputs, duplicate identifiers) are thrown before
 * any sample runs. Per-sample failures only show up in the result and the summary.
 */
export async function runQcPipeline(config: RunConfig, engine: ProcessingEngine,
                                    options: PipelineOptions = {}): Promise<PipelineRun> {
  const logger = options.logger ?? new Logger();

  logger.info(`Checking processing engine ${engine.name}...`);
  const engineVersion = await engine.checkAvailability();
  logger.success(`Processing engine available: ${engineVersion}`);

  const samples = await planSamples(config);
  logger.info(`Found ${samples.length} input file(s) in ${config.inputDir}`);

  await prepareOutputDirectories(config.outputDir);
  logger.debug(`Output directory structure ready under ${config.outputDir}`);

  const processor = new SampleProcessor(engine, config, logger);
  const orchestrator = new BatchOrchestrator(processor, config, options.hooks);
  const result = await orchestrator.run(samples, options.signal);

  const summaryPath = await writeBatchSummary(result, {
    version: PIPELINE_VERSION,
    engineName: engine.name,
    ...(options.generatedAt !== undefined && { generatedAt: options.generatedAt }),
  });

  return { result, summaryPath, engineVersion };
}
