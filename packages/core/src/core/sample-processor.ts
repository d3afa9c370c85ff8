import fs from 'fs';

import { buildEngineArguments } from '../engine/engine-arguments';
import { parseEngineMetrics } from '../engine/metrics-parser';
import { RunConfig } from '../types/config.types';
import { EngineResult, ProcessingEngine } from '../types/engine.types';
import { ReadMetrics, SAMPLE_STATUS, Sample, SampleOutcome } from '../types/sample.types';
import { getErrorMessage, writeFileWithDirectories } from '../utils/common';
import { Logger } from '../utils/logger';

import { threadsPerSample } from './run-config';

const INTERRUPTED_MESSAGE = 'interrupted before completion; partial outputs discarded';
const CANCELLED_MESSAGE = 'cancelled before start';

/**
 * Anything that turns a sample into exactly one outcome. The orchestrator depends on this
 * rather than on SampleProcessor so it can be driven by other runners (dry runs, tests).
 */
export interface SampleRunner {
  process(sample: Sample, signal?: AbortSignal): Promise<SampleOutcome>;
}

async function removeIfPresent(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Builds a failure outcome. Exported for runners that never reach the engine.
 */
export function failureOutcome(sample: Sample, error: string, durationMs: number = 0): SampleOutcome {
  return {
    sampleId: sample.id,
    sourcePath: sample.sourcePath,
    status: SAMPLE_STATUS.FAILURE,
    trimmedPath: sample.trimmedPath,
    logPath: sample.logPath,
    error,
    durationMs,
  };
}

/**
 * Builds the outcome of a sample that never started because the batch was cancelled.
 */
export function cancelledOutcome(sample: Sample): SampleOutcome {
  return failureOutcome(sample, CANCELLED_MESSAGE);
}

function successOutcome(sample: Sample, metrics: ReadMetrics, durationMs: number): SampleOutcome {
  return {
    sampleId: sample.id,
    sourcePath: sample.sourcePath,
    status: SAMPLE_STATUS.SUCCESS,
    trimmedPath: sample.trimmedPath,
    logPath: sample.logPath,
    ...metrics,
    durationMs,
  };
}

/**
 * Executes one engine invocation per sample and classifies the result.
 *
 * Per-sample problems (engine missing at spawn time, non-zero exit, interruption,
 * output files that cannot be written) become failure outcomes; `process` does not
 * throw for them. There are no retries.
 */
export class SampleProcessor implements SampleRunner {
  private readonly threads: number;

  constructor(
    private readonly engine: ProcessingEngine,
    private readonly config: RunConfig,
    private readonly logger: Logger = new Logger()
  ) {
    this.threads = threadsPerSample(config);
  }

  /**
   * Processes one sample: clears its previous artifacts, runs the engine, writes the
   * combined engine output to the sample log and reads the metrics when reports were requested.
   *
   * @param sample - The sample to process.
   * @param signal - Aborting terminates the engine; the sample is then reported as failed.
   * @returns The sample outcome.
   */
  async process(sample: Sample, signal?: AbortSignal): Promise<SampleOutcome> {
    if (signal?.aborted) {
      return cancelledOutcome(sample);
    }

    const startedAt = Date.now();
    try {
      return await this.runEngine(sample, startedAt, signal);
    } catch (error: unknown) {
      // Output files that cannot be cleared or written fail this sample only
      return failureOutcome(sample, `cannot write sample outputs: ${getErrorMessage(error)}`, Date.now() - startedAt);
    }
  }

  private async runEngine(sample: Sample, startedAt: number, signal?: AbortSignal): Promise<SampleOutcome> {
    await this.clearArtifacts(sample);
    const args = buildEngineArguments(this.config, sample, this.threads);

    let result: EngineResult;
    try {
      result = await this.engine.invoke(sample, args, signal ? { signal } : {});
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      await writeFileWithDirectories(sample.logPath, `${message}\n`);
      return failureOutcome(sample, `${message}; see log ${sample.logPath}`, Date.now() - startedAt);
    }

    await writeFileWithDirectories(sample.logPath, result.output);

    if (signal?.aborted || (result.exitStatus === null && result.signal !== null)) {
      await this.discardOutputs(sample);
      return failureOutcome(sample, `${INTERRUPTED_MESSAGE}; see log ${sample.logPath}`, Date.now() - startedAt);
    }

    if (result.exitStatus !== 0) {
      return failureOutcome(sample, `${this.engine.name} exited with status ${String(result.exitStatus)}; see log ${sample.logPath}`,
                            Date.now() - startedAt);
    }

    const metrics = await this.readMetrics(result);
    return successOutcome(sample, metrics, Date.now() - startedAt);
  }

  private async readMetrics(result: EngineResult): Promise<ReadMetrics> {
    if (!this.config.generateReport || result.metricsPath === undefined) {
      return {};
    }
    const { metrics, warning } = await parseEngineMetrics(result.metricsPath);
    if (warning) {
      this.logger.warn(warning.message);
    }
    return metrics;
  }

  private async clearArtifacts(sample: Sample): Promise<void> {
    await Promise.all([
      removeIfPresent(sample.trimmedPath),
      removeIfPresent(sample.htmlReportPath),
      removeIfPresent(sample.jsonReportPath),
      removeIfPresent(sample.logPath),
    ]);
  }

  private async discardOutputs(sample: Sample): Promise<void> {
    await Promise.all([
      removeIfPresent(sample.trimmedPath),
      removeIfPresent(sample.htmlReportPath),
      removeIfPresent(sample.jsonReportPath),
    ]);
  }
}
