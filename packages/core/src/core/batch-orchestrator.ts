import { RunConfig } from '../types/config.types';
import { BatchResult, SAMPLE_STATUS, Sample, SampleOutcome } from '../types/sample.types';

import { SampleRunner, cancelledOutcome } from './sample-processor';

/**
 * Optional callbacks for observing batch progress (progress UI, logging).
 * All hooks are optional; implement only those needed.
 */
export interface OrchestratorHooks {
  /**
   * Called once before the first sample starts.
   * @param totalSamples - Number of samples in the batch.
   */
  onBatchStart?: (totalSamples: number) => void;

  /**
   * Called when a sample is handed to the runner.
   * @param sample - The sample starting.
   * @param index - Zero-based position of the sample in discovery order.
   * @param totalSamples - Number of samples in the batch.
   */
  onSampleStart?: (sample: Sample, index: number, totalSamples: number) => void;

  /**
   * Called when a sample has produced its outcome (success or failure).
   */
  onSampleComplete?: (outcome: SampleOutcome, index: number, totalSamples: number) => void;

  /**
   * Called with the finalized result after every sample has an outcome.
   */
  onBatchComplete?: (result: BatchResult) => void;
}

export interface OutcomeCounts {
  processed: number;
  failed: number;
}

/**
 * Counts successful and failed outcomes.
 */
export function summarizeOutcomes(outcomes: readonly SampleOutcome[]): OutcomeCounts {
  return outcomes.reduce<OutcomeCounts>(
    (counts, outcome) => (outcome.status === SAMPLE_STATUS.SUCCESS
      ? { ...counts, processed: counts.processed + 1 }
      : { ...counts, failed: counts.failed + 1 }),
    { processed: 0, failed: 0 }
  );
}

/**
 * BatchOrchestrator drives a SampleRunner over every discovered sample.
 *
 * Up to `config.jobs` samples run at once; each sample writes disjoint files so no
 * further coordination is needed. Outcomes are stored by discovery index, so the
 * result order is independent of completion order. A failing sample never stops the
 * batch. When the abort signal fires, running samples are left to the runner (which
 * terminates them) and samples not yet started are recorded as cancelled.
 *
 * @param runner - Processes one sample.
 * @param config - Run configuration (snapshot stored in the result).
 * @param hooks - Optional progress hooks.
 */
export class BatchOrchestrator {
  constructor(
    private readonly runner: SampleRunner,
    private readonly config: RunConfig,
    private readonly hooks?: OrchestratorHooks
  ) {}

  /**
   * Processes all samples and returns the finalized batch result.
   *
   * @param samples - Samples in discovery order.
   * @param signal - Optional cancellation signal.
   */
  async run(samples: readonly Sample[], signal?: AbortSignal): Promise<BatchResult> {
    const startedAt = new Date();
    const total = samples.length;
    const outcomes = new Array<SampleOutcome | undefined>(total).fill(undefined);
    let nextIndex = 0;

    this.hooks?.onBatchStart?.(total);

    const worker = async (): Promise<void> => {
      while (nextIndex < total) {
        const index = nextIndex++;
        const sample = samples[index];
        if (sample === undefined) continue;

        let outcome: SampleOutcome;
        if (signal?.aborted) {
          outcome = cancelledOutcome(sample);
        } else {
          this.hooks?.onSampleStart?.(sample, index, total);
          outcome = await this.runner.process(sample, signal);
        }
        outcomes[index] = outcome;
        this.hooks?.onSampleComplete?.(outcome, index, total);
      }
    };

    const workerCount = Math.max(1, Math.min(this.config.jobs, total));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const finalOutcomes = samples.map((sample, index) => outcomes[index] ?? cancelledOutcome(sample));
    const counts = summarizeOutcomes(finalOutcomes);
    const result: BatchResult = {
      config: this.config,
      outcomes: finalOutcomes,
      processedCount: counts.processed,
      failedCount: counts.failed,
      cancelled: signal?.aborted ?? false,
      startedAt,
      completedAt: new Date(),
    };

    this.hooks?.onBatchComplete?.(result);
    return result;
  }
}
