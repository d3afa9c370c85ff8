import { createSample } from '../discovery/sample-naming';
import { SAMPLE_STATUS, Sample, SampleOutcome } from '../types/sample.types';
import { createTestRunConfig } from '../utils/test-utils';

import { BatchOrchestrator, OrchestratorHooks, summarizeOutcomes } from './batch-orchestrator';
import { SampleRunner, failureOutcome } from './sample-processor';

const OUTPUT_DIR = '/data/out';

function samplesFor(...ids: string[]): Sample[] {
  return ids.map((id) => createSample(`/data/in/${id}.fastq`, OUTPUT_DIR));
}

function successFor(sample: Sample): SampleOutcome {
  return {
    sampleId: sample.id,
    sourcePath: sample.sourcePath,
    status: SAMPLE_STATUS.SUCCESS,
    trimmedPath: sample.trimmedPath,
    logPath: sample.logPath,
    durationMs: 1,
  };
}

/**
 * Runner that fails the listed samples and tracks how many run at once.
 */
class ScriptedRunner implements SampleRunner {
  readonly started: string[] = [];
  private running = 0;
  peak = 0;

  constructor(private readonly failing: ReadonlySet<string> = new Set(), private readonly delayMs: number = 0) {}

  async process(sample: Sample): Promise<SampleOutcome> {
    this.started.push(sample.id);
    this.running++;
    this.peak = Math.max(this.peak, this.running);
    await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
    this.running--;
    return this.failing.has(sample.id) ? failureOutcome(sample, 'fastp exited with status 1') : successFor(sample);
  }
}

describe('BatchOrchestrator', () => {
  it('should continue after a failing middle sample and count 2 processed, 1 failed', async () => {
    const runner = new ScriptedRunner(new Set(['b']));
    const orchestrator = new BatchOrchestrator(runner, createTestRunConfig());

    const result = await orchestrator.run(samplesFor('a', 'b', 'c'));

    expect(runner.started).toEqual(['a', 'b', 'c']);
    expect(result.processedCount).toBe(2);
    expect(result.failedCount).toBe(1);
    expect(result.outcomes.map((o) => o.status)).toEqual([SAMPLE_STATUS.SUCCESS, SAMPLE_STATUS.FAILURE, SAMPLE_STATUS.SUCCESS]);
    expect(result.cancelled).toBe(false);
  });

  it('should run samples one at a time by default', async () => {
    const runner = new ScriptedRunner(new Set(), 5);

    await new BatchOrchestrator(runner, createTestRunConfig()).run(samplesFor('a', 'b', 'c'));

    expect(runner.peak).toBe(1);
  });

  it('should run up to jobs samples at once and keep discovery order in the result', async () => {
    const runner = new ScriptedRunner(new Set(), 5);
    const config = createTestRunConfig({ threads: 4, jobs: 2 });

    const result = await new BatchOrchestrator(runner, config).run(samplesFor('a', 'b', 'c', 'd', 'e'));

    expect(runner.peak).toBe(2);
    expect(result.outcomes.map((o) => o.sampleId)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(result.processedCount).toBe(5);
  });

  it('should call the hooks in order', async () => {
    const events: string[] = [];
    const hooks: OrchestratorHooks = {
      onBatchStart: (total) => events.push(`start:${total}`),
      onSampleStart: (sample, index, total) => events.push(`sample:${sample.id}:${index}/${total}`),
      onSampleComplete: (outcome, index) => events.push(`done:${outcome.sampleId}:${index}:${outcome.status}`),
      onBatchComplete: (result) => events.push(`complete:${result.processedCount}/${result.failedCount}`),
    };

    await new BatchOrchestrator(new ScriptedRunner(new Set(['b'])), createTestRunConfig(), hooks).run(samplesFor('a', 'b'));

    expect(events).toEqual([
      'start:2',
      'sample:a:0/2',
      'done:a:0:success',
      'sample:b:1/2',
      'done:b:1:failure',
      'complete:1/1',
    ]);
  });

  it('should mark samples queued after an abort as cancelled', async () => {
    const controller = new AbortController();
    const runner = new ScriptedRunner();
    const hooks: OrchestratorHooks = {
      onSampleComplete: (outcome) => {
        if (outcome.sampleId === 'a') controller.abort();
      },
    };

    const result = await new BatchOrchestrator(runner, createTestRunConfig(), hooks)
      .run(samplesFor('a', 'b', 'c'), controller.signal);

    expect(runner.started).toEqual(['a']);
    expect(result.cancelled).toBe(true);
    expect(result.outcomes.map((o) => o.error)).toEqual([undefined, 'cancelled before start', 'cancelled before start']);
    expect(result.processedCount).toBe(1);
    expect(result.failedCount).toBe(2);
  });

  it('should produce an empty result for an empty batch', async () => {
    const result = await new BatchOrchestrator(new ScriptedRunner(), createTestRunConfig()).run([]);

    expect(result.outcomes).toEqual([]);
    expect(result.processedCount).toBe(0);
    expect(result.failedCount).toBe(0);
  });
});

describe('summarizeOutcomes', () => {
  it('should count successes and failures', () => {
    const [a, b, c] = samplesFor('a', 'b', 'c');
    if (!a || !b || !c) throw new Error('samples missing');

    expect(summarizeOutcomes([successFor(a), failureOutcome(b, 'x'), successFor(c)])).toEqual({ processed: 2, failed: 1 });
  });
});
