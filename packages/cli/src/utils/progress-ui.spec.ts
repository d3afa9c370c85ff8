import { BatchResult, SAMPLE_STATUS, SampleOutcome, createSample } from 'longread-qc-core';

import { BatchProgressUI } from './progress-ui';

let consoleOutput: string[] = [];

beforeEach(() => {
  consoleOutput = [];
  jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    consoleOutput.push(String(args[0]));
  });
});

afterEach(() => {
  jest.restoreAllMocks();
});

const sampleA = createSample('/data/in/a.fastq', '/data/out');
const sampleB = createSample('/data/in/b.fq.gz', '/data/out');

function outcome(status: SampleOutcome['status'], extra: Partial<SampleOutcome> = {}): SampleOutcome {
  return {
    sampleId: sampleA.id,
    sourcePath: sampleA.sourcePath,
    status,
    trimmedPath: sampleA.trimmedPath,
    logPath: sampleA.logPath,
    durationMs: 5,
    ...extra,
  };
}

function batchResult(overrides: Partial<BatchResult> = {}): BatchResult {
  return {
    config: {
      inputDir: '/data/in', outputDir: '/data/out', threads: 4, minLength: 1000, qualityThreshold: 7,
      complexityThreshold: 30, trimPolyG: true, trimPolyX: true, generateReport: true, jobs: 1, recursive: true,
    },
    outcomes: [],
    processedCount: 2,
    failedCount: 0,
    cancelled: false,
    startedAt: new Date(0),
    completedAt: new Date(0),
    ...overrides,
  };
}

/** Index of the first captured line containing the text, or -1. */
function lineIndex(text: string): number {
  return consoleOutput.findIndex((line) => line.includes(text));
}

describe('BatchProgressUI', () => {
  it('should append one line per event in order', () => {
    const ui = new BatchProgressUI();

    ui.initialize(2);
    ui.startSample(sampleA, 0);
    ui.completeSample(outcome(SAMPLE_STATUS.SUCCESS), 0);
    ui.startSample(sampleB, 1);

    expect(lineIndex('Processing 2 sample(s)')).toBe(0);
    expect(lineIndex('[1/2] Processing: a')).toBe(1);
    expect(lineIndex('[1/2] Successfully processed: a')).toBe(2);
    expect(lineIndex('[2/2] Processing: b')).toBe(3);
    expect(consoleOutput.join('')).not.toContain('\x1b[1A');
  });

  it('should print read counts after a success when known', () => {
    const ui = new BatchProgressUI();
    ui.initialize(1);

    ui.completeSample(outcome(SAMPLE_STATUS.SUCCESS, { readsBefore: 1000, readsAfter: 850 }), 0);

    expect(consoleOutput.some((line) => line.endsWith('  Reads before: 1000'))).toBe(true);
    expect(consoleOutput.some((line) => line.endsWith('  Reads after: 850'))).toBe(true);
  });

  it('should report failures with their error', () => {
    const ui = new BatchProgressUI();
    ui.initialize(1);

    ui.completeSample(outcome(SAMPLE_STATUS.FAILURE, { error: 'fastp exited with status 1' }), 0);

    expect(lineIndex('[1/1] Failed to process: a (fastp exited with status 1)')).toBeGreaterThan(0);
  });

  it('should print the sample duration and base counts after a success', () => {
    const ui = new BatchProgressUI();
    ui.initialize(2);

    ui.completeSample(outcome(SAMPLE_STATUS.SUCCESS, { durationMs: 2300, basesBefore: 9000000, basesAfter: 8100000 }), 1);

    expect(consoleOutput[1]).toContain('[2/2] Successfully processed: a in 2.3s');
    expect(consoleOutput[2]).toMatch(/  Bases before: 9000000$/);
    expect(consoleOutput[3]).toMatch(/  Bases after: 8100000$/);
    expect(consoleOutput).toHaveLength(4);
  });

  it('should close with totals and a pointer to the logs on failures', () => {
    const ui = new BatchProgressUI();

    ui.complete(batchResult({ processedCount: 1, failedCount: 2 }));

    expect(lineIndex('Pipeline completed')).toBe(0);
    expect(lineIndex('Processed files: 1')).toBe(1);
    expect(lineIndex('Failed files: 2 (see per-sample logs)')).toBe(2);
  });

  it('should warn instead of reporting completion when interrupted', () => {
    const ui = new BatchProgressUI();

    ui.complete(batchResult({ cancelled: true }));

    expect(lineIndex('Batch interrupted; queued samples were not processed')).toBe(0);
    expect(lineIndex('Pipeline completed')).toBe(-1);
    expect(consoleOutput).toHaveLength(2);
  });
});
