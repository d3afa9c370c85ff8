import fs from 'fs';
import os from 'os';
import path from 'path';

import { EngineUnavailableError } from '../errors';
import { RunConfig } from '../types/config.types';
import { EngineArgs, EngineInvokeOptions, EngineResult, ProcessingEngine } from '../types/engine.types';
import { Sample } from '../types/sample.types';

/**
 * Creates a temporary directory for testing and returns a cleanup function.
 * Reusable utility for test setup/teardown.
 *
 * @param prefix - Optional prefix for the temporary directory name (default: 'test-')
 * @returns An object containing the temporary directory path and a cleanup function
 */
export function createTempDir(prefix: string = 'test-'): { tmpDir: string; cleanup: () => void } {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    tmpDir,
    cleanup: (): void => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

/**
 * Builds a RunConfig without touching the filesystem. Defaults mirror the CLI defaults.
 */
export function createTestRunConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    inputDir: '/data/in',
    outputDir: '/data/out',
    threads: 4,
    minLength: 1000,
    qualityThreshold: 7,
    complexityThreshold: 30,
    trimPolyG: true,
    trimPolyX: true,
    generateReport: true,
    jobs: 1,
    recursive: true,
    ...overrides,
  };
}

/** Scripted behavior of the stub engine for one sample. */
export interface StubSampleBehavior {
  exitStatus?: number | null;
  signal?: NodeJS.Signals | null;
  output?: string;
  /** Read counts written to the JSON report as `summary.*.total_reads`. */
  readsBefore?: number;
  readsAfter?: number;
  /** Throw as if the executable could not be spawned. */
  failToStart?: boolean;
  /** Resolve only after this many milliseconds (or on abort). */
  delayMs?: number;
}

export interface StubInvocation {
  sampleId: string;
  args: EngineArgs;
}

function argumentAfter(args: EngineArgs, flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

function wait(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const timer = setTimeout(resolve, delayMs);
    signal?.addEventListener('abort', () => {
      clearTimeout(timer);
      resolve();
    }, { once: true });
  });
}

function scriptedExitStatus(behavior: StubSampleBehavior): number | null {
  return behavior.exitStatus === undefined ? 0 : behavior.exitStatus;
}

/**
 * In-process ProcessingEngine for tests. Writes the files a real engine would write
 * (`-o`, `--html`, `--json`) and returns scripted results per sample identifier.
 */
export class StubEngine implements ProcessingEngine {
  readonly name = 'fastp';
  readonly invocations: StubInvocation[] = [];
  private running = 0;
  private peakRunning = 0;

  constructor(
    private readonly behaviors: Record<string, StubSampleBehavior> = {},
    private readonly available: boolean = true
  ) {}

  get maxConcurrent(): number {
    return this.peakRunning;
  }

  async checkAvailability(): Promise<string> {
    if (!this.available) {
      throw new EngineUnavailableError('Processing engine fastp cannot be started (not found).');
    }
    return 'fastp 0.23.4';
  }

  async invoke(sample: Sample, args: EngineArgs, options: EngineInvokeOptions = {}): Promise<EngineResult> {
    this.invocations.push({ sampleId: sample.id, args });
    const behavior = this.behaviors[sample.id] ?? {};
    if (behavior.failToStart) {
      throw new Error(`spawn fastp ENOENT (sample ${sample.id})`);
    }

    this.running++;
    this.peakRunning = Math.max(this.peakRunning, this.running);
    try {
      await this.writeOutputs(args, behavior);
      if (behavior.delayMs !== undefined) {
        await wait(behavior.delayMs, options.signal);
      }
    } finally {
      this.running--;
    }

    const killed = options.signal?.aborted ?? false;
    const metricsPath = argumentAfter(args, '--json');
    const output = behavior.output ?? `Read1 before filtering: ${sample.id}\n`;
    return {
      exitStatus: killed ? null : scriptedExitStatus(behavior),
      signal: killed ? 'SIGTERM' : behavior.signal ?? null,
      stdout: '',
      stderr: output,
      output,
      ...(metricsPath !== undefined && { metricsPath }),
    };
  }

  private async writeOutputs(args: EngineArgs, behavior: StubSampleBehavior): Promise<void> {
    const trimmedPath = argumentAfter(args, '-o');
    const htmlPath = argumentAfter(args, '--html');
    const jsonPath = argumentAfter(args, '--json');

    if (trimmedPath !== undefined) {
      await fs.promises.writeFile(trimmedPath, 'trimmed reads');
    }
    if (htmlPath !== undefined) {
      await fs.promises.writeFile(htmlPath, '<html></html>');
    }
    if (jsonPath !== undefined) {
      const report = {
        summary: {
          before_filtering: { total_reads: behavior.readsBefore ?? 1000, total_bases: 5000000 },
          after_filtering: { total_reads: behavior.readsAfter ?? 850, total_bases: 4200000 },
        },
      };
      await fs.promises.writeFile(jsonPath, JSON.stringify(report));
    }
  }
}
