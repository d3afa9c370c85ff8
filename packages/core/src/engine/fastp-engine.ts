import { spawn } from 'child_process';
import path from 'path';

import { EngineStartError, EngineUnavailableError } from '../errors';
import { EngineArgs, EngineInvokeOptions, EngineResult, ProcessingEngine } from '../types/engine.types';
import { Sample } from '../types/sample.types';
import { getErrorCode, getErrorMessage } from '../utils/common';
import { DEFAULT_ENGINE_COMMAND } from '../utils/env-loader';

import { findMetricsPath } from './engine-arguments';

const VERSION_FLAG = '--version';
const TERMINATION_SIGNAL: NodeJS.Signals = 'SIGTERM';
const INSTALL_HINT = 'Install it with "conda install -c bioconda fastp" or point LONGREAD_QC_ENGINE at the executable.';

/** Captured output of a finished child process. */
type ProcessOutput = Omit<EngineResult, 'metricsPath'>;

/**
 * Spawns a command without a shell and collects its output.
 * Rejects only when the process cannot be started; any exit status resolves.
 */
function runProcess(command: string, args: EngineArgs, signal?: AbortSignal): Promise<ProcessOutput> {
  return new Promise<ProcessOutput>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: string[] = [];
    const stderr: string[] = [];
    const output: string[] = [];
    let settled = false;

    const onAbort = (): void => {
      child.kill(TERMINATION_SIGNAL);
    };
    const detach = (): void => {
      signal?.removeEventListener('abort', onAbort);
    };

    if (signal) {
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout.push(chunk);
      output.push(chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr.push(chunk);
      output.push(chunk);
    });

    child.once('error', (error: Error) => {
      detach();
      if (settled) return;
      settled = true;
      reject(error);
    });

    child.once('close', (code: number | null, closeSignal: NodeJS.Signals | null) => {
      detach();
      if (settled) return;
      settled = true;
      resolve({
        exitStatus: code,
        signal: closeSignal,
        stdout: stdout.join(''),
        stderr: stderr.join(''),
        output: output.join(''),
      });
    });
  });
}

function firstNonEmptyLine(text: string): string | undefined {
  return text.split('\n').map((line) => line.trim()).find((line) => line.length > 0);
}

/**
 * ProcessingEngine backed by the fastp executable, run as a subprocess.
 */
export class FastpEngine implements ProcessingEngine {
  readonly name: string;

  /**
   * @param command - Executable name or path; defaults to `fastp` on the PATH.
   */
  constructor(private readonly command: string = DEFAULT_ENGINE_COMMAND) {
    this.name = path.basename(command);
  }

  /**
   * Runs `<engine> --version` once. fastp prints its version on stderr, so both
   * streams are searched.
   */
  async checkAvailability(): Promise<string> {
    let result: ProcessOutput;
    try {
      result = await runProcess(this.command, [VERSION_FLAG]);
    } catch (error: unknown) {
      const reason = getErrorCode(error) === 'ENOENT' ? 'not found' : getErrorMessage(error);
      throw new EngineUnavailableError(`Processing engine ${this.command} cannot be started (${reason}). ${INSTALL_HINT}`);
    }

    if (result.exitStatus !== 0) {
      throw new EngineUnavailableError(`Processing engine check "${this.command} ${VERSION_FLAG}" exited with status ${String(result.exitStatus)}`);
    }
    return firstNonEmptyLine(result.output) ?? 'unknown version';
  }

  async invoke(sample: Sample, args: EngineArgs, options: EngineInvokeOptions = {}): Promise<EngineResult> {
    let result: ProcessOutput;
    try {
      result = await runProcess(this.command, args, options.signal);
    } catch (error: unknown) {
      throw new EngineStartError(this.command, `${getErrorMessage(error)} (sample ${sample.id})`);
    }

    const metricsPath = findMetricsPath(args);
    return { ...result, ...(metricsPath !== undefined && { metricsPath }) };
  }
}

/**
 * Creates the engine used by the CLI. Separate from the class so callers (and tests)
 * can substitute another ProcessingEngine.
 */
export function createProcessingEngine(command: string = DEFAULT_ENGINE_COMMAND): ProcessingEngine {
  return new FastpEngine(command);
}
