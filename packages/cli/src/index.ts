#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { EXIT_GENERAL_ERROR, EXIT_INVALID_ARGS, ErrorWithCode, PIPELINE_VERSION, exitCodeOf, getErrorMessage } from 'longread-qc-core';

import { presetsCommand } from './commands/presets';
import { runCommand } from './commands/run';

export const PROGRAM_NAME = 'longread-qc';

/**
 * Runs the long-read quality-control CLI.
 *
 * Registers the commands (`run` is the default) and parses the provided arguments.
 * Command failures are rethrown carrying a numeric `code` used as the exit status;
 * usage errors reported by commander map to EXIT_INVALID_ARGS.
 *
 * @param argv - Command-line arguments, excluding 'node' and the script name.
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description('Quality control and trimming for long-read FASTQ batches')
    .version(PIPELINE_VERSION, '-v, --version')
    .exitOverride();

  runCommand(program);
  presetsCommand(program);

  try {
    await program.parseAsync(['node', PROGRAM_NAME, ...argv]);
  } catch (err: unknown) {
    if (!(err instanceof CommanderError)) throw err;
    // Help and version output end with exit code 0
    if (err.exitCode === 0) return;
    const usageError: ErrorWithCode = Object.assign(new Error(err.message), { code: EXIT_INVALID_ARGS });
    throw usageError;
  }
}

// If called directly from node
if (require.main === module) {
  runCli(process.argv.slice(2)).catch((err: unknown) => {
    process.stderr.write(getErrorMessage(err) + '\n');
    process.exit(exitCodeOf(err) ?? EXIT_GENERAL_ERROR);
  });
}

export { BatchProgressUI } from './utils/progress-ui';
