import { Command } from 'commander';
import {
  EXIT_GENERAL_ERROR,
  ErrorWithCode,
  RUN_PRESETS,
  RunPreset,
  exitCodeOf,
  formatAdapterFasta,
  getErrorMessage,
  logError,
  logInfo,
  writeFileWithDirectories,
} from 'longread-qc-core';

/**
 * Renders the one-line parameter summary shown under each preset.
 */
export function describePresetValues(preset: RunPreset): string {
  const { values } = preset;
  const parts: string[] = [];
  if (values.threads !== undefined) parts.push(`threads=${values.threads}`);
  if (values.minLength !== undefined) parts.push(`min-length=${values.minLength}`);
  if (values.qualityThreshold !== undefined) parts.push(`quality=${values.qualityThreshold}`);
  if (values.complexityThreshold !== undefined) parts.push(`complexity=${values.complexityThreshold}`);
  if (values.trimPolyG === false) parts.push('no poly-G');
  if (values.trimPolyX === false) parts.push('no poly-X');
  if (values.generateReport === false) parts.push('no reports');
  return parts.join(', ');
}

/**
 * Formats the preset listing printed by the `presets` command.
 */
export function formatPresetList(presets: readonly RunPreset[] = RUN_PRESETS): string {
  return presets
    .map((preset) => `${preset.name} - ${preset.title}\n  ${preset.description}\n  ${describePresetValues(preset)}\n`)
    .join('');
}

/**
 * Writes content to stdout, or to a file when a path is given.
 */
async function writeOutput(content: string, outputPath?: string): Promise<void> {
  if (!outputPath) {
    process.stdout.write(content);
    return;
  }
  const writtenPath = await writeFileWithDirectories(outputPath, content);
  logInfo(`Adapter file written: ${writtenPath}`);
}

function rethrowWithCode(err: unknown): never {
  const message = getErrorMessage(err);
  logError(message);
  const rethrown: ErrorWithCode = Object.assign(new Error(message), { code: exitCodeOf(err) ?? EXIT_GENERAL_ERROR });
  throw rethrown;
}

/**
 * Registers the `presets` and `adapters` helper commands.
 */
export function presetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List the available parameter presets')
    .action((): void => {
      process.stdout.write(formatPresetList());
    });

  program
    .command('adapters')
    .description('Print built-in adapter sequences as FASTA (nanopore, pacbio, pcr, or all)')
    .argument('[platform]', 'Adapter set to print')
    .option('-o, --output <file>', 'Write the FASTA to a file instead of stdout')
    .action(async (platform: string | undefined, options: { output?: string }): Promise<void> => {
      try {
        await writeOutput(formatAdapterFasta(platform), options.output);
      } catch (err: unknown) {
        rethrowWithCode(err);
      }
    });
}
