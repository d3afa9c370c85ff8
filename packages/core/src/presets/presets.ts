import { ConfigurationError } from '../errors';
import { RunConfigInput, RunPreset } from '../types/config.types';
import { EXIT_INVALID_ARGS } from '../utils/exit-codes';

/**
 * Parameter presets for common platforms and use cases. Explicit CLI flags override
 * any value a preset sets.
 */
export const RUN_PRESETS: readonly RunPreset[] = [
  {
    name: 'nanopore-minion',
    title: 'Oxford Nanopore MinION/GridION',
    description: 'Nanopore long reads with typical quality scores',
    values: { threads: 8, minLength: 1000, qualityThreshold: 7, complexityThreshold: 30 },
  },
  {
    name: 'nanopore-promethion',
    title: 'Oxford Nanopore PromethION',
    description: 'High-throughput Nanopore with more aggressive filtering',
    values: { threads: 16, minLength: 2000, qualityThreshold: 8, complexityThreshold: 35 },
  },
  {
    name: 'pacbio-hifi',
    title: 'PacBio Sequel/HiFi',
    description: 'High-quality PacBio reads with stringent filtering',
    values: { threads: 12, minLength: 500, qualityThreshold: 12, complexityThreshold: 40, trimPolyG: false },
  },
  {
    name: 'metagenomics',
    title: 'Metagenomics',
    description: 'Relaxed filtering for diverse microbial communities',
    values: { threads: 8, minLength: 500, qualityThreshold: 6, complexityThreshold: 25 },
  },
  {
    name: 'transcriptomics',
    title: 'Transcriptomics (RNA-seq)',
    description: 'RNA sequencing reads with poly-tail trimming',
    values: { threads: 6, minLength: 200, qualityThreshold: 8, complexityThreshold: 30 },
  },
  {
    name: 'genome-assembly',
    title: 'Genome Assembly',
    description: 'High-quality long reads for de novo assembly',
    values: { threads: 16, minLength: 5000, qualityThreshold: 10, complexityThreshold: 45 },
  },
  {
    name: 'amplicon',
    title: 'Amplicon Sequencing',
    description: 'Targeted amplicons; combine with --adapter-fasta for adapter removal',
    values: { threads: 4, minLength: 800, qualityThreshold: 12, complexityThreshold: 35 },
  },
  {
    name: 'quick-check',
    title: 'Quick Quality Check',
    description: 'Fast processing for an initial data assessment',
    values: { threads: 4, minLength: 100, qualityThreshold: 5, complexityThreshold: 20, trimPolyX: false },
  },
  {
    name: 'high-stringency',
    title: 'High-Stringency Filtering',
    description: 'Maximum filtering for critical applications',
    values: { threads: 8, minLength: 10000, qualityThreshold: 15, complexityThreshold: 50 },
  },
  {
    name: 'minimal',
    title: 'Minimal Processing',
    description: 'Basic length filtering only, no reports',
    values: {
      threads: 2, minLength: 200, qualityThreshold: 3, complexityThreshold: 10,
      trimPolyG: false, trimPolyX: false, generateReport: false,
    },
  },
];

/**
 * Looks up a preset by name.
 *
 * @throws {ConfigurationError} With EXIT_INVALID_ARGS when the name is unknown.
 */
export function getPreset(name: string): RunPreset {
  const preset = RUN_PRESETS.find((p) => p.name === name);
  if (!preset) {
    const known = RUN_PRESETS.map((p) => p.name).join(', ');
    throw new ConfigurationError(`Invalid arguments: unknown preset "${name}" (available: ${known})`, EXIT_INVALID_ARGS);
  }
  return preset;
}

/**
 * Layers explicit values over a preset. Only defined values override, so an option the
 * user did not pass keeps the preset's value (or the built-in default when there is no preset).
 */
export function mergePresetValues(preset: RunPreset | undefined, explicit: RunConfigInput): RunConfigInput {
  const base = preset?.values ?? {};
  return {
    inputDir: explicit.inputDir,
    outputDir: explicit.outputDir,
    adapterFasta: explicit.adapterFasta,
    jobs: explicit.jobs,
    recursive: explicit.recursive,
    threads: explicit.threads ?? base.threads,
    minLength: explicit.minLength ?? base.minLength,
    qualityThreshold: explicit.qualityThreshold ?? base.qualityThreshold,
    complexityThreshold: explicit.complexityThreshold ?? base.complexityThreshold,
    trimPolyG: explicit.trimPolyG ?? base.trimPolyG,
    trimPolyX: explicit.trimPolyX ?? base.trimPolyX,
    generateReport: explicit.generateReport ?? base.generateReport,
  };
}
