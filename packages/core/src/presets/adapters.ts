import { ConfigurationError } from '../errors';
import { EXIT_INVALID_ARGS } from '../utils/exit-codes';

/** String literal constants for adapter sets */
export const ADAPTER_PLATFORMS = {
  NANOPORE: 'nanopore',
  PACBIO: 'pacbio',
  PCR: 'pcr',
} as const;

/** Union type of all adapter sets */
export type AdapterPlatform = (typeof ADAPTER_PLATFORMS)[keyof typeof ADAPTER_PLATFORMS];

export interface AdapterSequence {
  name: string;
  sequence: string;
}

/** Common adapter and primer sequences, usable as an `--adapter-fasta` starting point. */
export const BUILT_IN_ADAPTERS: Record<AdapterPlatform, readonly AdapterSequence[]> = {
  [ADAPTER_PLATFORMS.NANOPORE]: [
    { name: 'ONT_adapter1', sequence: 'AATGTACTTCGTTCAGTTACGTATTGCT' },
    { name: 'ONT_adapter2', sequence: 'GCAATACGTAACTGAACGAAGT' },
    { name: 'ONT_barcoding_adapter', sequence: 'AAGAAAGTTGTCGGTGTCTTTGTG' },
  ],
  [ADAPTER_PLATFORMS.PACBIO]: [
    { name: 'PacBio_adapter1', sequence: 'ATCTCTCTCTTTTCCTCCTCCTCCGTTGTTGTTGTTGAGAGAGAT' },
    { name: 'PacBio_adapter2', sequence: 'ATCTCTCTCAACAACAACGGAGGAGGAGGAAAAGAGAGAGAT' },
  ],
  [ADAPTER_PLATFORMS.PCR]: [
    { name: 'PCR_primer_F', sequence: 'GTTTCCCAGTCACGATA' },
    { name: 'PCR_primer_R', sequence: 'TATCGTCACGAGTTCCC' },
  ],
};

function isAdapterPlatform(value: string): value is AdapterPlatform {
  return Object.values<string>(ADAPTER_PLATFORMS).includes(value);
}

/**
 * Renders adapter sequences as FASTA. Without a platform every built-in set is included.
 *
 * @throws {ConfigurationError} With EXIT_INVALID_ARGS for an unknown platform.
 */
export function formatAdapterFasta(platform?: string): string {
  let platforms: AdapterPlatform[];
  if (platform === undefined) {
    platforms = Object.values(ADAPTER_PLATFORMS);
  } else if (isAdapterPlatform(platform)) {
    platforms = [platform];
  } else {
    const known = Object.values(ADAPTER_PLATFORMS).join(', ');
    throw new ConfigurationError(`Invalid arguments: unknown adapter platform "${platform}" (available: ${known})`, EXIT_INVALID_ARGS);
  }

  return platforms
    .flatMap((p) => BUILT_IN_ADAPTERS[p])
    .map((adapter) => `>${adapter.name}\n${adapter.sequence}\n`)
    .join('');
}
