import fs from 'fs';
import os from 'os';
import path from 'path';

import { EXIT_INVALID_ARGS, getPreset } from 'longread-qc-core';

import { runCli } from '../index';

import { describePresetValues, formatPresetList } from './presets';

describe('CLI presets and adapters commands', () => {
  let stdoutSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function stdoutText(): string {
    return stdoutSpy.mock.calls.map((call) => String(call[0])).join('');
  }

  beforeEach(() => {
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe('describePresetValues', () => {
    it('should list numeric values and disabled features', () => {
      expect(describePresetValues(getPreset('minimal')))
        .toBe('threads=2, min-length=200, quality=3, complexity=10, no poly-G, no poly-X, no reports');
    });
  });

  describe('formatPresetList', () => {
    it('should render name, title, description and values for each preset', () => {
      expect(formatPresetList([getPreset('nanopore-minion')])).toBe(
        'nanopore-minion - Oxford Nanopore MinION/GridION\n' +
        '  Nanopore long reads with typical quality scores\n' +
        '  threads=8, min-length=1000, quality=7, complexity=30\n'
      );
    });
  });

  it('should print the preset list to stdout', async () => {
    await runCli(['presets']);

    expect(stdoutText()).toBe(formatPresetList());
  });

  it('should print adapter FASTA for a platform', async () => {
    await runCli(['adapters', 'pcr']);

    expect(stdoutText()).toBe('>PCR_primer_F\nGTTTCCCAGTCACGATA\n>PCR_primer_R\nTATCGTCACGAGTTCCC\n');
  });

  it('should write adapter FASTA to a file with --output', async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'adapters-cli-'));
    try {
      const target = path.join(tmpDir, 'refs', 'pacbio.fa');

      await runCli(['adapters', 'pacbio', '-o', target]);

      expect(fs.readFileSync(target, 'utf-8').startsWith('>PacBio_adapter1\n')).toBe(true);
      expect(stdoutSpy).not.toHaveBeenCalled();
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it('should reject an unknown adapter platform as invalid arguments', async () => {
    await expect(runCli(['adapters', 'illumina'])).rejects.toHaveProperty('code', EXIT_INVALID_ARGS);
  });

  it('should print the pipeline version', async () => {
    await runCli(['--version']);

    expect(stdoutText()).toBe('1.0.0\n');
  });
});
