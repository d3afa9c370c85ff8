import fs from 'fs';
import os from 'os';
import path from 'path';

import { DiscoveryError, DuplicateSampleError, NoInputFilesError } from '../errors';
import { EXIT_NO_INPUT } from '../utils/exit-codes';

import { assertUniqueSampleIds, discoverInputFiles, isFastqFileName } from './file-discovery';
import { createSample } from './sample-naming';

async function touch(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, '@r1\nACGT\n+\nIIII\n');
}

describe('isFastqFileName', () => {
  it('should accept the four recognized suffixes', () => {
    expect(isFastqFileName('a.fastq.gz')).toBe(true);
    expect(isFastqFileName('a.fq.gz')).toBe(true);
    expect(isFastqFileName('a.fastq')).toBe(true);
    expect(isFastqFileName('a.fq')).toBe(true);
  });

  it('should reject other names', () => {
    expect(isFastqFileName('a.fasta')).toBe(false);
    expect(isFastqFileName('a.fastq.bz2')).toBe(false);
    expect(isFastqFileName('a.FASTQ')).toBe(false);
    expect(isFastqFileName('.fq')).toBe(false);
    expect(isFastqFileName('notes.txt')).toBe(false);
  });
});

describe('discoverInputFiles', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'discovery-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  it('should find one file per recognized suffix, sorted by path', async () => {
    await touch(path.join(tmpDir, 'd.fq'));
    await touch(path.join(tmpDir, 'b.fq.gz'));
    await touch(path.join(tmpDir, 'a.fastq.gz'));
    await touch(path.join(tmpDir, 'c.fastq'));
    await touch(path.join(tmpDir, 'readme.txt'));

    const files = await discoverInputFiles(tmpDir);

    expect(files).toEqual([
      path.join(tmpDir, 'a.fastq.gz'),
      path.join(tmpDir, 'b.fq.gz'),
      path.join(tmpDir, 'c.fastq'),
      path.join(tmpDir, 'd.fq'),
    ]);
  });

  it('should descend into subdirectories by default', async () => {
    await touch(path.join(tmpDir, 'top.fastq'));
    await touch(path.join(tmpDir, 'run1', 'barcode01', 'inner.fq.gz'));

    const files = await discoverInputFiles(tmpDir);

    expect(files).toEqual([
      path.join(tmpDir, 'run1', 'barcode01', 'inner.fq.gz'),
      path.join(tmpDir, 'top.fastq'),
    ]);
  });

  it('should scan only the top level when recursion is off', async () => {
    await touch(path.join(tmpDir, 'top.fastq'));
    await touch(path.join(tmpDir, 'run1', 'inner.fq.gz'));

    const files = await discoverInputFiles(tmpDir, { recursive: false });

    expect(files).toEqual([path.join(tmpDir, 'top.fastq')]);
  });

  it('should not enter excluded subdirectories', async () => {
    await touch(path.join(tmpDir, 'a.fastq'));
    await touch(path.join(tmpDir, 'results', 'trimmed', 'a_trimmed.fastq.gz'));
    await touch(path.join(tmpDir, 'run1', 'b.fq'));

    const files = await discoverInputFiles(tmpDir, { exclude: [path.join(tmpDir, 'results')] });

    expect(files).toEqual([path.join(tmpDir, 'a.fastq'), path.join(tmpDir, 'run1', 'b.fq')]);
  });

  it('should still scan the root when it is listed as excluded', async () => {
    await touch(path.join(tmpDir, 'a.fastq'));

    await expect(discoverInputFiles(tmpDir, { exclude: [tmpDir] })).resolves.toEqual([path.join(tmpDir, 'a.fastq')]);
  });

  it('should throw NoInputFilesError for a directory without FASTQ files', async () => {
    await touch(path.join(tmpDir, 'reference.fasta'));

    const promise = discoverInputFiles(tmpDir);

    await expect(promise).rejects.toBeInstanceOf(NoInputFilesError);
    await expect(discoverInputFiles(tmpDir)).rejects.toThrow(`No FASTQ files found in input directory: ${tmpDir}`);
  });

  it('should throw a DiscoveryError with the no-input exit code for a missing root', async () => {
    const missing = path.join(tmpDir, 'missing');

    await expect(discoverInputFiles(missing)).rejects.toBeInstanceOf(DiscoveryError);
    await expect(discoverInputFiles(missing)).rejects.toHaveProperty('code', EXIT_NO_INPUT);
  });

  it('should fail with a DiscoveryError naming an unreadable subdirectory', async () => {
    await touch(path.join(tmpDir, 'a.fastq'));
    await touch(path.join(tmpDir, 'locked', 'b.fastq'));
    const locked = path.join(tmpDir, 'locked');
    const realReaddir = fs.promises.readdir.bind(fs.promises);
    const readdirSpy = jest.spyOn(fs.promises, 'readdir').mockImplementation(async (dir, options) => {
      if (String(dir) === locked) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${locked}'`), { code: 'EACCES' });
      }
      return realReaddir(dir, options);
    });

    try {
      const promise = discoverInputFiles(tmpDir);

      await expect(promise).rejects.toBeInstanceOf(DiscoveryError);
      await expect(promise).rejects.toThrow(`Cannot read directory ${locked}: permission denied`);
      expect(readdirSpy).toHaveBeenCalledWith(locked, { withFileTypes: true });
    } finally {
      readdirSpy.mockRestore();
    }
  });
});

describe('assertUniqueSampleIds', () => {
  it('should accept distinct identifiers', () => {
    const samples = [createSample('/in/a.fastq', '/out'), createSample('/in/b.fastq', '/out')];
    expect(() => assertUniqueSampleIds(samples)).not.toThrow();
  });

  it('should reject identifiers shared by several files', () => {
    const samples = [
      createSample('/in/a.fastq', '/out'),
      createSample('/in/a.fq.gz', '/out'),
      createSample('/in/b.fastq', '/out'),
    ];

    expect(() => assertUniqueSampleIds(samples)).toThrow(DuplicateSampleError);
    expect(() => assertUniqueSampleIds(samples)).toThrow('Duplicate sample identifiers: a (/in/a.fastq, /in/a.fq.gz)');
  });
});
