import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { allocateOutputFile, disambiguatedPath, splitFilePath } from '../../src/output/pathAllocator';

describe('splitFilePath', () => {
  it('places the split beside the input', () => {
    expect(splitFilePath('/data/big.csv', undefined, 1)).toBe('/data/big_000001.csv');
  });

  it('uses the input base name inside the output directory', () => {
    expect(splitFilePath('/data/big.csv', '/out', 42)).toBe('/out/big_000042.csv');
  });

  it('keeps only the last extension', () => {
    expect(splitFilePath('/data/archive.tar.csv', undefined, 3)).toBe('/data/archive.tar_000003.csv');
  });

  it('handles inputs without an extension', () => {
    expect(splitFilePath('/data/records', undefined, 7)).toBe('/data/records_000007');
  });

  it('widens past six digits instead of truncating', () => {
    expect(splitFilePath('/data/big.csv', undefined, 1234567)).toBe('/data/big_1234567.csv');
  });
});

describe('disambiguatedPath', () => {
  it('appends the attempt number before the extension', () => {
    expect(disambiguatedPath('/out/big_000001.csv', 2)).toBe('/out/big_000001_2.csv');
  });
});

describe('allocateOutputFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-split-alloc-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates a new empty file', async () => {
    const input = path.join(tmpDir, 'data.csv');
    const { path: outputPath, handle } = await allocateOutputFile(input, undefined, 1);
    await handle.close();

    expect(outputPath).toBe(path.join(tmpDir, 'data_000001.csv'));
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe('');
  });

  it('never touches an existing file and retries with a suffix', async () => {
    const input = path.join(tmpDir, 'data.csv');
    fs.writeFileSync(path.join(tmpDir, 'data_000001.csv'), 'keep me');
    fs.writeFileSync(path.join(tmpDir, 'data_000001_1.csv'), 'keep me too');

    const { path: outputPath, handle } = await allocateOutputFile(input, undefined, 1);
    await handle.close();

    expect(outputPath).toBe(path.join(tmpDir, 'data_000001_2.csv'));
    expect(fs.readFileSync(path.join(tmpDir, 'data_000001.csv'), 'utf-8')).toBe('keep me');
    expect(fs.readFileSync(path.join(tmpDir, 'data_000001_1.csv'), 'utf-8')).toBe('keep me too');
  });

  it('propagates errors other than a name collision', async () => {
    const input = path.join(tmpDir, 'data.csv');
    await expect(allocateOutputFile(input, path.join(tmpDir, 'missing'), 1)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
