import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { findSeekOffset, formatIndexLine, IndexWriter, parseIndex, readIndex } from '../../src/output/indexWriter';
import { SplitError } from '../../src/errors/splitError';

describe('IndexWriter', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-split-index-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes one tab-separated line per entry', async () => {
    const indexPath = path.join(tmpDir, 'out.idx');
    const writer = await IndexWriter.create(indexPath);
    await writer.append({ recordNum: 2, byteOffset: 8 });
    await writer.append({ recordNum: 4, byteOffset: 16 });
    await writer.close();
    await writer.close();

    expect(fs.readFileSync(indexPath, 'ascii')).toBe('2\t8\n4\t16\n');
    expect(await readIndex(indexPath)).toEqual([
      { recordNum: 2, byteOffset: 8 },
      { recordNum: 4, byteOffset: 16 },
    ]);
  });

  it('appends every entry after the previous one', async () => {
    const indexPath = path.join(tmpDir, 'out.idx');
    const writer = await IndexWriter.create(indexPath);
    const entries = Array.from({ length: 500 }, (_, i) => ({ recordNum: (i + 1) * 10, byteOffset: (i + 1) * 97 }));
    try {
      for (const entry of entries) {
        await writer.append(entry);
      }
    } finally {
      await writer.close();
    }

    expect(fs.readFileSync(indexPath, 'ascii')).toBe(entries.map(formatIndexLine).join(''));
    expect(await readIndex(indexPath)).toEqual(entries);
  });

  it('refuses to overwrite an existing index', async () => {
    const indexPath = path.join(tmpDir, 'out.idx');
    fs.writeFileSync(indexPath, 'old');

    const error = await IndexWriter.create(indexPath).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SplitError);
    expect(error).toMatchObject({ code: 'INDEX_EXISTS', path: indexPath });
    expect(fs.readFileSync(indexPath, 'utf-8')).toBe('old');
  });
});

describe('formatIndexLine', () => {
  it('formats record and offset', () => {
    expect(formatIndexLine({ recordNum: 100000, byteOffset: 123456789 })).toBe('100000\t123456789\n');
  });
});

describe('parseIndex', () => {
  it('ignores the trailing newline', () => {
    expect(parseIndex('5\t40\n')).toEqual([{ recordNum: 5, byteOffset: 40 }]);
  });

  it('parses an empty index', () => {
    expect(parseIndex('')).toEqual([]);
  });

  it('rejects malformed lines', () => {
    expect(() => parseIndex('5\t40\nfive\tforty\n')).toThrow('Malformed index line 2: "five\\tforty"');
  });
});

describe('findSeekOffset', () => {
  const entries = [
    { recordNum: 2, byteOffset: 10 },
    { recordNum: 4, byteOffset: 25 },
  ];

  it('starts at the beginning for records before the first boundary', () => {
    expect(findSeekOffset(entries, 1)).toEqual({ recordNum: 0, byteOffset: 0 });
    expect(findSeekOffset(entries, 2)).toEqual({ recordNum: 0, byteOffset: 0 });
  });

  it('returns the last boundary before the record', () => {
    expect(findSeekOffset(entries, 3)).toEqual({ recordNum: 2, byteOffset: 10 });
    expect(findSeekOffset(entries, 5)).toEqual({ recordNum: 4, byteOffset: 25 });
    expect(findSeekOffset(entries, 1000)).toEqual({ recordNum: 4, byteOffset: 25 });
  });
});
