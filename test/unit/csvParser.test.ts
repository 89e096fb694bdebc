import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { countRecords, verifySplitFiles } from '../../src/parsers/csvParser';
import { splitFile } from '../../src/splitter';
import { buildCsv } from '../../sandbox/generateCsv';

describe('csvParser', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-split-verify-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  describe('countRecords', () => {
    it('counts records with quoted line breaks as one', async () => {
      const filePath = write('a.csv', 'id,note\n1,"two\nlines"\n2,"say ""hi"""\n');
      expect(await countRecords(filePath)).toBe(3);
    });

    it('counts a final record without a terminator', async () => {
      const filePath = write('a.csv', 'id,note\n1,x');
      expect(await countRecords(filePath)).toBe(2);
    });

    it('treats a bare CR as field content', async () => {
      const filePath = write('a.csv', 'a,b\rc,d\re,f\n');
      expect(await countRecords(filePath)).toBe(1);
    });

    it('counts CRLF records once each', async () => {
      const filePath = write('a.csv', 'id,note\r\n1,"x\r\ny"\r\n2,z\r\n');
      expect(await countRecords(filePath)).toBe(3);
    });

    it('rejects an unclosed quote', async () => {
      const filePath = write('a.csv', 'id,note\n1,"never closed\n');
      await expect(countRecords(filePath)).rejects.toThrow();
    });

    it('rejects a missing file', async () => {
      await expect(countRecords(path.join(tmpDir, 'missing.csv'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('verifySplitFiles', () => {
    it('agrees with the splitter on generated data', async () => {
      const inputPath = write('orders.csv', buildCsv(120, { seed: 11 }));
      const summary = await splitFile({ inputPath, numPerSplit: 25 });

      const verified = await verifySplitFiles(summary.outputPaths);

      expect(verified.map((file) => file.path)).toEqual(summary.outputPaths);
      expect(verified.map((file) => file.recordCount)).toEqual([25, 25, 25, 25, 21]);
    });

    it('agrees with the splitter when records hold bare CRs', async () => {
      const inputPath = write('mixed.csv', 'a,b\rc,d\re,f\nx,"1\r2"\n');
      const summary = await splitFile({ inputPath, numPerSplit: 1 });

      const verified = await verifySplitFiles(summary.outputPaths);

      expect(summary.recordCount).toBe(2);
      expect(verified.map((file) => file.recordCount)).toEqual([1, 1, 0]);
    });

    it('names the file that fails to parse', async () => {
      const good = write('good.csv', 'a,b\n');
      const bad = write('bad.csv', 'a,"b\n');

      await expect(verifySplitFiles([good, bad])).rejects.toMatchObject({
        name: 'SplitError',
        code: 'VERIFY_FAILED',
        path: bad,
      });
    });
  });
});
