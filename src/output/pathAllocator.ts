import { promises as fsp } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { SEQUENCE_WIDTH } from '../config/splitConfig';
import { isErrnoException } from '../errors/splitError';

export interface AllocatedFile {
  path: string;
  handle: FileHandle;
}

/**
 * Name of the split file for a sequence number, before any collision suffix.
 *
 * Without an output directory the file goes beside the input
 * (`/data/big.csv` -> `/data/big_000001.csv`); with one, the input's base
 * filename is reused inside that directory.
 */
export function splitFilePath(
  inputPath: string,
  outputDir: string | undefined,
  seq: number,
  width: number = SEQUENCE_WIDTH
): string {
  const ext = path.extname(inputPath);
  const base = path.basename(inputPath, ext);
  const dir = outputDir ?? path.dirname(inputPath);
  return path.join(dir, `${base}_${String(seq).padStart(width, '0')}${ext}`);
}

/**
 * `big_000001.csv` -> `big_000001_<n>.csv`
 */
export function disambiguatedPath(candidate: string, attempt: number): string {
  const ext = path.extname(candidate);
  const stem = candidate.slice(0, candidate.length - ext.length);
  return `${stem}_${attempt}${ext}`;
}

/**
 * Create the next split file. The file is always created exclusively: when
 * the name is taken, `_1`, `_2`, ... is appended until a create succeeds, so an
 * existing file is never opened or truncated.
 */
export async function allocateOutputFile(
  inputPath: string,
  outputDir: string | undefined,
  seq: number
): Promise<AllocatedFile> {
  const candidate = splitFilePath(inputPath, outputDir, seq);
  let outputPath = candidate;
  let retryCount = 0;

  for (;;) {
    try {
      const handle = await fsp.open(outputPath, 'wx');
      return { path: outputPath, handle };
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') {
        throw err;
      }
      retryCount++;
      outputPath = disambiguatedPath(candidate, retryCount);
    }
  }
}
