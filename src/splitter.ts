import { promises as fsp } from 'fs';
import type { FileHandle } from 'fs/promises';
import { DEFAULT_NUM_PER_SPLIT, READ_SIZE } from './config/splitConfig';
import { SplitError } from './errors/splitError';
import { IndexWriter } from './output/indexWriter';
import { SplitWriter } from './output/splitWriter';
import type { SplitOptions, SplitSummary } from './types/split';

function validateOptions(options: SplitOptions): { numPerSplit: number; readSize: number } {
  const numPerSplit = options.numPerSplit ?? DEFAULT_NUM_PER_SPLIT;
  const readSize = options.readSize ?? READ_SIZE;

  if (!Number.isInteger(numPerSplit) || numPerSplit < 1) {
    throw new SplitError('INVALID_OPTIONS', `num_per_split must be a positive integer, got ${numPerSplit}`);
  }
  if (!Number.isInteger(readSize) || readSize < 1) {
    throw new SplitError('INVALID_OPTIONS', `read size must be a positive integer, got ${readSize}`);
  }
  return { numPerSplit, readSize };
}

function inputError(inputPath: string, err: unknown): SplitError {
  const reason = err instanceof Error ? err.message : 'Unknown error';
  return new SplitError('INPUT_UNREADABLE', `Cannot read input: ${reason}`, { path: inputPath, cause: err });
}

async function openInput(inputPath: string): Promise<FileHandle> {
  try {
    return await fsp.open(inputPath, 'r');
  } catch (err) {
    throw inputError(inputPath, err);
  }
}

async function readBlock(input: FileHandle, inputPath: string, buffer: Buffer): Promise<number> {
  try {
    const { bytesRead } = await input.read(buffer, 0, buffer.length, null);
    return bytesRead;
  } catch (err) {
    throw inputError(inputPath, err);
  }
}

/**
 * Split `inputPath` into files of `numPerSplit` complete records each.
 *
 * The input is read in blocks and scanned in a single pass; the first split
 * file is created with the first non-empty block, so an empty input produces
 * no split files. The index (when requested) is created before anything is
 * read, so an existing index aborts the run before any output exists. The
 * input, index and output handles are closed on every exit path.
 */
export async function splitFile(options: SplitOptions): Promise<SplitSummary> {
  const { numPerSplit, readSize } = validateOptions(options);
  const input = await openInput(options.inputPath);
  let index: IndexWriter | undefined;
  let writer: SplitWriter | undefined;

  try {
    if (options.indexPath) {
      index = await IndexWriter.create(options.indexPath);
    }
    // Reused for every read; the writer flushes a chunk before write() resolves
    const buffer = Buffer.alloc(readSize);

    for (;;) {
      const bytesRead = await readBlock(input, options.inputPath, buffer);
      if (bytesRead === 0) break;

      if (!writer) {
        writer = new SplitWriter({
          inputPath: options.inputPath,
          outputDir: options.outputDir,
          numPerSplit,
          index,
          onProgress: options.onProgress,
        });
      }
      await writer.write(buffer.subarray(0, bytesRead));
    }

    await writer?.finish();

    return {
      recordCount: writer?.recordCount ?? 0,
      fileCount: writer?.outputPaths.length ?? 0,
      bytesRead: writer?.bytesRead ?? 0,
      outputPaths: writer?.outputPaths ?? [],
      indexPath: index?.path,
    };
  } finally {
    try {
      await writer?.close();
    } finally {
      try {
        await index?.close();
      } finally {
        await input.close();
      }
    }
  }
}
