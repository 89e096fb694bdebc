import { promises as fsp } from 'fs';
import type { FileHandle } from 'fs/promises';
import { SplitError, isErrnoException } from '../errors/splitError';
import type { IndexEntry } from '../types/split';

/**
 * Sparse record/offset index, one `<record>\t<offset>\n` line per split
 * boundary.
 */
export class IndexWriter {
  private closed = false;

  private constructor(readonly path: string, private readonly handle: FileHandle) {}

  /**
   * Create the index file. An existing file at `indexPath` is fatal: the
   * index is never overwritten or appended to.
   */
  static async create(indexPath: string): Promise<IndexWriter> {
    try {
      const handle = await fsp.open(indexPath, 'wx');
      return new IndexWriter(indexPath, handle);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') {
        throw new SplitError('INDEX_EXISTS', 'Index file already exists', {
          path: indexPath,
          hint: 'Choose a new index path or remove the old index first',
          cause: err,
        });
      }
      throw err;
    }
  }

  async append(entry: IndexEntry): Promise<void> {
    await this.handle.writeFile(formatIndexLine(entry), 'ascii');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

export function formatIndexLine(entry: IndexEntry): string {
  return `${entry.recordNum}\t${entry.byteOffset}\n`;
}

/**
 * Parse the contents of an index file. Blank trailing lines are ignored;
 * anything else that is not two non-negative integers separated by a tab is
 * rejected.
 */
export function parseIndex(text: string): IndexEntry[] {
  const entries: IndexEntry[] = [];
  const lines = text.split('\n');

  lines.forEach((line, i) => {
    if (line === '') return;
    const match = /^(\d+)\t(\d+)$/.exec(line);
    if (!match) {
      throw new Error(`Malformed index line ${i + 1}: ${JSON.stringify(line)}`);
    }
    entries.push({ recordNum: parseInt(match[1], 10), byteOffset: parseInt(match[2], 10) });
  });

  return entries;
}

export async function readIndex(indexPath: string): Promise<IndexEntry[]> {
  return parseIndex(await fsp.readFile(indexPath, 'ascii'));
}

/**
 * Find where to resume scanning the input to reach `recordNum` (1-based):
 * the last indexed boundary strictly before that record, or the start of the
 * file. Records after `entry.recordNum` begin at `entry.byteOffset`.
 */
export function findSeekOffset(entries: IndexEntry[], recordNum: number): IndexEntry {
  let best: IndexEntry = { recordNum: 0, byteOffset: 0 };
  for (const entry of entries) {
    if (entry.recordNum < recordNum && entry.recordNum >= best.recordNum) {
      best = entry;
    }
  }
  return best;
}
