import type { FileHandle } from 'fs/promises';
import { RecordScanner } from '../scanner/recordScanner';
import { allocateOutputFile } from './pathAllocator';
import type { IndexWriter } from './indexWriter';
import type { ProgressCallback } from '../types/split';

const LF = 0x0a;

export interface SplitWriterOptions {
  inputPath: string;
  outputDir?: string;
  numPerSplit: number;
  index?: IndexWriter;
  onProgress?: ProgressCallback;
}

/**
 * Writes the input bytes into numbered split files, rotating to a new file
 * after every `numPerSplit` records. Only one output file is open at a time.
 *
 * Bytes of a chunk are buffered as slices of that chunk and written out at
 * each rotation and at the end of the chunk, so the caller may reuse the
 * chunk's memory once `write` resolves.
 */
export class SplitWriter {
  private readonly scanner = new RecordScanner();
  private output: FileHandle | null = null;
  private outputPath = '';
  private pending: Uint8Array[] = [];
  private readonly paths: string[] = [];
  private recordNum = 0;
  private fileSeq = 0;
  private bytesIn = 0;
  // Bytes seen since the last record terminator
  private tailLength = 0;
  private lastByte = -1;
  private finished = false;

  constructor(private readonly options: SplitWriterOptions) {}

  get recordCount(): number {
    return this.recordNum;
  }

  get bytesRead(): number {
    return this.bytesIn;
  }

  get outputPaths(): string[] {
    return [...this.paths];
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    if (!this.output) {
      await this.openNext();
    }

    const { numPerSplit, index } = this.options;
    let segmentStart = 0;
    let lastRecordEnd = -1;

    for (let i = 0; i < chunk.length; i++) {
      if (!this.scanner.push(chunk[i])) continue;

      this.recordNum++;
      lastRecordEnd = i;
      if (this.recordNum % numPerSplit !== 0) continue;

      const byteOffset = this.bytesIn + i + 1;
      if (index) {
        await index.append({ recordNum: this.recordNum, byteOffset });
      }
      this.pending.push(chunk.subarray(segmentStart, i + 1));
      segmentStart = i + 1;

      const completedPath = this.outputPath;
      await this.rotate();
      this.options.onProgress?.({
        recordNum: this.recordNum,
        fileSeq: this.fileSeq,
        byteOffset,
        completedPath,
      });
    }

    if (segmentStart < chunk.length) {
      this.pending.push(chunk.subarray(segmentStart));
    }
    this.tailLength = lastRecordEnd < 0 ? this.tailLength + chunk.length : chunk.length - lastRecordEnd - 1;
    await this.flush();

    this.bytesIn += chunk.length;
    this.lastByte = chunk[chunk.length - 1];
  }

  /**
   * Flush the remaining bytes and close the current file. A trailing record
   * without a final LF is counted here.
   */
  async finish(): Promise<void> {
    if (this.finished) return;
    this.finished = true;

    if (this.tailLength > 0 && this.lastByte !== LF) {
      this.recordNum++;
    }
    try {
      await this.flush();
    } finally {
      await this.closeOutput();
    }
  }

  /**
   * Release the open file without counting the tail; used on error paths.
   */
  async close(): Promise<void> {
    this.finished = true;
    await this.closeOutput();
  }

  private async flush(): Promise<void> {
    if (this.pending.length === 0 || !this.output) return;
    const data = Buffer.concat(this.pending);
    this.pending = [];
    // writeFile keeps writing from the current position until all of data is out
    await this.output.writeFile(data);
  }

  private async rotate(): Promise<void> {
    await this.flush();
    await this.closeOutput();
    await this.openNext();
  }

  private async openNext(): Promise<void> {
    this.fileSeq++;
    const allocated = await allocateOutputFile(this.options.inputPath, this.options.outputDir, this.fileSeq);
    this.output = allocated.handle;
    this.outputPath = allocated.path;
    this.paths.push(allocated.path);
  }

  private async closeOutput(): Promise<void> {
    const output = this.output;
    if (!output) return;
    this.output = null;
    await output.close();
  }
}
