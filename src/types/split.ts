/**
 * Types shared by the scanner, the writers and the split driver.
 */

/**
 * Quoting context of the record scanner.
 *
 * `literalQuote` only exists for the duration of a single byte: it marks an
 * escaped `""` pair and collapses straight back into `inQuote`.
 */
export type ScanState = 'start' | 'inQuote' | 'endQuote' | 'literalQuote';

export interface ScanResult {
  state: ScanState;
  isRecordEnd: boolean;
}

export interface IndexEntry {
  recordNum: number;
  /** Absolute input offset of the byte right after the terminating LF */
  byteOffset: number;
}

export interface SplitOptions {
  /** Path of the file to split */
  inputPath: string;
  /** Records per output file (default: 100000) */
  numPerSplit?: number;
  /** Directory for the split files (default: beside the input) */
  outputDir?: string;
  /** Write a record/offset index here; must not exist yet */
  indexPath?: string;
  /** Input block size in bytes (default: 1 MiB) */
  readSize?: number;
  /** Called after every rotation */
  onProgress?: ProgressCallback;
}

export interface SplitSummary {
  recordCount: number;
  /** Files actually created, including a trailing empty one after an exact boundary */
  fileCount: number;
  bytesRead: number;
  outputPaths: string[];
  indexPath?: string;
}

export interface SplitProgress {
  recordNum: number;
  /** Sequence number of the file the rotation opened */
  fileSeq: number;
  byteOffset: number;
  /** Path of the file that was just completed */
  completedPath: string;
}

export type ProgressCallback = (progress: SplitProgress) => void;

export interface VerifiedFile {
  path: string;
  recordCount: number;
}
