import type { ScanResult, ScanState } from '../types/split';

const QUOTE = 0x22;
const LF = 0x0a;

/**
 * Advance the quoting state by one byte.
 *
 * Excel-style CSV: fields may be wrapped in "...", which can hold commas and
 * line breaks, and a literal " inside a quoted field is written as "".
 * Only an LF seen outside any quoted field ends a record; CR is ordinary
 * content, so CRLF input ends records at the LF.
 *
 * A quote seen inside a field is ambiguous until the next byte arrives, which
 * is what `endQuote` records. No other lookahead or buffering is needed, so
 * the scanner can be fed one chunk after another.
 */
export function scanByte(state: ScanState, byte: number): ScanResult {
  let current = state;

  if (current === 'endQuote' && byte === QUOTE) {
    // "" inside a quoted field is an escaped quote, not the end of the field
    current = 'literalQuote';
  } else if (current === 'endQuote') {
    // The previous quote closed the field; look at this byte from the top level
    current = 'start';
  }

  if (current === 'literalQuote') {
    return { state: 'inQuote', isRecordEnd: false };
  }
  if (current === 'inQuote') {
    return { state: byte === QUOTE ? 'endQuote' : 'inQuote', isRecordEnd: false };
  }
  if (byte === QUOTE) {
    return { state: 'inQuote', isRecordEnd: false };
  }
  return { state: 'start', isRecordEnd: byte === LF };
}

/**
 * Stateful wrapper around scanByte that keeps the quoting state across
 * chunks for the whole run.
 */
export class RecordScanner {
  private current: ScanState = 'start';

  get state(): ScanState {
    return this.current;
  }

  /** Returns true when `byte` terminates a record */
  push(byte: number): boolean {
    const { state, isRecordEnd } = scanByte(this.current, byte);
    this.current = state;
    return isRecordEnd;
  }

  /**
   * Scan a whole chunk and return the indexes of the bytes that end a record.
   */
  scan(chunk: Uint8Array): number[] {
    const ends: number[] = [];
    for (let i = 0; i < chunk.length; i++) {
      if (this.push(chunk[i])) {
        ends.push(i);
      }
    }
    return ends;
  }
}
