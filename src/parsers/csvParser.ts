import { parse } from 'csv-parse';
import { mapSeries } from 'async';
import * as fs from 'fs';
import { SplitError } from '../errors/splitError';
import type { VerifiedFile } from '../types/split';

/**
 * Count the records of a CSV file with a full CSV parser.
 *
 * Quoted fields must be closed before the end of the file, so a split that
 * cut a record in half is rejected.
 */
export function countRecords(filePath: string, delimiter: string = ','): Promise<number> {
  return new Promise((resolve, reject) => {
    let count = 0;

    // Only LF ends a record; a CR is field content, as it is for the splitter
    const parser = parse({
      delimiter,
      record_delimiter: '\n',
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: false,
    });

    const stream = fs.createReadStream(filePath);

    parser.on('readable', () => {
      while (parser.read() !== null) {
        count++;
      }
    });

    stream.on('error', (err: Error) => {
      parser.destroy(err);
    });
    parser.on('error', reject);
    parser.on('end', () => resolve(count));

    stream.pipe(parser);
  });
}

/**
 * Re-read every split file and count its records, one file at a time.
 */
export async function verifySplitFiles(paths: string[]): Promise<VerifiedFile[]> {
  return mapSeries<string, VerifiedFile>(paths, async (filePath: string) => {
    try {
      return { path: filePath, recordCount: await countRecords(filePath) };
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'Unknown error';
      throw new SplitError('VERIFY_FAILED', `Split file is not valid CSV: ${reason}`, {
        path: filePath,
        cause: err,
      });
    }
  });
}
