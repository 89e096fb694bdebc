import * as fs from 'fs';
import * as path from 'path';

// Sample data pools; notes deliberately contain commas, quotes and line breaks
const firstNames = ['John', 'Jane', 'Michael', 'Sarah', 'David', 'Emily', 'Chris', 'Jessica', 'Daniel', 'Ashley'];
const lastNames = ['Smith', 'Johnson', 'Williams', 'Brown', 'Jones', 'Garcia', 'Miller', 'Davis', 'Rodriguez', 'Martinez'];
const cities = ['New York', 'Los Angeles', 'Chicago', 'Houston', 'Phoenix', 'Philadelphia', 'San Antonio', 'San Diego'];
const notes = [
  'plain note',
  'shipped, then returned',
  'customer said "fine"',
  'line one\nline two',
  'multi\r\nline, with "quotes"\nand more',
  '',
  '"',
  'ends with newline\n',
];

export interface GenerateOptions {
  seed?: number;
  /** Use CRLF record terminators (default: LF) */
  crlf?: boolean;
  /** Leave the final record without a terminator */
  omitFinalTerminator?: boolean;
}

/**
 * Small deterministic PRNG (mulberry32) so generated files are reproducible.
 */
export function createRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function escapeCSV(value: string): string {
  // If the value contains comma, quote, or a line break, wrap it in quotes
  if (/[,"\r\n]/.test(value)) {
    // Escape quotes by doubling them
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Build the records (header excluded) as CSV lines without terminators.
 */
export function generateRecords(numRecords: number, seed: number = 1): string[] {
  const random = createRandom(seed);
  const pick = <T>(arr: T[]): T => arr[Math.floor(random() * arr.length)];
  const lines: string[] = [];

  for (let id = 1; id <= numRecords; id++) {
    const firstName = pick(firstNames);
    const lastName = pick(lastNames);
    const record = [
      String(id),
      firstName,
      lastName,
      `${firstName.toLowerCase()}.${lastName.toLowerCase()}@example.com`,
      pick(cities),
      (random() * 1000).toFixed(2),
      pick(notes),
    ];
    lines.push(record.map(escapeCSV).join(','));
  }

  return lines;
}

export const HEADERS = ['id', 'first_name', 'last_name', 'email', 'city', 'price', 'notes'];

/**
 * Full CSV text: a header line followed by `numRecords` records.
 */
export function buildCsv(numRecords: number, options: GenerateOptions = {}): string {
  const terminator = options.crlf ? '\r\n' : '\n';
  const lines = [HEADERS.join(','), ...generateRecords(numRecords, options.seed)];
  const body = lines.join(terminator);
  return options.omitFinalTerminator ? body : body + terminator;
}

function generateCSVFile(numRecords: number, outputPath: string, options: GenerateOptions): void {
  const startTime = Date.now();
  console.log(`Generating CSV file with ${numRecords.toLocaleString()} records...`);

  fs.writeFileSync(outputPath, buildCsv(numRecords, options));

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  const fileSizeMB = (fs.statSync(outputPath).size / (1024 * 1024)).toFixed(1);
  console.log(`\n✓ Generated CSV file:`);
  console.log(`  Path: ${outputPath}`);
  console.log(`  Records: ${numRecords.toLocaleString()} (+1 header)`);
  console.log(`  Size: ${fileSizeMB} MB`);
  console.log(`  Time: ${elapsed}s`);
}

if (require.main === module) {
  const args = process.argv.slice(2);
  const numRecords = args[0] ? parseInt(args[0], 10) : 100000;
  const crlf = args.includes('--crlf');

  if (isNaN(numRecords) || numRecords < 1) {
    console.error('Error: Invalid number of records');
    console.error('Usage: npm run generate-csv -- <num_records> [--crlf]');
    process.exit(1);
  }

  generateCSVFile(numRecords, path.join(__dirname, `sample-${numRecords}.csv`), { crlf, seed: numRecords });
}
