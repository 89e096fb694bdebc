/**
 * csv-split command line
 */

import { parseArgs } from 'util';
import { DEFAULT_NUM_PER_SPLIT, VERSION } from './config/splitConfig';
import { SplitError } from './errors/splitError';
import { verifySplitFiles } from './parsers/csvParser';
import { splitFile } from './splitter';

const HELP = `
csv-split - Split a large Excel-style CSV file on record boundaries

Usage: csv-split [options] <input_csv>

Split files are written next to the input, named <name>_000001.csv,
<name>_000002.csv, ... unless a different output directory is given.
Existing files are never overwritten.

Options:
  -n, --num-per-split <n>      Records per split file (default: ${DEFAULT_NUM_PER_SPLIT});
                               --num_per_split is accepted too
  -o, --output-dir <dir>       Save split files to this directory
  -x, --generate-index <path>  Write "<record>\\t<byte offset>" for every split
                               boundary to this file (must not exist)
      --verify                 Re-parse the split files and check record counts
  -h, --help                   Show this help message
  -v, --version                Show version

Examples:
  csv-split big.csv
  csv-split -n 500000 -o parts/ -x big.idx big.csv
`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

interface CliOptions {
  inputPath: string;
  numPerSplit: number;
  outputDir?: string;
  indexPath?: string;
  verify: boolean;
}

type ParsedCommand = { kind: 'help' } | { kind: 'version' } | { kind: 'split'; options: CliOptions };

/**
 * Parse argv (without the node and script entries). Throws SplitError with
 * code INVALID_OPTIONS on bad usage.
 */
export function parseCommand(argv: string[]): ParsedCommand {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'Unknown error';
    throw new SplitError('INVALID_OPTIONS', reason, { hint: 'Run csv-split --help for usage' });
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (positionals.length !== 1) {
    throw new SplitError('INVALID_OPTIONS', 'Expected exactly one input file', {
      hint: 'Run csv-split --help for usage',
    });
  }

  let numPerSplit = DEFAULT_NUM_PER_SPLIT;
  const raw = values['num-per-split'] ?? values.num_per_split;
  if (raw !== undefined) {
    numPerSplit = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (!(numPerSplit >= 1)) {
      throw new SplitError('INVALID_OPTIONS', `Invalid --num-per-split value: ${raw}`, {
        hint: 'Use a positive whole number of records',
      });
    }
  }

  return {
    kind: 'split',
    options: {
      inputPath: positionals[0],
      numPerSplit,
      outputDir: values['output-dir'],
      indexPath: values['generate-index'],
      verify: values.verify ?? false,
    },
  };
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'num-per-split': { type: 'string', short: 'n' },
      // Older scripts spell it with underscores
      num_per_split: { type: 'string' },
      'output-dir': { type: 'string', short: 'o' },
      'generate-index': { type: 'string', short: 'x' },
      verify: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}

async function runSplit(options: CliOptions): Promise<number> {
  process.stdout.write('Reading... ');

  const summary = await splitFile({
    inputPath: options.inputPath,
    numPerSplit: options.numPerSplit,
    outputDir: options.outputDir,
    indexPath: options.indexPath,
    onProgress: () => {
      process.stdout.write('.');
    },
  });

  console.log(`\nProcessed ${summary.recordCount} records into ${summary.fileCount} files`);

  if (options.verify) {
    const verified = await verifySplitFiles(summary.outputPaths);
    const total = verified.reduce((sum, file) => sum + file.recordCount, 0);
    if (total !== summary.recordCount) {
      console.error(`[Verify] Split files hold ${total} records, expected ${summary.recordCount}`);
      return EXIT_FAILURE;
    }
    console.log(`[Verify] ${verified.length} files OK`);
  }

  return EXIT_OK;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCommand(argv);
  } catch (err) {
    if (err instanceof SplitError) {
      console.error(err.format());
      return EXIT_USAGE;
    }
    throw err;
  }

  if (command.kind === 'help') {
    console.log(HELP);
    return EXIT_OK;
  }
  if (command.kind === 'version') {
    console.log(`csv-split ${VERSION}`);
    return EXIT_OK;
  }

  try {
    return await runSplit(command.options);
  } catch (err) {
    if (err instanceof SplitError) {
      console.error(`\n${err.format()}`);
    } else {
      console.error('\nError:', err instanceof Error ? err.message : err);
    }
    return EXIT_FAILURE;
  }
}
