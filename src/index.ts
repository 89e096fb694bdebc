export { scanByte, RecordScanner } from './scanner/recordScanner';
export { SplitWriter } from './output/splitWriter';
export type { SplitWriterOptions } from './output/splitWriter';
export { IndexWriter, formatIndexLine, parseIndex, readIndex, findSeekOffset } from './output/indexWriter';
export { allocateOutputFile, splitFilePath, disambiguatedPath } from './output/pathAllocator';
export type { AllocatedFile } from './output/pathAllocator';
export { splitFile } from './splitter';
export { countRecords, verifySplitFiles } from './parsers/csvParser';
export { SplitError, isErrnoException } from './errors/splitError';
export type { SplitErrorCode } from './errors/splitError';
export type * from './types/split';
