import path from 'path';

/**
 * Runtime configuration, read from the environment once at startup.
 */

// Input is read in blocks of this size (1 MiB by default)
export const READ_SIZE = parseInt(process.env.SPLIT_READ_SIZE || String(1024 * 1024), 10);

export const DEFAULT_NUM_PER_SPLIT = parseInt(process.env.SPLIT_NUM_PER_SPLIT || '100000', 10);

// Zero-padded width of the sequence suffix: data_000001.csv
export const SEQUENCE_WIDTH = 6;

export const PORT = parseInt(process.env.PORT || '3001', 10);
export const STORAGE_DIR = path.resolve(process.env.STORAGE_DIR || 'storage');
export const STORAGE_MAX_AGE_MS = parseInt(process.env.STORAGE_MAX_AGE_MS || '3600000', 10); // 1 hour default
export const UPLOAD_MAX_BYTES = parseInt(process.env.UPLOAD_MAX_BYTES || String(1024 * 1024 * 1024), 10); // 1GB limit

export const VERSION = '0.0.1';
