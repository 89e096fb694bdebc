import multer from 'multer';
import type { Request, RequestHandler } from 'express';
import * as path from 'path';
import * as fs from 'fs';

export const UPLOAD_PREFIX = 'split-upload-';

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

/**
 * File filter to accept CSV and TXT files
 */
const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  const allowedMimeTypes = [
    'text/csv',
    'text/plain',
    'application/csv',
    'application/vnd.ms-excel', // Some systems report CSV as this
  ];

  const allowedExtensions = ['.csv', '.txt'];
  const ext = path.extname(file.originalname).toLowerCase();

  if (allowedMimeTypes.includes(file.mimetype) || allowedExtensions.includes(ext)) {
    cb(null, true);
  } else {
    cb(new UploadError('Only CSV and TXT files are allowed'));
  }
};

/**
 * Express middleware storing the `datafile` field under `uploadDir`.
 * Uploads keep their original extension so split files inherit it.
 */
export function createUploadMiddleware(uploadDir: string, maxBytes: number): RequestHandler {
  fs.mkdirSync(uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      cb(null, uploadDir);
    },
    filename: (req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      const ext = path.extname(file.originalname).toLowerCase() || '.csv';
      cb(null, UPLOAD_PREFIX + uniqueSuffix + ext);
    },
  });

  const upload = multer({
    storage,
    fileFilter,
    limits: { fileSize: maxBytes },
  }).single('datafile');

  return (req, res, next) => {
    upload(req, res, (err: unknown) => {
      if (err) {
        return next(err instanceof multer.MulterError ? new UploadError(err.message) : err);
      }
      if (!req.file) {
        return next(new UploadError('No file uploaded'));
      }
      next();
    });
  };
}
