import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_NUM_PER_SPLIT } from './config/splitConfig';
import { SplitError } from './errors/splitError';
import { createSplitQueue, INDEX_FILE, PARTS_DIR } from './jobs/splitQueue';
import type { SplitQueue } from './jobs/splitQueue';
import { createUploadMiddleware, UploadError } from './middleware/upload';

export interface AppOptions {
  storageDir: string;
  maxUploadBytes: number;
  resultTtlMs?: number;
}

const JOBS_DIR = 'jobs';
const UPLOADS_DIR = 'uploads';

/**
 * Remove job and upload directories older than `maxAgeMs` (left behind by
 * crashes or expired jobs).
 */
export function cleanupOldStorageFiles(storageDir: string, maxAgeMs: number): number {
  let cleanedCount = 0;
  const now = Date.now();

  for (const sub of [JOBS_DIR, UPLOADS_DIR]) {
    const dir = path.join(storageDir, sub);
    try {
      if (!fs.existsSync(dir)) continue;

      for (const entry of fs.readdirSync(dir)) {
        const entryPath = path.join(dir, entry);
        try {
          const stats = fs.statSync(entryPath);
          if (now - stats.mtimeMs > maxAgeMs) {
            fs.rmSync(entryPath, { recursive: true, force: true });
            cleanedCount++;
          }
        } catch (err) {
          console.error(`[Cleanup] Error processing ${entryPath}:`, err);
        }
      }
    } catch (err) {
      console.error(`[Cleanup] Error cleaning storage directory ${dir}:`, err);
    }
  }

  if (cleanedCount > 0) {
    console.log(`[Cleanup] Removed ${cleanedCount} old entr${cleanedCount === 1 ? 'y' : 'ies'} from storage`);
  }
  return cleanedCount;
}

function parseNumPerSplit(raw: unknown): number {
  if (raw === undefined || raw === '') return DEFAULT_NUM_PER_SPLIT;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw) || parseInt(raw, 10) < 1) {
    throw new SplitError('INVALID_OPTIONS', 'numPerSplit must be a positive integer');
  }
  return parseInt(raw, 10);
}

export function createApp(options: AppOptions): { app: Express; splitQueue: SplitQueue } {
  const app = express();
  // res.sendFile takes absolute paths only
  const storageDir = path.resolve(options.storageDir);
  const jobsRoot = path.join(storageDir, JOBS_DIR);
  const uploadMiddleware = createUploadMiddleware(path.join(storageDir, UPLOADS_DIR), options.maxUploadBytes);
  const splitQueue = createSplitQueue(options.resultTtlMs);

  app.use(express.json());

  app.get('/health', (req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      queue: {
        length: splitQueue.queue.length(),
        running: splitQueue.queue.running(),
        idle: splitQueue.queue.idle(),
      },
    });
  });

  /**
   * API: Upload a CSV file and split it (returns job ID for polling)
   */
  app.post('/api/split', uploadMiddleware, (req: Request, res: Response, next: NextFunction): void => {
    const file = req.file;
    if (!file) {
      next(new UploadError('No file uploaded'));
      return;
    }

    let numPerSplit: number;
    try {
      numPerSplit = parseNumPerSplit(req.body?.numPerSplit);
    } catch (error) {
      fs.rmSync(file.path, { force: true });
      next(error);
      return;
    }

    const jobId = `job-${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    console.log(`[API] File uploaded: ${file.path}`);
    console.log(`[API] Original filename: ${file.originalname}`);
    console.log(`[API] Job ID: ${jobId}`);

    const status = splitQueue.enqueue({
      jobId,
      uploadPath: file.path,
      originalName: file.originalname,
      jobDir: path.join(jobsRoot, jobId),
      numPerSplit,
      generateIndex: req.body?.generateIndex === 'true',
    });

    res.json({
      success: true,
      jobId,
      status: status.status,
      statusUrl: `/api/status/${jobId}`,
      resultUrl: `/api/result/${jobId}`,
    });
  });

  /**
   * API: Check job status
   */
  app.get('/api/status/:jobId', (req: Request, res: Response): void => {
    const job = splitQueue.get(req.params.jobId);

    if (!job) {
      res.status(404).json({ success: false, error: 'Job not found or expired' });
      return;
    }

    res.json({ success: true, job });
  });

  /**
   * API: Get job result (only if completed)
   */
  app.get('/api/result/:jobId', (req: Request, res: Response): void => {
    const job = splitQueue.get(req.params.jobId);

    if (!job) {
      res.status(404).json({ success: false, error: 'Job not found or expired' });
      return;
    }

    if (job.status !== 'completed' || !job.result) {
      res.status(400).json({
        success: false,
        error: `Job is ${job.status}, not completed`,
        status: job.status,
      });
      return;
    }

    res.json({ success: true, result: job.result });
  });

  /**
   * API: Download one split file, or the index
   */
  app.get('/api/result/:jobId/files/:fileName', (req: Request, res: Response, next: NextFunction): void => {
    const { jobId, fileName } = req.params;
    const result = splitQueue.get(jobId)?.result;

    if (!result) {
      res.status(404).json({ success: false, error: 'Job not found or not completed' });
      return;
    }

    const jobDir = path.join(jobsRoot, jobId);
    let filePath: string | undefined;
    if (result.files.some((file) => file.name === fileName)) {
      filePath = path.join(jobDir, PARTS_DIR, fileName);
    } else if (result.hasIndex && fileName === INDEX_FILE) {
      filePath = path.join(jobDir, INDEX_FILE);
    }

    if (!filePath) {
      res.status(404).json({ success: false, error: 'File not found' });
      return;
    }

    res.sendFile(filePath, (err) => {
      if (err) next(err);
    });
  });

  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    console.error('Error:', err);
    const status = err instanceof SplitError || err instanceof UploadError ? 400 : 500;
    res.status(status).json({ error: err.message || 'Internal server error' });
  });

  return { app, splitQueue };
}
