import { queue as asyncQueue } from 'async';
import type { QueueObject } from 'async';
import * as fs from 'fs';
import * as path from 'path';
import { splitFile } from '../splitter';
import type { SplitJob, SplitJobResult, SplitJobStatus } from '../types/job';

export const PARTS_DIR = 'parts';
export const INDEX_FILE = 'index.tsv';

/**
 * Run one split job: move the upload into the job directory under its
 * original name, split it into `<jobDir>/parts`, then delete the input.
 */
export async function processSplitJob(
  job: SplitJob,
  onRecords: (current: number) => void = () => {}
): Promise<SplitJobResult> {
  const partsDir = path.join(job.jobDir, PARTS_DIR);
  const inputPath = path.join(job.jobDir, path.basename(job.originalName));
  fs.mkdirSync(partsDir, { recursive: true });

  try {
    fs.renameSync(job.uploadPath, inputPath);
    console.log(`[Split] Processing ${job.originalName} (${job.numPerSplit} records per file)`);

    const summary = await splitFile({
      inputPath,
      outputDir: partsDir,
      numPerSplit: job.numPerSplit,
      indexPath: job.generateIndex ? path.join(job.jobDir, INDEX_FILE) : undefined,
      onProgress: ({ recordNum }) => onRecords(recordNum),
    });

    console.log(`[Split] Processed ${summary.recordCount.toLocaleString()} records into ${summary.fileCount} files`);

    return {
      recordCount: summary.recordCount,
      fileCount: summary.fileCount,
      bytesRead: summary.bytesRead,
      files: summary.outputPaths.map((outputPath) => ({
        name: path.basename(outputPath),
        size: fs.statSync(outputPath).size,
      })),
      hasIndex: summary.indexPath !== undefined,
    };
  } finally {
    // Clean up the uploaded input (always executes, even on error)
    for (const leftover of [job.uploadPath, inputPath]) {
      if (fs.existsSync(leftover)) {
        try {
          fs.unlinkSync(leftover);
          console.log(`[Cleanup] Deleted input file: ${leftover}`);
        } catch (unlinkError) {
          console.error('[Cleanup] Error deleting input file:', unlinkError);
        }
      }
    }
  }
}

export interface SplitQueue {
  readonly queue: QueueObject<SplitJob>;
  enqueue(job: SplitJob): SplitJobStatus;
  get(jobId: string): SplitJobStatus | undefined;
}

/**
 * Queue that processes one file at a time and keeps job status in memory
 * for `resultTtlMs`.
 */
export function createSplitQueue(resultTtlMs: number = 3600000): SplitQueue {
  const jobs = new Map<string, SplitJobStatus>();

  const update = (jobId: string, updates: Partial<SplitJobStatus>): void => {
    const current = jobs.get(jobId);
    if (!current) return;
    jobs.set(jobId, { ...current, ...updates, updatedAt: new Date().toISOString() });
  };

  const queue: QueueObject<SplitJob> = asyncQueue(async (job: SplitJob) => {
    console.log(`[Queue] Starting ${job.jobId} (queue length: ${queue.length()}, running: ${queue.running()})`);
    update(job.jobId, { status: 'processing' });

    try {
      const result = await processSplitJob(job, (current) => update(job.jobId, { current }));
      update(job.jobId, {
        status: 'completed',
        current: result.recordCount,
        result,
        completedAt: new Date().toISOString(),
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error(`[Queue] Job ${job.jobId} failed:`, errorMessage);
      update(job.jobId, { status: 'failed', error: errorMessage, failedAt: new Date().toISOString() });
    }
  }, 1); // concurrency = 1 (one file at a time)

  queue.drain(() => {
    console.log('[Queue] All jobs processed, queue is now empty');
  });

  return {
    queue,
    enqueue(job: SplitJob): SplitJobStatus {
      const status: SplitJobStatus = {
        id: job.jobId,
        status: 'queued',
        originalName: job.originalName,
        numPerSplit: job.numPerSplit,
        current: 0,
        createdAt: new Date().toISOString(),
      };
      jobs.set(job.jobId, status);

      // Expire the status and the job's files together
      setTimeout(() => {
        jobs.delete(job.jobId);
        try {
          fs.rmSync(job.jobDir, { recursive: true, force: true });
          console.log(`[Queue] Cleaned up job result: ${job.jobId}`);
        } catch (err) {
          console.error(`[Cleanup] Error deleting job directory ${job.jobDir}:`, err);
        }
      }, resultTtlMs).unref();

      // Resolves once the worker is done; failures are recorded on the job
      void queue.push(job);
      return status;
    },
    get(jobId: string): SplitJobStatus | undefined {
      return jobs.get(jobId);
    },
  };
}
