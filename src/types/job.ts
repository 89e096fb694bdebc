/**
 * Types for split jobs submitted through the HTTP service.
 */

export type JobState = 'queued' | 'processing' | 'completed' | 'failed';

export interface SplitJob {
  jobId: string;
  /** Where the upload landed */
  uploadPath: string;
  originalName: string;
  /** Job working directory; split files go to `<jobDir>/parts` */
  jobDir: string;
  numPerSplit: number;
  generateIndex: boolean;
}

export interface SplitFileInfo {
  name: string;
  size: number;
}

export interface SplitJobResult {
  recordCount: number;
  fileCount: number;
  bytesRead: number;
  files: SplitFileInfo[];
  hasIndex: boolean;
}

export interface SplitJobStatus {
  id: string;
  status: JobState;
  originalName: string;
  numPerSplit: number;
  /** Records written so far, updated at each rotation */
  current: number;
  result?: SplitJobResult;
  error?: string;
  createdAt: string;
  updatedAt?: string;
  completedAt?: string;
  failedAt?: string;
}
