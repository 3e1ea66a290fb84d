/**
 * Job domain entities
 */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

/**
 * Artifact locations of one job, all under output/<job-basename>/
 */
export interface JobPaths {
  inputFile: string;
  outputFolder: string;
  inputSnapshotFile: string;
  completedFile: string;
  logFile: string;
}

export interface JobSummary {
  jobName: string;
  numberQueries: number;
  succeeded: number;
  failed: number;
  durationMs: number;
  avgQuerySeconds: number;
}

/**
 * Watcher bookkeeping for one discovered job file
 */
export interface JobEntry {
  fileName: string;
  status: JobStatus;
  discoveredAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  numberQueries?: number;
  estimatedTotalSeconds?: number | null;
  summary?: JobSummary;
  error?: string;
}
