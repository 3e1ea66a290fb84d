import path from 'path';
import { Job, JobContext } from '../../application/services/Job.js';
import { PipelineStats } from '../../application/services/PipelineStats.js';
import { JobEntry, JobSummary } from '../../core/entities/Job.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { describeError, formatDuration, formatLogTimestamp } from '../../utils/format.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { listJobFiles } from '../files/jobFiles.js';

export interface JobQueueOptions {
  context: JobContext;
  parallel?: boolean;
  maxConcurrentJobs?: number;
  pollIntervalMs?: number; // 0 re-polls on the next event loop turn
  stats?: PipelineStats;
}

export interface QueueStatistics {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  maxConcurrent: number;
  jobsTimed: number;
  overallAvgQuerySeconds: number | null;
}

/**
 * Watches <dataFolder>/input and runs job files oldest first.
 * One job at a time unless parallel mode is on.
 */
export class JobQueue {
  private entries: JobEntry[] = [];
  private running = new Map<string, Promise<JobSummary>>();
  private stopped = false;
  private failures: unknown[] = [];
  private readonly maxConcurrent: number;
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  readonly stats: PipelineStats;

  /**
   * Callback for when a job completes
   */
  jobCompletedCallback?: (summary: JobSummary) => void;

  constructor(private readonly options: JobQueueOptions) {
    this.maxConcurrent = options.parallel ? Math.max(1, options.maxConcurrentJobs ?? 2) : 1;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.clock = options.context.clock ?? systemClock;
    this.logger = options.context.logger ?? createLogger('JobQueue');
    this.stats = options.stats ?? new PipelineStats();
  }

  get inputFolder(): string {
    return path.join(this.options.context.dataFolder, 'input');
  }

  /**
   * Job files waiting in the input folder, oldest first, excluding running jobs
   */
  async poll(): Promise<string[]> {
    const files = await listJobFiles(this.inputFolder);
    return files.map((file) => file.fileName).filter((fileName) => !this.running.has(fileName));
  }

  /**
   * Run the oldest waiting job, if any. Resolves to null when the queue is empty.
   */
  async processNext(): Promise<JobSummary | null> {
    const [next] = await this.poll();
    if (next === undefined) {
      return null;
    }
    return this.track(next);
  }

  /**
   * Keep polling and running jobs until stop() is called.
   * A job-level error ends the loop (after other running jobs settle) and is rethrown.
   */
  async run(): Promise<void> {
    this.stopped = false;
    this.failures = [];
    this.logger.info(
      `Watching ${this.inputFolder} (${this.maxConcurrent > 1 ? `up to ${this.maxConcurrent} jobs at once` : 'one job at a time'})`
    );

    while (!this.stopped && this.failures.length === 0) {
      if (this.running.size < this.maxConcurrent) {
        const [next] = await this.poll();
        if (next !== undefined) {
          this.track(next).catch((error: unknown) => {
            this.failures.push(error);
          });
          continue;
        }
      }

      if (this.running.size > 0) {
        // a rejected job is already recorded in this.failures by its own handler
        await Promise.race([...this.running.values(), this.idle()]).catch(() => undefined);
      } else {
        await this.idle();
      }
    }

    await Promise.allSettled(this.running.values());
    if (this.failures.length > 0) {
      throw this.failures[0];
    }
    this.logger.info('Stopped watching for jobs');
  }

  /**
   * Stop selecting new jobs; running jobs finish normally
   */
  stop(): void {
    this.stopped = true;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Attach a callback for when jobs complete
   */
  onJobCompleted(callback: (summary: JobSummary) => void): void {
    this.jobCompletedCallback = callback;
  }

  /**
   * Get queue statistics
   */
  getStatistics(): QueueStatistics {
    const count = (status: JobEntry['status']) => this.entries.filter((entry) => entry.status === status).length;
    return {
      total: this.entries.length,
      pending: count('pending'),
      running: count('running'),
      completed: count('completed'),
      failed: count('failed'),
      maxConcurrent: this.maxConcurrent,
      jobsTimed: this.stats.jobCount,
      overallAvgQuerySeconds: this.stats.overallAverage,
    };
  }

  private track(fileName: string): Promise<JobSummary> {
    const task = this.runJob(fileName).finally(() => {
      this.running.delete(fileName);
    });
    this.running.set(fileName, task);
    return task;
  }

  private async runJob(fileName: string): Promise<JobSummary> {
    const entry: JobEntry = { fileName, status: 'pending', discoveredAt: new Date(this.clock.now()) };
    this.entries.push(entry);

    let job: Job;
    try {
      job = await Job.load(fileName, this.options.context);
    } catch (error) {
      entry.status = 'failed';
      entry.error = describeError(error);
      this.logger.error(`Could not load job ${fileName}: ${entry.error}`);
      throw error;
    }

    const estimate = this.stats.estimateSeconds(job.numberQueries);
    entry.status = 'running';
    entry.startedAt = new Date(this.clock.now());
    entry.numberQueries = job.numberQueries;
    entry.estimatedTotalSeconds = estimate;

    const eta = estimate === null ? '[unknown]' : formatDuration(estimate);
    const etaBy =
      estimate === null ? '[unknown]' : formatLogTimestamp(new Date(this.clock.now() + estimate * 1000));
    await job.log.info(
      `Next experiment: ${fileName}, Number of queries: ${job.numberQueries}, ` +
        `Estimated completion time: ${eta}, Estimated completion by: ${etaBy}`
    );

    let summary: JobSummary;
    try {
      summary = await job.process();
    } catch (error) {
      entry.status = 'failed';
      entry.completedAt = new Date(this.clock.now());
      entry.error = describeError(error);
      this.logger.error(`Job ${fileName} failed: ${entry.error}`);
      throw error;
    }

    if (job.numberQueries > 0) {
      this.stats.record(summary.avgQuerySeconds);
    }
    entry.status = 'completed';
    entry.completedAt = new Date(this.clock.now());
    entry.summary = summary;

    const overall = this.stats.overallAverage;
    const remaining = await this.poll();
    await job.log.info(
      `Overall average time per query: ${overall === null ? '[unknown]' : `${overall.toFixed(2)}s`}, ` +
        `Remaining jobs in queue: ${remaining.length}${remaining.length > 0 ? ` (${remaining.join(', ')})` : ''}`
    );

    if (this.jobCompletedCallback) {
      this.jobCompletedCallback(summary);
    }
    return summary;
  }

  private async idle(): Promise<void> {
    if (this.pollIntervalMs > 0) {
      await this.clock.sleep(this.pollIntervalMs);
    } else {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }
}
