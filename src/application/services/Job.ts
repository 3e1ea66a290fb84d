import { promises as fs } from 'fs';
import path from 'path';
import { Bucket, RateLimitOverrides } from '../../core/entities/Bucket.js';
import { JobPaths, JobSummary } from '../../core/entities/Job.js';
import { PromptRecord, parsePromptRecord } from '../../core/entities/PromptRecord.js';
import { JobFileError } from '../../core/errors.js';
import { IBackendRegistry } from '../../core/interfaces/IBackendRegistry.js';
import { JobLog } from '../../infrastructure/files/JobLog.js';
import { JsonlWriter } from '../../infrastructure/files/JsonlWriter.js';
import { JOB_FILE_EXTENSION, moveFile, pathExists, readNumberedLines } from '../../infrastructure/files/jobFiles.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { formatDuration, formatFileTimestamp } from '../../utils/format.js';
import { Logger } from '../../utils/logger.js';
import { planBuckets, summarizeBuckets } from './BucketPlanner.js';
import { BucketDispatcher, BucketOutcome } from './BucketDispatcher.js';

export type JobPhase = 'created' | 'dispatching' | 'completed';

/**
 * Everything a job needs from the pipeline around it
 */
export interface JobContext {
  dataFolder: string;
  maxQueries: number;
  maxAttempts: number;
  rateLimits: RateLimitOverrides;
  registry: IBackendRegistry;
  clock?: Clock;
  logger?: Logger;
}

/**
 * One job file: its records, their rate buckets and the output artifacts.
 * Construct with Job.load(); run with process().
 */
export class Job {
  private phase: JobPhase = 'created';
  readonly log: JobLog;

  private constructor(
    readonly fileName: string,
    readonly createdAt: Date,
    readonly records: PromptRecord[],
    readonly buckets: Bucket[],
    readonly paths: JobPaths,
    private readonly context: JobContext
  ) {
    this.log = new JobLog(paths.logFile, context.logger, context.clock ?? systemClock);
  }

  /**
   * Read and validate <dataFolder>/input/<fileName>
   */
  static async load(fileName: string, context: JobContext): Promise<Job> {
    if (path.extname(fileName) !== JOB_FILE_EXTENSION) {
      throw new JobFileError(`job files must have the ${JOB_FILE_EXTENSION} extension`, fileName);
    }

    const inputFile = path.join(context.dataFolder, 'input', fileName);
    if (!(await pathExists(inputFile))) {
      throw new JobFileError('file not found in the input folder', fileName);
    }

    const lines = await readNumberedLines(inputFile);
    const records = lines.map((line) => parsePromptRecord(line.text, line.lineNumber, fileName));

    const clock = context.clock ?? systemClock;
    const createdAt = new Date(clock.now());
    const paths = await Job.claimPaths(context.dataFolder, fileName, createdAt);
    const buckets = planBuckets(records, context.rateLimits, context.maxQueries);

    return new Job(fileName, createdAt, records, buckets, paths, context);
  }

  /**
   * Artifact paths for a job created at createdAt. A non-zero sequence
   * suffixes the timestamp (`-1`, `-2`, ...) to tell apart same-named jobs created in the same second.
   */
  static resolvePaths(dataFolder: string, fileName: string, createdAt: Date, sequence: number = 0): JobPaths {
    const name = path.basename(fileName, JOB_FILE_EXTENSION);
    const stamp = formatFileTimestamp(createdAt);
    const timestamp = sequence > 0 ? `${stamp}-${sequence}` : stamp;
    const outputFolder = path.join(dataFolder, 'output', name);
    return {
      inputFile: path.join(dataFolder, 'input', fileName),
      outputFolder,
      inputSnapshotFile: path.join(outputFolder, `${timestamp}-input-${name}${JOB_FILE_EXTENSION}`),
      completedFile: path.join(outputFolder, `${timestamp}-completed-${name}${JOB_FILE_EXTENSION}`),
      logFile: path.join(outputFolder, `${timestamp}-${name}-log.txt`),
    };
  }

  /**
   * First artifact paths of which none exists yet in the job's output folder
   */
  static async claimPaths(dataFolder: string, fileName: string, createdAt: Date): Promise<JobPaths> {
    for (let sequence = 0; ; sequence++) {
      const paths = Job.resolvePaths(dataFolder, fileName, createdAt, sequence);
      const taken = await Promise.all(
        [paths.inputSnapshotFile, paths.completedFile, paths.logFile].map((file) => pathExists(file))
      );
      if (!taken.includes(true)) {
        return paths;
      }
    }
  }

  get name(): string {
    return path.basename(this.fileName, JOB_FILE_EXTENSION);
  }

  get numberQueries(): number {
    return this.records.length;
  }

  get status(): JobPhase {
    return this.phase;
  }

  /**
   * Move the input file aside, dispatch every bucket concurrently and
   * wait until all records are written to the completed file
   */
  async process(): Promise<JobSummary> {
    if (this.phase !== 'created') {
      throw new Error(`Job ${this.fileName} has already been processed`);
    }
    const clock = this.context.clock ?? systemClock;
    const startedAt = clock.now();

    await fs.mkdir(this.paths.outputFolder, { recursive: true });
    const writer = new JsonlWriter(this.paths.completedFile);
    await writer.create();
    await moveFile(this.paths.inputFile, this.paths.inputSnapshotFile);

    await this.log.info(
      `Processing ${this.fileName}: ${this.numberQueries} queries in ${this.buckets.length} rate bucket(s)`
    );
    for (const line of summarizeBuckets(this.buckets)) {
      await this.log.info(`  ${line}`);
    }

    this.phase = 'dispatching';
    const settled = await Promise.allSettled(
      this.buckets.map((bucket) =>
        new BucketDispatcher(bucket, {
          registry: this.context.registry,
          maxAttempts: this.context.maxAttempts,
          writer,
          log: this.log,
          clock,
        }).run()
      )
    );

    const outcomes: BucketOutcome[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        throw result.reason;
      }
      outcomes.push(result.value);
    }
    this.phase = 'completed';

    const durationMs = clock.now() - startedAt;
    const succeeded = outcomes.reduce((sum, outcome) => sum + outcome.succeeded, 0);
    const failed = outcomes.reduce((sum, outcome) => sum + outcome.failed, 0);
    const summary: JobSummary = {
      jobName: this.name,
      numberQueries: this.numberQueries,
      succeeded,
      failed,
      durationMs,
      avgQuerySeconds: this.numberQueries > 0 ? durationMs / 1000 / this.numberQueries : 0,
    };

    await this.log.info(
      `Completed ${this.fileName}: ${succeeded} succeeded, ${failed} failed in ${formatDuration(durationMs / 1000)} ` +
        `(${summary.avgQuerySeconds.toFixed(2)}s per query)`
    );
    return summary;
  }
}
