import { Bucket } from '../../core/entities/Bucket.js';
import {
  PromptRecord,
  describePrompt,
  describeResponse,
  recordLabel,
  toOutputLine,
} from '../../core/entities/PromptRecord.js';
import { QueryResult, fail } from '../../core/interfaces/IBackendAdapter.js';
import { IBackendRegistry } from '../../core/interfaces/IBackendRegistry.js';
import { JobLog } from '../../infrastructure/files/JobLog.js';
import { JsonlWriter } from '../../infrastructure/files/JsonlWriter.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { describeError, excerpt } from '../../utils/format.js';
import { IntervalThrottle } from '../../utils/throttle.js';

export interface DispatchOptions {
  registry: IBackendRegistry;
  maxAttempts: number;
  writer: JsonlWriter;
  log: JobLog;
  clock?: Clock;
}

export interface BucketOutcome {
  key: string;
  succeeded: number;
  failed: number;
  requests: number;
}

/**
 * Runs one rate bucket: first attempts start in file order at the bucket's rate,
 * failed records go to the back of the queue until they succeed or run out of attempts.
 * Every record is written to the completed file exactly once, in its final state.
 */
export class BucketDispatcher {
  private readonly throttle: IntervalThrottle;
  private readonly clock: Clock;
  private outcome: BucketOutcome;
  private fault: { error: unknown } | null = null;

  constructor(
    private readonly bucket: Bucket,
    private readonly options: DispatchOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.throttle = new IntervalThrottle(bucket.rateLimit, this.clock);
    this.outcome = { key: bucket.key, succeeded: 0, failed: 0, requests: 0 };
  }

  async run(): Promise<BucketOutcome> {
    const pending: PromptRecord[] = [...this.bucket.records];
    const inFlight = new Set<Promise<void>>();

    for (;;) {
      if (this.fault === null && pending.length > 0) {
        await this.throttle.acquire();
        const record = pending.shift();
        if (!record) continue;

        const task: Promise<void> = this.attempt(record, pending)
          .catch((error: unknown) => {
            // output could not be written; stop starting requests and surface it
            this.fault ??= { error };
          })
          .finally(() => {
            inFlight.delete(task);
          });
        inFlight.add(task);
        continue;
      }

      if (inFlight.size === 0) break;
      await Promise.race(inFlight);
    }

    if (this.fault) {
      throw this.fault.error;
    }
    return { ...this.outcome };
  }

  private async attempt(record: PromptRecord, pending: PromptRecord[]): Promise<void> {
    const { log, writer, maxAttempts } = this.options;
    record.attempts++;
    record.sentAt = new Date(this.clock.now());
    this.outcome.requests++;

    const result = await this.invoke(record);
    const label = `${record.api ?? '(no api)'} (${record.modelName ?? 'default model'})`;
    const prompt = excerpt(describePrompt(record.shape));

    if (result.ok) {
      record.response = result.response;
      record.error = undefined;
      record.state = 'succeeded';
      await log.info(
        `Response received for request ${recordLabel(record)} to ${label} | prompt: ${prompt} | response: ${excerpt(describeResponse(result.response))}`
      );
      await writer.append(toOutputLine(record));
      this.outcome.succeeded++;
      return;
    }

    const { failure } = result;
    await log.error(
      `Error (${failure.kind}) for request ${recordLabel(record)} to ${label} on attempt ${record.attempts} of ${maxAttempts} | prompt: ${prompt} | ${failure.message}`
    );

    if (failure.retryable && record.attempts < maxAttempts) {
      pending.push(record);
      return;
    }

    record.state = 'failed';
    record.error = `${failure.kind}: ${failure.message}`;
    await log.info(`Request ${recordLabel(record)} to ${label} failed permanently after ${record.attempts} attempt(s)`);
    await writer.append(toOutputLine(record));
    this.outcome.failed++;
  }

  private async invoke(record: PromptRecord): Promise<QueryResult> {
    if (!record.api) {
      return fail('unavailable', "record has no 'api' field", false);
    }

    const lookup = this.options.registry.lookup(record.api);
    if (lookup.status === 'unknown') {
      return fail('unavailable', `unknown api '${record.api}'`, false);
    }
    if (lookup.status === 'disabled') {
      const reasons = lookup.issues.map((issue) => issue.message).join('; ');
      return fail('unavailable', `api '${record.api}' is disabled: ${reasons}`, false);
    }

    const shapeIssues = lookup.adapter.checkPromptShape(record).filter((issue) => issue.severity === 'fatal');
    if (shapeIssues.length > 0) {
      return fail('prompt-shape', shapeIssues.map((issue) => issue.message).join('; '), false);
    }

    try {
      return await lookup.adapter.query(record, record.index);
    } catch (error) {
      return fail('exception', describeError(error));
    }
  }
}
