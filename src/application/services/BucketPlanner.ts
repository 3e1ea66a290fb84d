import { Bucket, RateLimitOverrides } from '../../core/entities/Bucket.js';
import { PromptRecord } from '../../core/entities/PromptRecord.js';

/** Bucket shared by records that name neither a group nor an api */
export const NO_API_BUCKET = '(no-api)';

function modelEntry(
  overrides: RateLimitOverrides,
  key: string,
  modelName: string | undefined
): number | undefined {
  const entry = overrides[key];
  if (modelName === undefined || entry === undefined || typeof entry === 'number') {
    return undefined;
  }
  return Object.hasOwn(entry, modelName) ? entry[modelName] : undefined;
}

/**
 * Rate-bucket key of a record: group, else api.
 * When the override table has a limit for this key and the record's model,
 * the record gets its own `<key>-<model>` lane.
 */
export function resolveBucketKey(record: PromptRecord, overrides: RateLimitOverrides = {}): string {
  const key = record.group ?? record.api ?? NO_API_BUCKET;
  if (record.modelName !== undefined && modelEntry(overrides, key, record.modelName) !== undefined) {
    return `${key}-${record.modelName}`;
  }
  return key;
}

/**
 * Max requests per minute for a bucket key (and model, for model-specific lanes)
 */
export function resolveRateLimit(
  groupKey: string,
  modelName: string | undefined,
  overrides: RateLimitOverrides,
  defaultLimit: number
): number {
  const entry = overrides[groupKey];
  if (entry === undefined) return defaultLimit;
  if (typeof entry === 'number') return entry;

  const forModel = modelEntry(overrides, groupKey, modelName);
  if (forModel !== undefined) return forModel;
  return Object.hasOwn(entry, 'default') ? entry.default : defaultLimit;
}

/**
 * Partition records into buckets, keeping file order inside each bucket
 * and first-appearance order between buckets
 */
export function planBuckets(
  records: PromptRecord[],
  overrides: RateLimitOverrides,
  defaultLimit: number
): Bucket[] {
  const buckets = new Map<string, Bucket>();

  for (const record of records) {
    const key = resolveBucketKey(record, overrides);
    let bucket = buckets.get(key);
    if (!bucket) {
      const baseKey = record.group ?? record.api ?? NO_API_BUCKET;
      const modelName = key === baseKey ? undefined : record.modelName;
      bucket = {
        key,
        rateLimit: resolveRateLimit(baseKey, modelName, overrides, defaultLimit),
        records: [],
      };
      buckets.set(key, bucket);
    }
    bucket.records.push(record);
  }

  return Array.from(buckets.values());
}

export function summarizeBuckets(buckets: Bucket[]): string[] {
  return buckets.map(
    (bucket) => `${bucket.key}: ${bucket.records.length} record(s), ${bucket.rateLimit} queries/min`
  );
}
