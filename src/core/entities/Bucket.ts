import { PromptRecord } from './PromptRecord.js';

/**
 * Rate-limit overrides keyed by api or group name.
 * A number applies to the whole key; an object maps model names (and optionally "default") to limits.
 */
export type RateLimitOverrides = Record<string, number | Record<string, number>>;

/**
 * Records sharing one throttled lane, in job file order
 */
export interface Bucket {
  key: string;
  rateLimit: number; // max request starts per minute
  records: PromptRecord[];
}
