import { NO_API_BUCKET, planBuckets, resolveBucketKey, resolveRateLimit, summarizeBuckets } from "../src/application/services/BucketPlanner.js";
import { RateLimitOverrides } from "../src/core/entities/Bucket.js";
import { PromptRecord, parsePromptRecord } from "../src/core/entities/PromptRecord.js";

function record(line: number, fields: Record<string, unknown>): PromptRecord {
  return parsePromptRecord(JSON.stringify({ prompt: `p${line}`, ...fields }), line, "job.jsonl");
}

describe("BucketPlanner", () => {
  describe("resolveRateLimit", () => {
    const overrides: RateLimitOverrides = {
      ollama: 5,
      openai: { "gpt-4o": 20, default: 40 },
      anthropic: { "claude-3-haiku": 15 },
    };

    test("should fall back to the default without an entry", () => {
      expect(resolveRateLimit("test", undefined, overrides, 50)).toBe(50);
    });

    test("should use a numeric entry for every model", () => {
      expect(resolveRateLimit("ollama", "llama3.2", overrides, 50)).toBe(5);
    });

    test("should use the model entry, then the default entry", () => {
      expect(resolveRateLimit("openai", "gpt-4o", overrides, 50)).toBe(20);
      expect(resolveRateLimit("openai", "gpt-3.5-turbo", overrides, 50)).toBe(40);
      expect(resolveRateLimit("openai", undefined, overrides, 50)).toBe(40);
    });

    test("should use the global default when a model table has no default", () => {
      expect(resolveRateLimit("anthropic", "claude-3-opus", overrides, 50)).toBe(50);
    });
  });

  describe("resolveBucketKey", () => {
    test("should prefer group over api", () => {
      expect(resolveBucketKey(record(1, { api: "openai", group: "shared" }))).toBe("shared");
      expect(resolveBucketKey(record(2, { api: "openai" }))).toBe("openai");
      expect(resolveBucketKey(record(3, {}))).toBe(NO_API_BUCKET);
    });

    test("should split models that have their own limit", () => {
      const overrides: RateLimitOverrides = { openai: { "gpt-4o": 20 } };
      expect(resolveBucketKey(record(1, { api: "openai", model_name: "gpt-4o" }), overrides)).toBe("openai-gpt-4o");
      expect(resolveBucketKey(record(2, { api: "openai", model_name: "gpt-4o-mini" }), overrides)).toBe("openai");
    });
  });

  describe("planBuckets", () => {
    test("should put three test records into one bucket at the default rate", () => {
      const records = [1, 2, 3].map((line) => record(line, { api: "test" }));

      const buckets = planBuckets(records, {}, 50);

      expect(buckets).toHaveLength(1);
      expect(buckets[0].key).toBe("test");
      expect(buckets[0].rateLimit).toBe(50);
      expect(buckets[0].records.map((r) => r.index)).toEqual([1, 2, 3]);
    });

    test("should keep file order within buckets and first-appearance order between them", () => {
      const records = [
        record(1, { api: "openai", model_name: "gpt-4o" }),
        record(2, { api: "ollama", model_name: "llama3.2" }),
        record(3, { api: "openai", model_name: "gpt-4o-mini" }),
        record(4, { api: "openai", model_name: "gpt-4o" }),
        record(5, { api: "ollama", model_name: "mistral", group: "local" }),
      ];
      const overrides: RateLimitOverrides = { openai: { "gpt-4o": 20, default: 40 }, local: 3 };

      const buckets = planBuckets(records, overrides, 10);

      expect(buckets.map((b) => [b.key, b.rateLimit, b.records.map((r) => r.index)])).toEqual([
        ["openai-gpt-4o", 20, [1, 4]],
        ["ollama", 10, [2]],
        ["openai", 40, [3]],
        ["local", 3, [5]],
      ]);
      expect(summarizeBuckets(buckets)[0]).toBe("openai-gpt-4o: 2 record(s), 20 queries/min");
    });
  });
});
