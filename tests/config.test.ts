import path from "path";
import { promises as fs } from "fs";
import { getConfig, loadRateLimitOverrides, parseArgs } from "../src/config.js";
import { ConfigurationError } from "../src/core/errors.js";
import { createDataFolder, removeFolder } from "./helpers/fakes.js";

describe("Configuration", () => {
  describe("parseArgs", () => {
    test("should read values, flags and key=value pairs", () => {
      expect(parseArgs(["--data-folder", "runs", "--parallel", "--max-queries=30", "--debug"])).toEqual({
        "data-folder": "runs",
        parallel: true,
        "max-queries": "30",
        debug: true,
      });
    });
  });

  describe("getConfig", () => {
    test("should apply defaults", () => {
      expect(getConfig({}, {})).toEqual({
        dataFolder: "data",
        maxQueries: 10,
        maxAttempts: 5,
        parallel: false,
        maxConcurrentJobs: 2,
        pollIntervalMs: 1000,
        requestTimeoutMs: 300000,
        rateLimitFile: undefined,
        envFile: ".env",
        debug: false,
      });
    });

    test("should read environment variables", () => {
      const config = getConfig({}, { DATA_FOLDER: "pipeline", MAX_QUERIES: "120", PARALLEL: "true", MAX_QUERIES_JSON: "limits.json" });
      expect(config.dataFolder).toBe("pipeline");
      expect(config.maxQueries).toBe(120);
      expect(config.parallel).toBe(true);
      expect(config.rateLimitFile).toBe("limits.json");
    });

    test("should let CLI arguments win over the environment", () => {
      const config = getConfig({ "max-attempts": "2", "poll-interval": "0" }, { MAX_ATTEMPTS: "8" });
      expect(config.maxAttempts).toBe(2);
      expect(config.pollIntervalMs).toBe(0);
    });

    test("should reject invalid values with one message per field", () => {
      expect(() => getConfig({ "max-queries": "0", "max-attempts": "lots" }, {})).toThrow(ConfigurationError);
      try {
        getConfig({ "max-queries": "0", "max-attempts": "lots" }, {});
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.problems).toHaveLength(2);
          expect(error.problems[0]).toBe("maxQueries: Max queries per minute must be at least 1");
          expect(error.problems[1]).toMatch(/^maxAttempts: /);
        }
      }
    });
  });

  describe("loadRateLimitOverrides", () => {
    let folder: string;

    beforeEach(async () => {
      folder = await createDataFolder();
    });

    afterEach(async () => {
      await removeFolder(folder);
    });

    test("should return an empty table without a file", async () => {
      await expect(loadRateLimitOverrides(undefined)).resolves.toEqual({});
    });

    test("should read numbers and per-model tables", async () => {
      const file = path.join(folder, "limits.json");
      await fs.writeFile(file, JSON.stringify({ ollama: 5, openai: { "gpt-4o": 20, default: 40 } }), "utf8");

      await expect(loadRateLimitOverrides(file)).resolves.toEqual({ ollama: 5, openai: { "gpt-4o": 20, default: 40 } });
    });

    test("should reject non-integer limits", async () => {
      const file = path.join(folder, "limits.json");
      await fs.writeFile(file, JSON.stringify({ ollama: "fast" }), "utf8");

      await expect(loadRateLimitOverrides(file)).rejects.toThrow(ConfigurationError);
    });

    test("should reject unreadable files", async () => {
      await expect(loadRateLimitOverrides(path.join(folder, "absent.json"))).rejects.toThrow(/Could not read rate limit file/);
    });
  });
});
