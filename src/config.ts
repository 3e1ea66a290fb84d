import * as dotenv from 'dotenv';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { RateLimitOverrides } from './core/entities/Bucket.js';
import { ConfigurationError } from './core/errors.js';
import { EnvironmentReport } from './infrastructure/backends/BackendRegistry.js';
import { Env } from './infrastructure/backends/environment.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './infrastructure/http/HttpClient.js';

export interface PipelineConfig {
  dataFolder: string;
  maxQueries: number; // default requests per minute of a rate bucket
  maxAttempts: number;
  parallel: boolean;
  maxConcurrentJobs: number;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  rateLimitFile?: string;
  envFile: string;
  debug: boolean;
}

// Zod validation schema
const ConfigSchema = z.object({
  dataFolder: z.string().min(1, 'Data folder must not be empty'),
  maxQueries: z.number().int().min(1, 'Max queries per minute must be at least 1'),
  maxAttempts: z.number().int().min(1, 'Max attempts must be at least 1'),
  parallel: z.boolean(),
  maxConcurrentJobs: z.number().int().min(1).max(32),
  pollIntervalMs: z.number().int().min(0),
  requestTimeoutMs: z.number().int().min(1000),
  rateLimitFile: z.string().min(1).optional(),
  envFile: z.string().min(1),
  debug: z.boolean(),
});

const RateLimitOverridesSchema = z.record(
  z.union([
    z.number().int().positive(),
    z.record(z.number().int().positive()),
  ])
);

export type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --data-folder data --max-queries 30 --parallel --debug
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        args[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[body] = argv[++i];
      } else {
        args[body] = true;
      }
    }
  }

  return args;
}

/**
 * Load KEY=value pairs from an env file into process.env (existing variables win)
 */
export function loadEnvFile(envFile: string): void {
  const result = dotenv.config({ path: envFile });
  if (result.error && !('code' in result.error && result.error.code === 'ENOENT')) {
    throw new ConfigurationError(`Could not read env file ${envFile}`, [result.error.message]);
  }
}

/**
 * Get configuration from CLI arguments or environment variables.
 * Validates configuration against schema and throws ConfigurationError if invalid.
 */
export function getConfig(cliArgs: CliArgs = parseArgs(), env: Env = process.env): PipelineConfig {
  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return Number.parseInt(String(cliValue), 10);
    const envValue = env[envKey];
    return envValue ? Number.parseInt(envValue, 10) : defaultValue;
  };

  const rawConfig = {
    dataFolder: getString('data-folder', 'DATA_FOLDER', 'data'),
    maxQueries: getNumber('max-queries', 'MAX_QUERIES', 10),
    maxAttempts: getNumber('max-attempts', 'MAX_ATTEMPTS', 5),
    parallel: getBoolean('parallel', 'PARALLEL', false),
    maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 2),
    pollIntervalMs: getNumber('poll-interval', 'POLL_INTERVAL_MS', 1000),
    requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    rateLimitFile: getOptionalString('max-queries-json', 'MAX_QUERIES_JSON'),
    envFile: getString('env-file', 'ENV_FILE', '.env'),
    debug: getBoolean('debug', 'DEBUG', false),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Read the rate-limit override table, e.g. {"openai": {"gpt-4o": 20, "default": 50}, "ollama": 5}
 */
export async function loadRateLimitOverrides(filePath?: string): Promise<RateLimitOverrides> {
  if (!filePath) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read rate limit file ${filePath}`, [reason]);
  }

  const result = RateLimitOverridesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid rate limit file ${filePath}`,
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Print configuration and backend readiness
 */
export function printConfigInfo(config: PipelineConfig, backends: EnvironmentReport[]): void {
  console.error('═'.repeat(68));
  console.error('  Prompt batch pipeline - configuration');
  console.error('═'.repeat(68));

  console.error(`\n📁 Data folder: ${config.dataFolder}${config.debug ? ' (Debug Mode)' : ''}`);
  console.error(`⚙️  Rate limit: ${config.maxQueries} queries/min per bucket | Attempts: ${config.maxAttempts}`);
  if (config.rateLimitFile) {
    console.error(`   Overrides: ${config.rateLimitFile}`);
  }
  console.error(
    `🔁 Jobs: ${config.parallel ? `up to ${config.maxConcurrentJobs} in parallel` : 'one at a time'} | Poll: ${config.pollIntervalMs}ms`
  );

  console.error('\n🤖 Backends:');
  for (const backend of backends) {
    console.error(`   ${backend.enabled ? '✓' : '✗'} ${backend.apiName}`);
    for (const issue of backend.issues) {
      console.error(`      ${issue.severity === 'fatal' ? '✗' : '⚠'} ${issue.message}`);
    }
  }

  console.error('\n' + '─'.repeat(68));
}
