#!/usr/bin/env node

/**
 * Prompt batch pipeline - entry point.
 * Watches <dataFolder>/input for .jsonl job files and processes them until interrupted.
 */

import { getConfig, loadEnvFile, loadRateLimitOverrides, parseArgs, printConfigInfo } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { createBackendRegistry } from './infrastructure/backends/index.js';
import { ensureDataFolders } from './infrastructure/files/jobFiles.js';
import { HttpClient } from './infrastructure/http/HttpClient.js';
import { JobQueue } from './infrastructure/queue/JobQueue.js';
import { createLogger, setDebugLogging } from './utils/logger.js';

const logger = createLogger('Pipeline');

async function main(): Promise<void> {
  let queue: JobQueue | null = null;

  try {
    const cliArgs = parseArgs();
    const envFile = typeof cliArgs['env-file'] === 'string' ? cliArgs['env-file'] : process.env.ENV_FILE || '.env';
    loadEnvFile(envFile);

    // Load configuration
    const config = getConfig(cliArgs, process.env);
    setDebugLogging(config.debug);

    const rateLimits = await loadRateLimitOverrides(config.rateLimitFile);
    await ensureDataFolders(config.dataFolder);

    const registry = createBackendRegistry({
      env: process.env,
      http: new HttpClient(config.requestTimeoutMs),
      logger: createLogger('Backends'),
    });
    printConfigInfo(config, registry.environmentReport());

    queue = new JobQueue({
      context: {
        dataFolder: config.dataFolder,
        maxQueries: config.maxQueries,
        maxAttempts: config.maxAttempts,
        rateLimits,
        registry,
        logger: createLogger('Job'),
      },
      parallel: config.parallel,
      maxConcurrentJobs: config.maxConcurrentJobs,
      pollIntervalMs: config.pollIntervalMs,
    });

    // Setup graceful shutdown
    const activeQueue = queue;
    const shutdown = (signal: string) => {
      if (activeQueue.isStopped()) {
        logger.warn(`Received ${signal} again, exiting without waiting for running jobs`);
        process.exit(130);
      }
      logger.info(`Received ${signal}, finishing running jobs before exit (repeat to force)...`);
      activeQueue.stop();
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await activeQueue.run();

    const stats = activeQueue.getStatistics();
    logger.info(`Processed ${stats.completed} job(s), ${stats.failed} failed`);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`\n❌ ${error.message}\n`);
      console.error('💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - The rate limit file must map api/group names to an integer or to {model: integer}');
      console.error();
    } else {
      logger.error('Fatal error in main():', error);
    }
    queue?.stop();
    process.exitCode = 1;
  }
}

// Start the pipeline
main().catch((error: unknown) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
