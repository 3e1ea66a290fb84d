#!/usr/bin/env node

/**
 * Validate a job file before dropping it into the input folder.
 * Usage: node dist/src/scripts/checkJobFile.js --file prompts.jsonl [--log-file check.txt] [--data-folder data] [--move-to-input]
 */

import path from 'path';
import { checkJobFile, formatCheckReport } from '../application/services/JobFileChecker.js';
import { loadEnvFile, parseArgs } from '../config.js';
import { createBackendRegistry } from '../infrastructure/backends/index.js';
import { JobLog } from '../infrastructure/files/JobLog.js';
import { ensureDataFolders, moveFile } from '../infrastructure/files/jobFiles.js';
import { HttpClient } from '../infrastructure/http/HttpClient.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Check');

async function main(): Promise<void> {
  const args = parseArgs();
  const file = args.file;
  if (typeof file !== 'string') {
    logger.error('Usage: --file <job.jsonl> [--log-file <path>] [--data-folder <dir>] [--move-to-input] [--env-file <path>]');
    process.exitCode = 2;
    return;
  }

  loadEnvFile(typeof args['env-file'] === 'string' ? args['env-file'] : '.env');
  const registry = createBackendRegistry({ env: process.env, http: new HttpClient() });

  const report = await checkJobFile(file, registry, registry.environmentReport());
  const logFile = typeof args['log-file'] === 'string' ? args['log-file'] : undefined;
  const log = logFile ? new JobLog(logFile, logger) : null;
  for (const line of formatCheckReport(report)) {
    if (log) {
      await log.write(line, report.valid ? 'info' : 'error');
    } else if (report.valid) {
      logger.info(line);
    } else {
      logger.error(line);
    }
  }

  if (!report.valid) {
    process.exitCode = 1;
    return;
  }

  if (args['move-to-input'] === true) {
    const dataFolder = typeof args['data-folder'] === 'string' ? args['data-folder'] : 'data';
    await ensureDataFolders(dataFolder);
    const destination = path.join(dataFolder, 'input', path.basename(file));
    await moveFile(file, destination);
    logger.info(`Moved ${file} to ${destination}`);
  }
}

main().catch((error: unknown) => {
  logger.error('Check failed:', error);
  process.exit(1);
});
