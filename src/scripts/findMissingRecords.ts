#!/usr/bin/env node

/**
 * Write the records of an input file that never reached its completed file to a new job file.
 * Usage: node dist/src/scripts/findMissingRecords.js --input in.jsonl --output completed.jsonl --new retry.jsonl [--id id] [--retry-failed]
 */

import { findMissingRecords } from '../application/services/MissingRecords.js';
import { parseArgs } from '../config.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Missing');

async function main(): Promise<void> {
  const args = parseArgs();
  const { input, output } = args;
  const newFile = args.new;
  if (typeof input !== 'string' || typeof output !== 'string' || typeof newFile !== 'string') {
    logger.error('Usage: --input <input.jsonl> --output <completed.jsonl> --new <new.jsonl> [--id <field>] [--retry-failed]');
    process.exitCode = 2;
    return;
  }

  const result = await findMissingRecords({
    inputFile: input,
    completedFile: output,
    newFile,
    idField: typeof args.id === 'string' ? args.id : 'id',
    retryFailed: args['retry-failed'] === true,
  });

  if (result.unreadableOutputLines.length > 0) {
    logger.warn(`Skipped unreadable lines in ${output}: ${result.unreadableOutputLines.join(', ')}`);
  }
  if (result.missing === 0) {
    logger.info('No missing prompts found');
  } else {
    logger.info(`Added ${result.missing} missing prompts to ${newFile}`);
  }
}

main().catch((error: unknown) => {
  logger.error('Reconciliation failed:', error);
  process.exit(1);
});
