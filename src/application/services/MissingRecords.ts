import { promises as fs } from 'fs';
import { JobFileError } from '../../core/errors.js';
import { readNumberedLines } from '../../infrastructure/files/jobFiles.js';

export interface MissingRecordsOptions {
  inputFile: string;
  completedFile: string;
  newFile: string;
  idField?: string;
  retryFailed?: boolean; // also re-queue records that finished with an error
}

export interface MissingRecordsResult {
  missing: number;
  unreadableOutputLines: number[];
}

/**
 * JSON object on a line, or null when the line is not one
 */
function parseObject(text: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

/**
 * Ids that count as done in a completed file
 */
export async function collectCompletedIds(
  completedFile: string,
  idField: string = 'id',
  retryFailed: boolean = false
): Promise<{ ids: Set<string>; unreadable: number[] }> {
  const ids = new Set<string>();
  const unreadable: number[] = [];

  for (const line of await readNumberedLines(completedFile)) {
    const data = parseObject(line.text);
    if (!data || data[idField] === undefined) {
      unreadable.push(line.lineNumber);
      continue;
    }
    if (retryFailed && 'error' in data && !('response' in data)) continue;
    ids.add(JSON.stringify(data[idField]));
  }
  return { ids, unreadable };
}

/**
 * Append every input line whose id is absent from the completed file to newFile.
 * Lines are copied verbatim so the new file can be dropped straight into the input folder.
 */
export async function findMissingRecords(options: MissingRecordsOptions): Promise<MissingRecordsResult> {
  const idField = options.idField ?? 'id';
  const { ids, unreadable } = await collectCompletedIds(options.completedFile, idField, options.retryFailed ?? false);

  const missingLines: string[] = [];
  for (const line of await readNumberedLines(options.inputFile)) {
    const data = parseObject(line.text);
    if (!data) {
      throw new JobFileError('invalid JSON', options.inputFile, line.lineNumber);
    }
    if (data[idField] === undefined) {
      throw new JobFileError(`missing '${idField}' field`, options.inputFile, line.lineNumber);
    }
    if (!ids.has(JSON.stringify(data[idField]))) {
      missingLines.push(line.text);
    }
  }

  if (missingLines.length > 0) {
    await fs.appendFile(options.newFile, `${missingLines.join('\n')}\n`, 'utf8');
  }
  return { missing: missingLines.length, unreadableOutputLines: unreadable };
}
