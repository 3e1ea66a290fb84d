import { promises as fs } from 'fs';
import path from 'path';

export const JOB_FILE_EXTENSION = '.jsonl';

export interface JobFileInfo {
  fileName: string;
  createdMs: number;
}

/**
 * Create <dataFolder>/{input,output,media} if missing
 */
export async function ensureDataFolders(dataFolder: string): Promise<void> {
  for (const folder of ['input', 'output', 'media']) {
    await fs.mkdir(path.join(dataFolder, folder), { recursive: true });
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Job files in a folder, oldest first by creation time.
 * Birth time is used when the filesystem reports it, ctime otherwise;
 * equal times fall back to file name order.
 */
export async function listJobFiles(folder: string): Promise<JobFileInfo[]> {
  const entries = await fs.readdir(folder, { withFileTypes: true });
  const files: JobFileInfo[] = [];

  for (const entry of entries) {
    if (!entry.isFile() || path.extname(entry.name) !== JOB_FILE_EXTENSION) continue;
    const stats = await fs.stat(path.join(folder, entry.name));
    const createdMs = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
    files.push({ fileName: entry.name, createdMs });
  }

  return files.sort((a, b) => {
    if (a.createdMs !== b.createdMs) return a.createdMs - b.createdMs;
    if (a.fileName < b.fileName) return -1;
    return a.fileName > b.fileName ? 1 : 0;
  });
}

/**
 * Non-blank lines of a text file with their 1-based line numbers
 */
export async function readNumberedLines(filePath: string): Promise<Array<{ lineNumber: number; text: string }>> {
  const content = await fs.readFile(filePath, 'utf8');
  return content
    .split(/\r?\n/)
    .map((text, i) => ({ lineNumber: i + 1, text }))
    .filter((line) => line.text.trim().length > 0);
}

/**
 * Move a file, copying across devices when a plain rename is not possible
 */
export async function moveFile(from: string, to: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      await fs.copyFile(from, to);
      await fs.unlink(from);
      return;
    }
    throw error;
  }
}
