import { promises as fs } from 'fs';
import { Mutex } from '../../utils/mutex.js';

/**
 * Append-only JSON Lines file. Every append is serialised through the file's
 * mutex so one line is always written whole before the next starts.
 */
export class JsonlWriter {
  private readonly mutex = new Mutex();
  private written = 0;

  constructor(readonly filePath: string) {}

  /**
   * Create the file empty. Fails with EEXIST when the file is already there.
   */
  async create(): Promise<void> {
    await this.mutex.runExclusive(() => fs.writeFile(this.filePath, '', { encoding: 'utf8', flag: 'wx' }));
  }

  async append(value: unknown): Promise<void> {
    const line = `${JSON.stringify(value)}\n`;
    await this.mutex.runExclusive(async () => {
      await fs.appendFile(this.filePath, line, 'utf8');
      this.written++;
    });
  }

  get linesWritten(): number {
    return this.written;
  }
}
