import { promises as fs } from 'fs';
import path from 'path';
import { Mutex } from '../../utils/mutex.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { formatLogTimestamp } from '../../utils/format.js';
import { Logger } from '../../utils/logger.js';

export type JobLogLevel = 'info' | 'error';

/**
 * Human readable log file of one job, lines formatted `DD-MM-YYYY, HH:MM:SS: message`.
 * Entries are echoed to the console logger when one is given.
 */
export class JobLog {
  private readonly mutex = new Mutex();
  private folderReady = false;

  constructor(
    readonly filePath: string,
    private readonly logger?: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async info(message: string): Promise<void> {
    await this.write(message, 'info');
  }

  async error(message: string): Promise<void> {
    await this.write(message, 'error');
  }

  async write(message: string, level: JobLogLevel = 'info'): Promise<void> {
    if (this.logger) {
      if (level === 'error') {
        this.logger.error(message);
      } else {
        this.logger.info(message);
      }
    }

    const line = `${formatLogTimestamp(new Date(this.clock.now()))}: ${message}\n`;
    await this.mutex.runExclusive(async () => {
      if (!this.folderReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.folderReady = true;
      }
      await fs.appendFile(this.filePath, line, 'utf8');
    });
  }
}
