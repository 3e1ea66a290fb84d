/**
 * Structural problem with a job file: wrong extension, missing file, or a line
 * that cannot be turned into a prompt record. Fatal to the whole job.
 */
export class JobFileError extends Error {
  constructor(
    public readonly reason: string,
    public readonly fileName: string,
    public readonly lineNumber?: number
  ) {
    super(lineNumber === undefined ? `${fileName}: ${reason}` : `${fileName}, line ${lineNumber}: ${reason}`);
    this.name = 'JobFileError';
  }
}

/**
 * Invalid CLI/env configuration or rate-limit override file
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? `${message}\n  • ${problems.join('\n  • ')}` : message);
    this.name = 'ConfigurationError';
  }
}
