/**
 * Tagged console logging, e.g. `[JobQueue] Found 3 job(s)`.
 * Debug lines are only printed once debug mode is switched on.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let debugEnabled = process.env.DEBUG === 'true';
let silenced = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Mute all console output (used by the test suite)
 */
export function setLoggingSilenced(value: boolean): void {
  silenced = value;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (debugEnabled && !silenced) console.error(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (!silenced) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (!silenced) console.error(`${prefix} ⚠ ${message}`, ...details);
    },
    error(message, ...details) {
      if (!silenced) console.error(`${prefix} ✗ ${message}`, ...details);
    },
  };
}
