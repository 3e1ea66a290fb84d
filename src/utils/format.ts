const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Timestamp used in artifact file names: DD-MM-YYYY-HH-MM-SS (local time)
 */
export function formatFileTimestamp(date: Date): string {
  return [
    pad(date.getDate()),
    pad(date.getMonth() + 1),
    date.getFullYear(),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('-');
}

/**
 * Timestamp prefix of job log lines: DD-MM-YYYY, HH:MM:SS (local time)
 */
export function formatLogTimestamp(date: Date): string {
  const day = `${pad(date.getDate())}-${pad(date.getMonth() + 1)}-${date.getFullYear()}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}, ${time}`;
}

/**
 * Single-line excerpt of arbitrary text, cut at maxLength characters
 */
export function excerpt(text: string, maxLength: number = 50): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength)}...` : flat;
}

/**
 * Human readable duration for ETA messages, e.g. "1h 02m 05s"
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  if (h > 0) return `${h}h ${pad(m)}m ${pad(s)}s`;
  if (m > 0) return `${m}m ${pad(s)}s`;
  return `${s}s`;
}

/**
 * Stringify an unknown thrown value for logs and error fields
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
