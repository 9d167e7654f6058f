import type { FileFormat } from '../file_writer';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Default log file name for a run started at `now`, in local time:
 * `sieve_output_YYYYMMDD_HHMMSS.<ext>`.
 */
export function timestampedLogFileName(format: FileFormat, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `sieve_output_${date}_${time}.${format}`;
}
