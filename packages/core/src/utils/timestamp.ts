/**
 * Snapshot Timestamp Format
 *
 * `YYYYMMDD_HHMMSS` in local wall-clock time. Fixed width, so lexicographic
 * order equals chronological order.
 */

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatTimestamp(date: Date): string {
  return (
    pad(date.getFullYear(), 4) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    '_' +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

export function isTimestamp(value: string): boolean {
  return TIMESTAMP_PATTERN.test(value);
}

export function parseTimestamp(value: string): Date | undefined {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return undefined;

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  if (
    year === undefined || month === undefined || day === undefined ||
    hours === undefined || minutes === undefined || seconds === undefined
  ) {
    return undefined;
  }
  return new Date(year, month - 1, day, hours, minutes, seconds);
}
