// Date helpers shared by log files, health scoring and backups
// All formatting uses local time, matching what cron and `date` print on the host

const DAY_MS = 86400 * 1000;
const LOG_DATE_PATTERN = /(\d{4})-(\d{2})-(\d{2})/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatLogTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** `YYYYMMDD-HHMMSS`, used for backup directory names */
export function formatCompactTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}-` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}

/**
 * Whole days from `from` to `to`, truncated toward zero.
 * Negative when `to` is before `from`.
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.trunc((to.getTime() - from.getTime()) / DAY_MS);
}

/**
 * First YYYY-MM-DD found in a log line, as local midnight
 */
export function parseLogDate(line: string): Date | null {
  const match = LOG_DATE_PATTERN.exec(line);
  if (!match) return null;
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  return Number.isNaN(date.getTime()) ? null : date;
}
