// Crontab text helpers
// Pure functions: reading/writing the real crontab happens in the cron scheduler adapter

import { ConfigurationError } from '../errors';

const RENEWAL_JOB_PATTERN = /\bcertbot renew\b.*--deploy-hook/;
const MONITOR_JOB_PATTERN = /tak-renewal(?:-failover\b|\b.*\bfailover check\b)/;
const FIELD_PATTERN = /^[0-9*,/-]+$/;
const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function isComment(line: string): boolean {
  return line.trimStart().startsWith('#');
}

export function parseCrontab(text: string): string[] {
  const lines = text.split('\n');
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
    lines.pop();
  }
  return lines;
}

/**
 * crontab(1) rejects a file whose last line has no newline
 */
export function serializeCrontab(lines: string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

export function isRenewalJob(line: string): boolean {
  return !isComment(line) && RENEWAL_JOB_PATTERN.test(line);
}

export function isMonitorJob(line: string): boolean {
  return !isComment(line) && MONITOR_JOB_PATTERN.test(line);
}

export function withoutJobs(lines: string[], predicate: (line: string) => boolean): string[] {
  return lines.filter(line => !predicate(line));
}

export function validateCronSchedule(schedule: string): string {
  const fields = schedule.trim().split(/\s+/);
  if (fields.length !== 5 || !fields.every(field => FIELD_PATTERN.test(field))) {
    throw new ConfigurationError(`Invalid cron schedule '${schedule}': expected five fields like "0 2 * * 0"`);
  }
  return fields.join(' ');
}

export function buildRenewalJob(schedule: string, certbot: string, hook: string, cronLog: string): string {
  return `${validateCronSchedule(schedule)} ${certbot} renew --quiet --deploy-hook "${hook}" >> ${cronLog} 2>&1`;
}

export function buildMonitorJob(schedule: string, monitor: string, systemLog: string): string {
  return `${validateCronSchedule(schedule)} ${monitor} >> ${systemLog} 2>&1`;
}

/**
 * Human description of a five-field schedule, e.g. "Every Sunday at 2:00"
 */
export function describeSchedule(schedule: string): string {
  const fields = schedule.trim().split(/\s+/);
  if (fields.length !== 5) {
    return `Custom schedule: ${schedule}`;
  }
  const [minute, hour, dayOfMonth, month, dayOfWeek] = fields;
  const simpleTime = /^\d{1,2}$/.test(minute) && /^\d{1,2}$/.test(hour);
  if (!simpleTime || dayOfMonth !== '*' || month !== '*') {
    return `Custom schedule: ${schedule}`;
  }

  const time = `${Number(hour)}:${minute.padStart(2, '0')}`;
  if (dayOfWeek === '*') {
    return `Every day at ${time}`;
  }
  if (/^[0-7]$/.test(dayOfWeek)) {
    return `Every ${WEEKDAYS[Number(dayOfWeek) % 7]} at ${time}`;
  }
  return `Custom schedule: ${schedule}`;
}
