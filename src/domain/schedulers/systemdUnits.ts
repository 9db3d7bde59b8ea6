// systemd unit rendering for the renewal timer

export const RENEWAL_SERVICE_UNIT = 'letsencrypt-renewal.service';
export const RENEWAL_TIMER_UNIT = 'letsencrypt-renewal.timer';

export interface ServiceUnitOptions {
  certbot: string;
  hook: string;
}

export interface TimerUnitOptions {
  onCalendar?: string;
  randomizedDelaySec?: number;
}

export function renderServiceUnit({ certbot, hook }: ServiceUnitOptions): string {
  return [
    '[Unit]',
    'Description=Renew LetsEncrypt certificates for TAK Server',
    'Wants=network-online.target',
    'After=network-online.target',
    '',
    '[Service]',
    'Type=oneshot',
    `ExecStart=${certbot} renew --quiet --deploy-hook "${hook}"`,
    '',
  ].join('\n');
}

export function renderTimerUnit({ onCalendar = 'weekly', randomizedDelaySec = 3600 }: TimerUnitOptions = {}): string {
  return [
    '[Unit]',
    'Description=Weekly LetsEncrypt renewal for TAK Server',
    '',
    '[Timer]',
    `OnCalendar=${onCalendar}`,
    `RandomizedDelaySec=${randomizedDelaySec}`,
    'Persistent=true',
    '',
    '[Install]',
    'WantedBy=timers.target',
    '',
  ].join('\n');
}

const CALENDAR_DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

/**
 * OnCalendar= equivalent of a simple cron schedule ("M H * * D" or "M H * * *").
 * Anything else, or no schedule, runs weekly.
 */
export function onCalendarFor(schedule?: string): string {
  const fields = schedule?.trim().split(/\s+/) ?? [];
  if (fields.length !== 5) return 'weekly';

  const [minute, hour, dayOfMonth, month, dayOfWeek] = fields;
  if (!/^\d{1,2}$/.test(minute) || !/^\d{1,2}$/.test(hour) || dayOfMonth !== '*' || month !== '*') {
    return 'weekly';
  }

  const time = `${hour.padStart(2, '0')}:${minute.padStart(2, '0')}:00`;
  if (dayOfWeek === '*') return `*-*-* ${time}`;
  if (/^[0-7]$/.test(dayOfWeek)) return `${CALENDAR_DAYS[Number(dayOfWeek) % 7]} *-*-* ${time}`;
  return 'weekly';
}
