// Port: Scheduler
// One OS scheduler able to run certificate renewal (cron or systemd)

import { SchedulerKind } from '../enums/scheduler';
import { CronProbe, SystemdProbe } from '../types/types';

export interface InstallOptions {
  schedule?: string; // cron expression; systemd derives OnCalendar= from it
}

export interface SchedulerPort<TProbe = CronProbe | SystemdProbe> {
  readonly kind: SchedulerKind;

  isAvailable(): Promise<boolean>;

  /**
   * True when the renewal job/units exist, whether or not they are running
   */
  isInstalled(): Promise<boolean>;

  /**
   * True when this scheduler will currently run renewals
   */
  isActive(): Promise<boolean>;

  install(options?: InstallOptions): Promise<void>;
  activate(options?: InstallOptions): Promise<void>;
  deactivate(): Promise<void>;
  remove(): Promise<void>;
  probe(): Promise<TProbe>;
}

export type CronSchedulerPort = SchedulerPort<CronProbe> & {
  readonly kind: SchedulerKind.CRON;
  isServiceRunning(): Promise<boolean>;
  listRenewalJobs(): Promise<string[]>;
  installMonitorJob(schedule: string): Promise<void>;
  removeMonitorJob(): Promise<void>;
  hasMonitorJob(): Promise<boolean>;
};

export type SystemdSchedulerPort = SchedulerPort<SystemdProbe> & {
  readonly kind: SchedulerKind.SYSTEMD;
  describeUnits(): Promise<string[]>;
};

export interface Schedulers {
  cron: CronSchedulerPort;
  systemd: SystemdSchedulerPort;
}

export function schedulerFor(schedulers: Schedulers, kind: SchedulerKind): SchedulerPort {
  return kind === SchedulerKind.CRON ? schedulers.cron : schedulers.systemd;
}
