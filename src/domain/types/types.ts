// Type definitions for the renewal system, health reports and failover state

import { SchedulerKind } from '../enums/scheduler';

export type HealthStatus = 'HEALTHY' | 'WARNING' | 'CRITICAL' | 'UNAVAILABLE' | 'DISABLED';

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  passed: boolean;
}

export interface ComponentHealth {
  status: HealthStatus;
  score: number; // 0-100
  details: string[];
}

export interface CronProbe {
  available: boolean;
  serviceRunning: boolean;
  jobCount: number;
  lastRunAgeDays: number | null; // null when the cron log has never been written
  hookAccessible: boolean;
}

export interface SystemdProbe {
  available: boolean;
  timerActive: boolean;
  timerEnabled: boolean;
  serviceState: string; // ActiveState of the renewal service, 'unknown' when unreadable
  nextRun: string | null;
}

export interface CertificateProbe {
  enabled: boolean;
  liveDirExists: boolean;
  certFileExists: boolean;
  daysLeft: number | null; // null when the expiry could not be read
  takIntegrated: boolean;
}

export interface RenewalLogProbe {
  exists: boolean;
  lastActivityAgeDays: number | null;
  errorCount: number;
  successCount: number;
}

export interface HealthReport {
  timestamp: string;
  hostname: string;
  overall: {
    status: HealthStatus;
    healthPercentage: number;
    totalScore: number;
    maxScore: number;
  };
  components: {
    cron: ComponentHealth;
    systemd: ComponentHealth;
    certificates: ComponentHealth;
    logs: ComponentHealth;
  };
  recommendations: string[];
}

export type IssueSeverity = 'critical' | 'warning';

export interface SchedulerIssue {
  severity: IssueSeverity;
  message: string;
  weight: number;
}

export type PrimarySelection = SchedulerKind | 'none';

export interface FailoverMarkers {
  primary: SchedulerKind | null;
  fallback: SchedulerKind | null;
  failedPrimary: SchedulerKind | null;
}

export type FailoverAction =
  | 'healthy'
  | 'failed-over'
  | 'failover-failed'
  | 'emergency-activated'
  | 'no-scheduler';

export interface FailoverOutcome {
  action: FailoverAction;
  primary: PrimarySelection;
  from?: SchedulerKind;
  to?: SchedulerKind;
  issues: SchedulerIssue[];
  reason?: string;
}

export type CertificateState = 'OK' | 'WARNING' | 'EXPIRED' | 'MISSING' | 'UNREADABLE';

export interface CertificateCheck {
  name: string;
  path: string;
  state: CertificateState;
  expiresAt: string | null;
  daysLeft: number | null;
}

export interface CertificateReport {
  timestamp: string;
  hostname: string;
  domain: string | null;
  warnDays: number;
  certificates: CertificateCheck[];
  notes: string[];
}

export type NotificationStatus = 'SUCCESS' | 'FAILED' | 'FAILOVER';

export interface Notification {
  status: NotificationStatus;
  subject: string;
  message: string; // mail body
  summary?: string; // one-line webhook message, defaults to `message`
  fields?: Record<string, string>;
}
