// Failover policy
// Decides which scheduler is primary and whether to switch to the fallback

import { SchedulerKind, otherScheduler } from '../../enums/scheduler';
import { CronProbe, PrimarySelection, SchedulerIssue, SystemdProbe } from '../../types/types';

export const UNAVAILABLE_WEIGHT = 10;
export const CRON_STALE_DAYS = 14;

/** Order in which schedulers are tried when nothing is active */
export const EMERGENCY_ORDER: readonly SchedulerKind[] = [SchedulerKind.SYSTEMD, SchedulerKind.CRON];

function critical(message: string, weight = 1): SchedulerIssue {
  return { severity: 'critical', message, weight };
}

function warning(message: string): SchedulerIssue {
  return { severity: 'warning', message, weight: 1 };
}

export function cronIssues(probe: CronProbe): SchedulerIssue[] {
  if (!probe.available) {
    return [critical('Cron not available', UNAVAILABLE_WEIGHT)];
  }

  const issues: SchedulerIssue[] = [];
  if (!probe.serviceRunning) {
    issues.push(critical('Cron service is not running'));
  }
  if (probe.jobCount === 0) {
    issues.push(critical('LetsEncrypt cron job not found'));
  }
  if (probe.lastRunAgeDays !== null && probe.lastRunAgeDays > CRON_STALE_DAYS) {
    issues.push(warning(`Cron last executed ${probe.lastRunAgeDays} days ago (may be stale)`));
  }
  return issues;
}

export function systemdIssues(probe: SystemdProbe): SchedulerIssue[] {
  if (!probe.available) {
    return [critical('Systemd not available', UNAVAILABLE_WEIGHT)];
  }

  const issues: SchedulerIssue[] = [];
  if (!probe.timerActive) {
    issues.push(critical('Systemd timer is not active'));
  }
  if (!probe.timerEnabled) {
    issues.push(critical('Systemd timer is not enabled'));
  }
  if (probe.serviceState === 'failed') {
    issues.push(critical('Systemd service is in failed state'));
  }
  return issues;
}

export function issueWeight(issues: SchedulerIssue[]): number {
  return issues.reduce((sum, issue) => sum + issue.weight, 0);
}

export function hasCriticalIssue(issues: SchedulerIssue[]): boolean {
  return issues.some(issue => issue.severity === 'critical');
}

export interface PrimaryEvidence {
  marker: SchedulerKind | null;
  installed: Record<SchedulerKind, boolean>;
  active: Record<SchedulerKind, boolean>;
}

/**
 * The marker wins while its scheduler is still installed; otherwise fall back
 * to whatever is live, cron first.
 */
export function resolvePrimary(evidence: PrimaryEvidence): PrimarySelection {
  if (evidence.marker && evidence.installed[evidence.marker]) {
    return evidence.marker;
  }
  if (evidence.active[SchedulerKind.CRON]) return SchedulerKind.CRON;
  if (evidence.active[SchedulerKind.SYSTEMD]) return SchedulerKind.SYSTEMD;
  return 'none';
}

export type FailoverDecision =
  | { kind: 'stay'; primary: SchedulerKind }
  | { kind: 'failover'; from: SchedulerKind; to: SchedulerKind; reason: 'forced' | 'unhealthy' }
  | { kind: 'emergency'; candidates: SchedulerKind[] };

export function decideFailover(
  primary: PrimarySelection,
  issues: SchedulerIssue[],
  force: boolean,
  available: Record<SchedulerKind, boolean>
): FailoverDecision {
  if (primary === 'none') {
    return { kind: 'emergency', candidates: EMERGENCY_ORDER.filter(kind => available[kind]) };
  }
  if (force) {
    return { kind: 'failover', from: primary, to: otherScheduler(primary), reason: 'forced' };
  }
  if (hasCriticalIssue(issues)) {
    return { kind: 'failover', from: primary, to: otherScheduler(primary), reason: 'unhealthy' };
  }
  return { kind: 'stay', primary };
}
