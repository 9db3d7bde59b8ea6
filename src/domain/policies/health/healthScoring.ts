// Health scoring for the renewal machinery
// Each component scores 0-100 in steps of 25; the overall score is out of 400

import {
  CertificateProbe,
  ComponentHealth,
  CronProbe,
  HealthReport,
  HealthStatus,
  RenewalLogProbe,
  SystemdProbe,
} from '../../types/types';

type GradedStatus = 'HEALTHY' | 'WARNING' | 'CRITICAL';

const SEVERITY: Record<GradedStatus, number> = {
  HEALTHY: 0,
  WARNING: 1,
  CRITICAL: 2,
};

export const COMPONENT_MAX_SCORE = 100;
export const FRESH_RUN_DAYS = 8;
export const CERT_COMFORT_DAYS = 30;
export const CERT_WARNING_DAYS = 14;

/**
 * Accumulates points and forced statuses for one component.
 * A forced status only ever escalates; without one the score decides.
 */
class ComponentScore {
  private score = 0;
  private forced: GradedStatus | null = null;
  private readonly details: string[] = [];

  add(points: number, detail?: string): this {
    this.score += points;
    if (detail) this.details.push(detail);
    return this;
  }

  note(detail: string): this {
    this.details.push(detail);
    return this;
  }

  force(status: GradedStatus, detail?: string): this {
    if (this.forced === null || SEVERITY[status] > SEVERITY[this.forced]) {
      this.forced = status;
    }
    if (detail) this.details.push(detail);
    return this;
  }

  result(): ComponentHealth {
    return {
      status: this.forced ?? statusFromScore(this.score),
      score: this.score,
      details: [...this.details],
    };
  }
}

export function statusFromScore(score: number): GradedStatus {
  if (score >= 75) return 'HEALTHY';
  if (score >= 50) return 'WARNING';
  return 'CRITICAL';
}

/**
 * A host without crontab probes as stopped with no jobs, so it scores CRITICAL
 * like any other broken cron setup.
 */
export function scoreCron(probe: CronProbe): ComponentHealth {
  const component = new ComponentScore();

  if (probe.serviceRunning) {
    component.add(25, 'Cron service: RUNNING');
  } else {
    component.force('CRITICAL', 'Cron service: STOPPED');
  }

  if (probe.jobCount > 0) {
    component.add(25, `Jobs: ${probe.jobCount} configured`);
  } else {
    component.force('CRITICAL', 'Jobs: NONE');
  }

  if (probe.lastRunAgeDays === null) {
    component.note('Last run: UNKNOWN');
  } else if (probe.lastRunAgeDays < FRESH_RUN_DAYS) {
    component.add(25, `Last run: ${probe.lastRunAgeDays}d ago`);
  } else {
    component.force('WARNING', `Last run: ${probe.lastRunAgeDays}d ago (STALE)`);
  }

  if (probe.hookAccessible) {
    component.add(25, 'Hook: ACCESSIBLE');
  } else {
    component.force('CRITICAL', 'Hook: INACCESSIBLE');
  }

  return component.result();
}

export function scoreSystemd(probe: SystemdProbe): ComponentHealth {
  if (!probe.available) {
    return { status: 'UNAVAILABLE', score: 0, details: ['Systemd not available'] };
  }

  const component = new ComponentScore();

  if (probe.timerActive) {
    component.add(25, 'Timer: ACTIVE');
  } else {
    component.note('Timer: INACTIVE');
  }

  if (probe.timerEnabled) {
    component.add(25, 'Enabled: YES');
  } else {
    component.note('Enabled: NO');
  }

  component.note(`Service: ${probe.serviceState}`);
  if (probe.serviceState !== 'failed') {
    component.add(25);
  }

  if (probe.nextRun) {
    component.add(25, `Next: ${probe.nextRun}`);
  } else {
    component.note('Next: UNSCHEDULED');
  }

  return component.result();
}

export function scoreCertificates(probe: CertificateProbe): ComponentHealth {
  if (!probe.enabled) {
    return { status: 'DISABLED', score: 0, details: ['LetsEncrypt not configured'] };
  }

  const component = new ComponentScore();

  if (!probe.liveDirExists) {
    return component.force('CRITICAL', 'Certificates: MISSING').result();
  }

  component.add(25, 'Certificates: EXIST');

  if (!probe.certFileExists) {
    component.note('File: MISSING');
  } else if (probe.daysLeft === null) {
    component.note('Expires: UNREADABLE');
  } else {
    const days = probe.daysLeft;
    if (days > CERT_COMFORT_DAYS) {
      component.add(50, `Expires: ${days}d`);
    } else if (days > CERT_WARNING_DAYS) {
      component.add(25).force('WARNING', `Expires: ${days}d`);
    } else if (days > 0) {
      component.force('CRITICAL', `Expires: ${days}d`);
    } else {
      component.force('CRITICAL', `Expires: ${days}d (EXPIRED)`);
    }
  }

  if (probe.takIntegrated) {
    component.add(25, 'TAK: INTEGRATED');
  } else {
    component.note('TAK: NOT_INTEGRATED');
  }

  return component.result();
}

export function scoreRenewalLog(probe: RenewalLogProbe): ComponentHealth {
  const component = new ComponentScore();

  if (!probe.exists) {
    return component.note('Log: MISSING').result();
  }

  component.add(25, 'Log: EXISTS');

  if (probe.lastActivityAgeDays !== null) {
    component.note(`Last: ${probe.lastActivityAgeDays}d ago`);
    if (probe.lastActivityAgeDays < FRESH_RUN_DAYS) {
      component.add(25);
    }
  }

  const { errorCount, successCount } = probe;
  component.note(`Errors: ${errorCount}`).note(`Success: ${successCount}`);

  if (errorCount === 0 && successCount > 0) {
    component.add(50);
  } else if (errorCount > 0 && successCount > errorCount) {
    component.add(25).force('WARNING');
  } else if (errorCount > 0) {
    component.force('CRITICAL');
  }

  return component.result();
}

export interface ScoredComponents {
  cron: ComponentHealth;
  systemd: ComponentHealth;
  certificates: ComponentHealth;
  logs: ComponentHealth;
}

export function rollUp(components: ScoredComponents): HealthReport['overall'] {
  const parts = [components.cron, components.systemd, components.certificates, components.logs];
  const totalScore = parts.reduce((sum, part) => sum + part.score, 0);
  const maxScore = parts.length * COMPONENT_MAX_SCORE;
  const healthPercentage = Math.floor((totalScore * 100) / maxScore);

  let status: HealthStatus = 'HEALTHY';
  if (healthPercentage < 60) {
    status = 'CRITICAL';
  } else if (healthPercentage < 80) {
    status = 'WARNING';
  }

  if (components.certificates.status === 'CRITICAL') {
    status = 'CRITICAL';
  }

  return { status, healthPercentage, totalScore, maxScore };
}

export function recommendationsFor(components: ScoredComponents, overall: HealthStatus, renewalLogPath: string): string[] {
  if (overall === 'HEALTHY') return [];

  const recommendations: string[] = [];
  if (components.certificates.status === 'CRITICAL') {
    recommendations.push('Certificate issues detected - run certificate renewal immediately');
  }
  if (components.cron.status === 'CRITICAL') {
    recommendations.push('Cron system issues - check cron service and job configuration');
  }
  if (components.systemd.status === 'CRITICAL' && components.cron.status === 'CRITICAL') {
    recommendations.push('Both renewal systems failing - manual intervention required');
  }
  if (components.logs.status === 'CRITICAL') {
    recommendations.push(`Check renewal logs for errors: tail -f ${renewalLogPath}`);
  }
  return recommendations;
}

/**
 * Process exit code for a health status: 0 healthy, 1 warning, 2 critical, 3 anything else
 */
export function exitCodeFor(status: HealthStatus | 'ERROR'): number {
  switch (status) {
    case 'HEALTHY':
      return 0;
    case 'WARNING':
      return 1;
    case 'CRITICAL':
      return 2;
    default:
      return 3;
  }
}
