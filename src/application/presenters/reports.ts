// Report rendering for the CLI: human-readable tables and JSON documents

import { CertificateReport, ComponentHealth, HealthReport } from '../../domain/types/types';
import { SchedulerKind } from '../../domain/enums/scheduler';
import { FailoverStatus } from '../services/failoverMonitor';
import { RenewalSystemStatus } from '../services/renewalSystem';

const COMPONENT_LABELS: Array<[keyof HealthReport['components'], string]> = [
  ['cron', 'Cron'],
  ['systemd', 'Systemd'],
  ['certificates', 'Certificates'],
  ['logs', 'Logs'],
];

function componentLine(label: string, component: ComponentHealth): string {
  const score = String(component.score).padStart(2, ' ');
  return `  ${label.padEnd(12)}: ${component.status.padEnd(8)} (${score}/100) - ${component.details.join(', ')}`;
}

export function renderHealthText(report: HealthReport): string[] {
  const { overall } = report;
  const lines = [
    'TAK Server Renewal System Health Check',
    '======================================',
    `Timestamp: ${report.timestamp}`,
    `Hostname: ${report.hostname}`,
    '',
    `Overall Status: ${overall.status} (${overall.healthPercentage}% healthy)`,
    `Total Score: ${overall.totalScore}/${overall.maxScore}`,
    '',
    'Component Status:',
    ...COMPONENT_LABELS.map(([key, label]) => componentLine(label, report.components[key])),
  ];

  if (report.recommendations.length > 0) {
    lines.push('', 'Recommendations:', ...report.recommendations.map(item => `  - ${item}`));
  }
  return lines;
}

export function renderHealthJson(report: HealthReport): string {
  const components = Object.fromEntries(
    COMPONENT_LABELS.map(([key]) => {
      const component = report.components[key];
      return [key, { status: component.status, score: component.score, details: component.details.join(', ') }];
    })
  );

  return JSON.stringify(
    {
      timestamp: report.timestamp,
      hostname: report.hostname,
      overall: {
        status: report.overall.status,
        health_percentage: report.overall.healthPercentage,
        score: `${report.overall.totalScore}/${report.overall.maxScore}`,
      },
      components,
      recommendations: report.recommendations,
    },
    null,
    2
  );
}

export function renderCertificateText(report: CertificateReport): string[] {
  const lines = [
    'Certificate Expiry Check',
    '========================',
    `Domain: ${report.domain ?? '(not configured)'}`,
    `Warning threshold: ${report.warnDays} days`,
    '',
  ];

  for (const cert of report.certificates) {
    lines.push(`${cert.name}: ${cert.state}`);
    lines.push(`  Path: ${cert.path}`);
    if (cert.expiresAt !== null && cert.daysLeft !== null) {
      lines.push(`  Expires: ${cert.expiresAt} (${cert.daysLeft} days)`);
    }
  }
  for (const note of report.notes) {
    lines.push(`Note: ${note}`);
  }
  return lines;
}

export function renderCertificateJson(report: CertificateReport): string {
  return JSON.stringify(
    {
      timestamp: report.timestamp,
      hostname: report.hostname,
      domain: report.domain,
      warn_days: report.warnDays,
      certificates: report.certificates.map(cert => ({
        name: cert.name,
        path: cert.path,
        status: cert.state,
        expires: cert.expiresAt,
        days_left: cert.daysLeft,
      })),
      notes: report.notes,
    },
    null,
    2
  );
}

export function renderFailoverStatus(status: FailoverStatus): string[] {
  const lines = [
    'TAK Server Renewal Failover Status',
    '==================================',
    `Domain: ${status.domain ?? '(not configured)'}`,
    `Primary System: ${status.primary}`,
    `Fallback System: ${status.markers.fallback ?? 'none'}`,
  ];
  if (status.markers.failedPrimary) {
    lines.push(`Last Failed Primary: ${status.markers.failedPrimary}`);
  }

  lines.push('', 'System Health:');
  for (const kind of [SchedulerKind.CRON, SchedulerKind.SYSTEMD]) {
    const summary = status.schedulers[kind];
    const state = !summary.available ? 'UNAVAILABLE' : summary.healthy ? 'HEALTHY' : `ISSUES (${summary.issues.length})`;
    lines.push(`  ${kind.padEnd(8)}: ${state}`);
    for (const issue of summary.issues) {
      lines.push(`    - ${issue.message}`);
    }
  }

  lines.push('', 'Recent Failover History:');
  lines.push(...(status.history.length > 0 ? status.history.map(line => `  ${line}`) : ['  No failover events recorded']));

  lines.push('', 'Recent Log Entries:');
  lines.push(...(status.recentLog.length > 0 ? status.recentLog.map(line => `  ${line}`) : ['  No log entries']));
  return lines;
}

export function renderSystemStatus(status: RenewalSystemStatus): string[] {
  const lines = [
    'TAK Server Dual Renewal System Status',
    '=====================================',
    `Domain: ${status.domain ?? '(not configured)'}`,
    `LetsEncrypt: ${status.letsencrypt ? 'enabled' : 'disabled'}`,
    '',
  ];

  if (!status.configured) {
    lines.push('Renewal system: Not configured', "Run 'tak-renewal system setup' to configure it");
  } else {
    lines.push(`Primary: ${status.primary} (${status.primaryDetail})`);
    lines.push(`Fallback: ${status.fallback ? `${status.fallback} (Standby)` : 'none'}`);
  }
  lines.push(`Monitoring: ${status.monitoring ? 'Daily failover check scheduled' : 'Not scheduled'}`);

  lines.push('', 'Recent Log Entries:');
  lines.push(...(status.recentLog.length > 0 ? status.recentLog.map(line => `  ${line}`) : ['  No log entries']));
  return lines;
}
