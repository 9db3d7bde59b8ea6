// Failover Monitor
// Checks the primary scheduler and switches renewal to the fallback when it degrades
//
// Runs daily from cron (`tak-renewal failover check`). All decisions are made by
// the pure failover policy; this service gathers evidence and applies the result.

import { RenewalContext } from '../context';
import { FailoverOutcome, FailoverMarkers, PrimarySelection, SchedulerIssue } from '../../domain/types/types';
import { SchedulerKind, otherScheduler } from '../../domain/enums/scheduler';
import { schedulerFor } from '../../domain/ports/scheduler';
import {
  cronIssues,
  decideFailover,
  issueWeight,
  resolvePrimary,
  systemdIssues,
} from '../../domain/policies/failover/failoverPolicy';
import { FileLog } from '../../infrastructure/adapters/logging/fileLog';

export interface SchedulerHealthSummary {
  available: boolean;
  healthy: boolean;
  issues: SchedulerIssue[];
}

export interface FailoverStatus {
  domain: string | null;
  primary: PrimarySelection;
  markers: FailoverMarkers;
  schedulers: Record<SchedulerKind, SchedulerHealthSummary>;
  history: string[];
  recentLog: string[];
}

interface SchedulerEvidence {
  available: Record<SchedulerKind, boolean>;
  installed: Record<SchedulerKind, boolean>;
  active: Record<SchedulerKind, boolean>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FailoverMonitor {
  readonly log: FileLog;

  constructor(private readonly context: RenewalContext) {
    this.log = new FileLog(context.fs, context.files.failoverLog, 'Failover', context.now, context.logger);
  }

  private async gatherEvidence(): Promise<SchedulerEvidence> {
    const { cron, systemd } = this.context.schedulers;
    return {
      available: { [SchedulerKind.CRON]: await cron.isAvailable(), [SchedulerKind.SYSTEMD]: await systemd.isAvailable() },
      installed: { [SchedulerKind.CRON]: await cron.isInstalled(), [SchedulerKind.SYSTEMD]: await systemd.isInstalled() },
      active: { [SchedulerKind.CRON]: await cron.isActive(), [SchedulerKind.SYSTEMD]: await systemd.isActive() },
    };
  }

  async issuesFor(kind: SchedulerKind): Promise<SchedulerIssue[]> {
    const { cron, systemd } = this.context.schedulers;
    return kind === SchedulerKind.CRON ? cronIssues(await cron.probe()) : systemdIssues(await systemd.probe());
  }

  async check(force = false): Promise<FailoverOutcome> {
    const { markers, logger } = this.context;
    await this.log.write('INFO', force ? 'Starting forced failover check' : 'Starting failover monitoring check');

    const evidence = await this.gatherEvidence();
    const stored = await markers.readMarkers();
    const primary = resolvePrimary({ marker: stored.primary, installed: evidence.installed, active: evidence.active });
    logger.logVerbose('Failover', 'Primary resolved', { marker: stored.primary, primary, ...evidence });

    const issues = primary === 'none' ? [] : await this.issuesFor(primary);
    for (const issue of issues) {
      await this.log.write(issue.severity === 'critical' ? 'ERROR' : 'WARN', `${primary}: ${issue.message}`);
    }

    const decision = decideFailover(primary, issues, force, evidence.available);
    switch (decision.kind) {
      case 'stay':
        await this.log.write('INFO', `Primary system (${decision.primary}) health check passed (issues: ${issueWeight(issues)})`);
        return { action: 'healthy', primary, issues };

      case 'emergency':
        return this.activateEmergency(decision.candidates, evidence.available);

      case 'failover':
        await this.log.write(
          'WARN',
          decision.reason === 'forced'
            ? `Forced failover requested: ${decision.from} -> ${decision.to}`
            : `Primary system (${decision.from}) health check failed (issues: ${issueWeight(issues)}), initiating failover`
        );
        return this.switchTo(decision.from, decision.to, issues, evidence.available[decision.to]);
    }
  }

  private async switchTo(
    from: SchedulerKind,
    to: SchedulerKind,
    issues: SchedulerIssue[],
    targetAvailable: boolean
  ): Promise<FailoverOutcome> {
    const { schedulers, markers, config, notifier, logger, hostname, now } = this.context;

    if (!targetAvailable) {
      await this.log.write('ERROR', `Cannot switch to ${to} - not available`);
      await this.log.write('CRITICAL', 'Failover failed - manual intervention required');
      return { action: 'failover-failed', primary: from, from, to, issues, reason: `${to} not available` };
    }

    // The degraded primary is stopped before the fallback starts
    try {
      await schedulerFor(schedulers, from).deactivate();
    } catch (error) {
      await this.log.write('WARN', `Could not deactivate ${from}: ${errorMessage(error)}`);
    }

    try {
      await schedulerFor(schedulers, to).activate(
        to === SchedulerKind.CRON ? { schedule: config.schedules.fallback } : {}
      );
    } catch (error) {
      await this.log.write('ERROR', `Failed to activate ${to}: ${errorMessage(error)}`);
      await this.log.write('CRITICAL', 'Failover failed - manual intervention required');
      return { action: 'failover-failed', primary: from, from, to, issues, reason: errorMessage(error) };
    }

    await markers.writeRoles(to, from);
    await markers.recordFailedPrimary(from);
    await markers.appendHistory(from, to, now());
    logger.logStateTransition(from, to, { issues: issues.map(issue => issue.message) });
    await this.log.write('INFO', `Failover successful: ${from} -> ${to}`);

    const domain = config.takUri ?? 'unknown';
    await notifier.notify({
      status: 'FAILOVER',
      subject: `TAK Renewal System Failover: ${from} -> ${to}`,
      message: [
        'TAK Server LetsEncrypt renewal system failover occurred:',
        '',
        `Domain: ${domain}`,
        `Server: ${hostname}`,
        `Time: ${now().toString()}`,
        `Failed System: ${from}`,
        `Active System: ${to}`,
        '',
        'The renewal system has automatically switched to the backup method.',
        'Please investigate the primary system failure.',
      ].join('\n'),
      summary: `Renewal system failover: ${from} -> ${to}`,
      fields: { domain, old_system: from, new_system: to },
    });

    return { action: 'failed-over', primary: to, from, to, issues };
  }

  private async activateEmergency(
    candidates: SchedulerKind[],
    available: Record<SchedulerKind, boolean>
  ): Promise<FailoverOutcome> {
    const { schedulers, markers } = this.context;
    await this.log.write('ERROR', 'No active renewal system detected, attempting emergency activation');

    for (const kind of candidates) {
      try {
        await schedulerFor(schedulers, kind).activate();
      } catch (error) {
        await this.log.write('ERROR', `Emergency activation of ${kind} failed: ${errorMessage(error)}`);
        continue;
      }

      const other = otherScheduler(kind);
      await markers.writeRoles(kind, available[other] ? other : null);
      await this.log.write('INFO', `Emergency activation: ${kind} is now the primary renewal system`);
      return { action: 'emergency-activated', primary: kind, to: kind, issues: [] };
    }

    await this.log.write('CRITICAL', 'No renewal systems available - manual intervention required');
    return { action: 'no-scheduler', primary: 'none', issues: [], reason: 'No scheduler could be activated' };
  }

  async status(): Promise<FailoverStatus> {
    const { config, markers } = this.context;
    const evidence = await this.gatherEvidence();
    const stored = await markers.readMarkers();

    const summarize = async (kind: SchedulerKind): Promise<SchedulerHealthSummary> => {
      const issues = await this.issuesFor(kind);
      return { available: evidence.available[kind], healthy: issues.length === 0, issues };
    };

    return {
      domain: config.takUri,
      primary: resolvePrimary({ marker: stored.primary, installed: evidence.installed, active: evidence.active }),
      markers: stored,
      schedulers: {
        [SchedulerKind.CRON]: await summarize(SchedulerKind.CRON),
        [SchedulerKind.SYSTEMD]: await summarize(SchedulerKind.SYSTEMD),
      },
      history: await markers.readHistory(5),
      recentLog: await this.log.tail(5),
    };
  }
}
