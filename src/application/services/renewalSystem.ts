// Renewal System Service
// Installs cron as primary and systemd as standby fallback, plus the daily failover monitor

import { RenewalContext } from '../context';
import { PrimarySelection } from '../../domain/types/types';
import { SchedulerKind } from '../../domain/enums/scheduler';
import { SchedulerUnavailableError } from '../../domain/errors';
import { resolvePrimary } from '../../domain/policies/failover/failoverPolicy';
import { validateCronSchedule } from '../../domain/schedulers/crontab';
import { assertLetsEncryptConfigured } from '../../config/renewalConfig';
import { FileLog } from '../../infrastructure/adapters/logging/fileLog';

export interface SetupResult {
  primary: SchedulerKind;
  fallback: SchedulerKind | null;
  monitoring: boolean;
}

export interface RemoveResult {
  warnings: string[];
}

export interface RenewalSystemStatus {
  domain: string | null;
  letsencrypt: boolean;
  configured: boolean;
  primary: PrimarySelection;
  primaryDetail: string;
  fallback: SchedulerKind | null;
  monitoring: boolean;
  recentLog: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RenewalSystemService {
  readonly log: FileLog;

  constructor(private readonly context: RenewalContext) {
    this.log = new FileLog(context.fs, context.files.systemLog, 'RenewalSystem', context.now, context.logger);
  }

  async setup(primarySchedule?: string, fallbackSchedule?: string): Promise<SetupResult> {
    const { config, schedulers, markers } = this.context;
    assertLetsEncryptConfigured(config);
    const primaryCron = validateCronSchedule(primarySchedule ?? config.schedules.primary);
    const fallbackCron = validateCronSchedule(fallbackSchedule ?? config.schedules.fallback);

    await this.log.write('INFO', `Setting up dual renewal system for domain: ${config.takUri}`);

    const cronAvailable = await schedulers.cron.isAvailable();
    const systemdAvailable = await schedulers.systemd.isAvailable();
    await this.log.write('INFO', `Cron available: ${cronAvailable ? 'yes' : 'no'}`);
    await this.log.write('INFO', `Systemd available: ${systemdAvailable ? 'yes' : 'no'}`);

    let result: SetupResult;
    if (cronAvailable && systemdAvailable) {
      await this.log.write('INFO', 'Setting up cron as primary renewal method');
      await schedulers.cron.install({ schedule: primaryCron });
      await this.log.write('INFO', 'Setting up systemd as fallback renewal method');
      await schedulers.systemd.install({ schedule: fallbackCron });
      await schedulers.systemd.deactivate();
      result = { primary: SchedulerKind.CRON, fallback: SchedulerKind.SYSTEMD, monitoring: false };
    } else if (cronAvailable) {
      await this.log.write('WARN', 'Only cron available, setting up cron as primary (no fallback)');
      await schedulers.cron.install({ schedule: primaryCron });
      result = { primary: SchedulerKind.CRON, fallback: null, monitoring: false };
    } else if (systemdAvailable) {
      await this.log.write('WARN', 'Only systemd available, setting up systemd as primary (no fallback)');
      await schedulers.systemd.install({ schedule: primaryCron });
      result = { primary: SchedulerKind.SYSTEMD, fallback: null, monitoring: false };
    } else {
      await this.log.write('ERROR', 'Neither cron nor systemd available for scheduling');
      throw new SchedulerUnavailableError(null);
    }

    await markers.writeRoles(result.primary, result.fallback);

    if (cronAvailable) {
      await schedulers.cron.installMonitorJob(config.schedules.monitor);
      await this.log.write('INFO', 'Health monitoring configured');
      result.monitoring = true;
    } else {
      await this.log.write('WARN', 'Cron not available - failover monitoring not scheduled');
    }

    await this.log.write('INFO', 'Dual renewal system setup completed');
    return result;
  }

  async remove(): Promise<RemoveResult> {
    const { schedulers, markers } = this.context;
    await this.log.write('INFO', 'Removing dual renewal system');

    const warnings: string[] = [];
    const attempt = async (label: string, step: () => Promise<void>): Promise<void> => {
      try {
        await step();
      } catch (error) {
        const message = `${label} failed: ${errorMessage(error)}`;
        warnings.push(message);
        await this.log.write('WARN', message);
      }
    };

    if (await schedulers.cron.isAvailable()) {
      await attempt('Cron removal', () => schedulers.cron.remove());
      await attempt('Monitoring job removal', () => schedulers.cron.removeMonitorJob());
    }
    if (await schedulers.systemd.isAvailable()) {
      await attempt('Systemd removal', () => schedulers.systemd.remove());
    }
    await markers.clear();

    await this.log.write('INFO', 'Dual renewal system removed');
    return { warnings };
  }

  async status(): Promise<RenewalSystemStatus> {
    const { config, files, fs, schedulers, markers } = this.context;
    const { cron, systemd } = schedulers;

    const configured = await fs.exists(files.primaryMarker);
    const stored = await markers.readMarkers();
    const cronInstalled = await cron.isInstalled();
    const systemdInstalled = await systemd.isInstalled();
    const primary = resolvePrimary({
      marker: stored.primary,
      installed: { [SchedulerKind.CRON]: cronInstalled, [SchedulerKind.SYSTEMD]: systemdInstalled },
      active: { [SchedulerKind.CRON]: await cron.isActive(), [SchedulerKind.SYSTEMD]: await systemd.isActive() },
    });

    let primaryDetail = 'Not detected';
    if (primary === SchedulerKind.CRON) {
      primaryDetail = `${(await cron.listRenewalJobs()).length} job(s) configured`;
    } else if (primary === SchedulerKind.SYSTEMD) {
      primaryDetail = (await systemd.isActive()) ? 'Timer active' : 'Timer inactive';
    }

    return {
      domain: config.takUri,
      letsencrypt: config.letsencrypt,
      configured,
      primary,
      primaryDetail,
      fallback: stored.fallback,
      monitoring: (await cron.isAvailable()) && (await cron.hasMonitorJob()),
      recentLog: await this.log.tail(5),
    };
  }
}
