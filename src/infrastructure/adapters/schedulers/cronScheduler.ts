// Cron scheduler - renewal job and failover monitor job in root's crontab

import { CronSchedulerPort, InstallOptions } from '../../../domain/ports/scheduler';
import { CommandExecutorPort } from '../../../domain/ports/commandExecutor';
import { FileSystemPort } from '../../../domain/ports/fileSystem';
import { LoggerPort } from '../../../domain/ports/logger';
import { SchedulerKind } from '../../../domain/enums/scheduler';
import { CronProbe } from '../../../domain/types/types';
import { CommandFailedError } from '../../../domain/errors';
import {
  buildMonitorJob,
  buildRenewalJob,
  describeSchedule,
  isMonitorJob,
  isRenewalJob,
  parseCrontab,
  serializeCrontab,
  withoutJobs,
} from '../../../domain/schedulers/crontab';
import { wholeDaysBetween } from '../../../domain/time/dates';
import { RenewalConfig, RenewalFiles, hookCommand, monitorCommand, renewalFiles } from '../../../config/renewalConfig';
import { LoggerAdapter } from '../logging/loggerAdapter';

const CRON_SERVICE_NAMES = ['cron', 'crond'];

export class CronScheduler implements CronSchedulerPort {
  readonly kind = SchedulerKind.CRON as const;
  private readonly files: RenewalFiles;

  constructor(
    private readonly executor: CommandExecutorPort,
    private readonly fs: FileSystemPort,
    private readonly config: RenewalConfig,
    private readonly logger: LoggerPort = new LoggerAdapter(),
    private readonly now: () => Date = () => new Date()
  ) {
    this.files = renewalFiles(config.paths);
  }

  private async readCrontab(): Promise<string[]> {
    const result = await this.executor.run('crontab', ['-l']);
    if (!result.passed) {
      // `crontab -l` exits 1 when the user has no crontab yet
      this.logger.logVerbose('Cron', 'No readable crontab, treating as empty', { stderr: result.stderr });
      return [];
    }
    return parseCrontab(result.stdout);
  }

  private async writeCrontab(lines: string[]): Promise<void> {
    const result = await this.executor.run('crontab', ['-'], { input: serializeCrontab(lines) });
    if (!result.passed) {
      throw new CommandFailedError('Failed to write crontab', result);
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.executor.commandExists('crontab');
  }

  async isServiceRunning(): Promise<boolean> {
    for (const name of CRON_SERVICE_NAMES) {
      if ((await this.executor.run('systemctl', ['is-active', '--quiet', name])).passed) return true;
      if ((await this.executor.run('service', [name, 'status'])).passed) return true;
    }
    return false;
  }

  async listRenewalJobs(): Promise<string[]> {
    return (await this.readCrontab()).filter(isRenewalJob);
  }

  async isInstalled(): Promise<boolean> {
    return (await this.listRenewalJobs()).length > 0;
  }

  async isActive(): Promise<boolean> {
    return (await this.isInstalled()) && (await this.isServiceRunning());
  }

  async install(options: InstallOptions = {}): Promise<void> {
    const schedule = options.schedule ?? this.config.schedules.primary;
    const job = buildRenewalJob(schedule, this.config.paths.certbot, hookCommand(this.config), this.files.cronLog);
    const lines = await this.readCrontab();

    if (lines.some(isRenewalJob)) {
      this.logger.log('Cron', 'LetsEncrypt renewal cron job already exists, skipping');
    } else {
      this.logger.log('Cron', `Adding cron job: ${job}`);
      await this.writeCrontab([...lines, job]);
      this.logger.log('Cron', `Cron job will run: ${describeSchedule(schedule)}`);
    }

    for (const logFile of [this.files.renewalLog, this.files.cronLog]) {
      await this.fs.touch(logFile);
      await this.fs.chmod(logFile, 0o644);
    }
  }

  async activate(options: InstallOptions = {}): Promise<void> {
    await this.install(options);
  }

  async deactivate(): Promise<void> {
    const lines = await this.readCrontab();
    const remaining = withoutJobs(lines, isRenewalJob);
    if (remaining.length === lines.length) {
      this.logger.logVerbose('Cron', 'No renewal job to remove');
      return;
    }
    await this.writeCrontab(remaining);
    this.logger.log('Cron', `Removed ${lines.length - remaining.length} renewal cron job(s)`);
  }

  async remove(): Promise<void> {
    await this.deactivate();
  }

  async probe(): Promise<CronProbe> {
    const hookAccessible = await this.fs.isExecutable(this.config.paths.binary);
    if (!(await this.isAvailable())) {
      return { available: false, serviceRunning: false, jobCount: 0, lastRunAgeDays: null, hookAccessible };
    }

    const cronLog = await this.fs.stat(this.files.cronLog);
    return {
      available: true,
      serviceRunning: await this.isServiceRunning(),
      jobCount: (await this.listRenewalJobs()).length,
      lastRunAgeDays: cronLog ? wholeDaysBetween(cronLog.mtime, this.now()) : null,
      hookAccessible,
    };
  }

  async installMonitorJob(schedule: string): Promise<void> {
    const job = buildMonitorJob(schedule, monitorCommand(this.config), this.files.systemLog);
    const lines = withoutJobs(await this.readCrontab(), isMonitorJob);
    await this.writeCrontab([...lines, job]);
    this.logger.log('Cron', `Health monitoring job installed: ${describeSchedule(schedule)}`);
  }

  async removeMonitorJob(): Promise<void> {
    const lines = await this.readCrontab();
    const remaining = withoutJobs(lines, isMonitorJob);
    if (remaining.length !== lines.length) {
      await this.writeCrontab(remaining);
    }
  }

  async hasMonitorJob(): Promise<boolean> {
    return (await this.readCrontab()).some(isMonitorJob);
  }
}
