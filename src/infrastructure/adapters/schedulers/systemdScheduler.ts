// systemd scheduler - letsencrypt-renewal.service driven by letsencrypt-renewal.timer

import * as path from 'path';
import { InstallOptions, SystemdSchedulerPort } from '../../../domain/ports/scheduler';
import { CommandExecutorPort } from '../../../domain/ports/commandExecutor';
import { FileSystemPort } from '../../../domain/ports/fileSystem';
import { LoggerPort } from '../../../domain/ports/logger';
import { SchedulerKind } from '../../../domain/enums/scheduler';
import { SystemdProbe } from '../../../domain/types/types';
import { CommandFailedError, SchedulerUnavailableError } from '../../../domain/errors';
import {
  RENEWAL_SERVICE_UNIT,
  RENEWAL_TIMER_UNIT,
  onCalendarFor,
  renderServiceUnit,
  renderTimerUnit,
} from '../../../domain/schedulers/systemdUnits';
import { RenewalConfig, hookCommand } from '../../../config/renewalConfig';
import { LoggerAdapter } from '../logging/loggerAdapter';

const UNSCHEDULED_VALUES = new Set(['', 'n/a', '0']);

export class SystemdScheduler implements SystemdSchedulerPort {
  readonly kind = SchedulerKind.SYSTEMD as const;
  private readonly serviceFile: string;
  private readonly timerFile: string;

  constructor(
    private readonly executor: CommandExecutorPort,
    private readonly fs: FileSystemPort,
    private readonly config: RenewalConfig,
    private readonly logger: LoggerPort = new LoggerAdapter()
  ) {
    this.serviceFile = path.join(config.paths.systemdUnitDir, RENEWAL_SERVICE_UNIT);
    this.timerFile = path.join(config.paths.systemdUnitDir, RENEWAL_TIMER_UNIT);
  }

  private async systemctl(args: string[], failure?: string): Promise<boolean> {
    const result = await this.executor.run('systemctl', args);
    if (!result.passed && failure) {
      throw new CommandFailedError(failure, result);
    }
    return result.passed;
  }

  private async showProperty(unit: string, property: string): Promise<string | null> {
    const result = await this.executor.run('systemctl', ['show', unit, `--property=${property}`, '--value']);
    return result.passed ? result.stdout.trim() : null;
  }

  async isAvailable(): Promise<boolean> {
    return this.systemctl(['--version']);
  }

  async isInstalled(): Promise<boolean> {
    return (await this.fs.exists(this.serviceFile)) && (await this.fs.exists(this.timerFile));
  }

  async isTimerActive(): Promise<boolean> {
    return this.systemctl(['is-active', '--quiet', RENEWAL_TIMER_UNIT]);
  }

  async isTimerEnabled(): Promise<boolean> {
    return this.systemctl(['is-enabled', '--quiet', RENEWAL_TIMER_UNIT]);
  }

  async isActive(): Promise<boolean> {
    return (await this.isTimerActive()) && (await this.isTimerEnabled());
  }

  private async enableAndStart(): Promise<void> {
    await this.systemctl(['enable', RENEWAL_TIMER_UNIT], 'Failed to enable LetsEncrypt renewal timer');
    this.logger.log('Systemd', 'LetsEncrypt renewal timer enabled');
    await this.systemctl(['start', RENEWAL_TIMER_UNIT], 'Failed to start LetsEncrypt renewal timer');
    this.logger.log('Systemd', 'LetsEncrypt renewal timer started');
  }

  async install(options: InstallOptions = {}): Promise<void> {
    if (!(await this.isAvailable())) {
      throw new SchedulerUnavailableError(SchedulerKind.SYSTEMD, 'systemd not available on this system');
    }

    this.logger.log('Systemd', `Creating systemd service file: ${this.serviceFile}`);
    await this.fs.writeFile(
      this.serviceFile,
      renderServiceUnit({ certbot: this.config.paths.certbot, hook: hookCommand(this.config) }),
      0o644
    );
    this.logger.log('Systemd', `Creating systemd timer file: ${this.timerFile}`);
    await this.fs.writeFile(this.timerFile, renderTimerUnit({ onCalendar: onCalendarFor(options.schedule) }), 0o644);

    await this.systemctl(['daemon-reload'], 'Failed to reload systemd units');
    await this.enableAndStart();
  }

  async activate(options: InstallOptions = {}): Promise<void> {
    if (!(await this.isInstalled())) {
      await this.install(options);
      return;
    }
    await this.enableAndStart();
  }

  async deactivate(): Promise<void> {
    // stop/disable fail harmlessly on a timer that is already stopped or unknown
    if (!(await this.systemctl(['stop', RENEWAL_TIMER_UNIT]))) {
      this.logger.logVerbose('Systemd', 'Timer stop reported failure', { unit: RENEWAL_TIMER_UNIT });
    }
    if (!(await this.systemctl(['disable', RENEWAL_TIMER_UNIT]))) {
      this.logger.logVerbose('Systemd', 'Timer disable reported failure', { unit: RENEWAL_TIMER_UNIT });
    }
    this.logger.log('Systemd', 'LetsEncrypt renewal timer stopped and disabled');
  }

  async remove(): Promise<void> {
    if (await this.isTimerActive()) {
      await this.systemctl(['stop', RENEWAL_TIMER_UNIT], 'Failed to stop LetsEncrypt renewal timer');
    }
    if (await this.isTimerEnabled()) {
      await this.systemctl(['disable', RENEWAL_TIMER_UNIT], 'Failed to disable LetsEncrypt renewal timer');
    }

    await this.fs.remove(this.serviceFile);
    await this.fs.remove(this.timerFile);

    await this.systemctl(['daemon-reload'], 'Failed to reload systemd units');
    await this.systemctl(['reset-failed']);
    this.logger.log('Systemd', 'LetsEncrypt systemd components removed');
  }

  async probe(): Promise<SystemdProbe> {
    if (!(await this.isAvailable())) {
      return { available: false, timerActive: false, timerEnabled: false, serviceState: 'unknown', nextRun: null };
    }

    const nextRun = await this.showProperty(RENEWAL_TIMER_UNIT, 'NextElapseUSecRealtime');
    return {
      available: true,
      timerActive: await this.isTimerActive(),
      timerEnabled: await this.isTimerEnabled(),
      serviceState: (await this.showProperty(RENEWAL_SERVICE_UNIT, 'ActiveState')) || 'unknown',
      nextRun: nextRun === null || UNSCHEDULED_VALUES.has(nextRun) ? null : nextRun,
    };
  }

  async describeUnits(): Promise<string[]> {
    if (!(await this.isInstalled())) {
      return ['Systemd timer not configured'];
    }

    const sections: Array<[string, string, string[]]> = [
      ['Timer status:', 'systemctl', ['status', RENEWAL_TIMER_UNIT, '--no-pager']],
      ['Service status:', 'systemctl', ['status', RENEWAL_SERVICE_UNIT, '--no-pager']],
      ['Next scheduled run:', 'systemctl', ['list-timers', RENEWAL_TIMER_UNIT, '--no-pager']],
      ['Recent logs:', 'journalctl', ['-u', RENEWAL_SERVICE_UNIT, '--no-pager', '-n', '10']],
    ];

    const lines: string[] = [];
    for (const [title, command, args] of sections) {
      // `systemctl status` exits 3 for inactive units but still prints the status
      const result = await this.executor.run(command, args);
      lines.push(title, result.stdout || result.stderr || '(no output)', '');
    }
    return lines;
  }
}
