// Renewal Hook - certbot deploy hook
// Order: backup, import, restart TAK, notify. Import or restart failure notifies FAILED and stops.

import * as path from 'path';
import { RenewalContext } from '../context';
import { CertificateService } from './certificateService';
import { CommandFailedError, ConfigurationError } from '../../domain/errors';
import { formatCompactTimestamp } from '../../domain/time/dates';
import { assertLetsEncryptConfigured, takCertsDir } from '../../config/renewalConfig';
import { FileLog } from '../../infrastructure/adapters/logging/fileLog';

export interface HookResult {
  backup: string | null;
  restarted: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RenewalHook {
  readonly log: FileLog;

  constructor(
    private readonly context: RenewalContext,
    private readonly certificates: CertificateService = new CertificateService(context)
  ) {
    this.log = new FileLog(context.fs, context.files.renewalLog, 'RenewalHook', context.now, context.logger);
  }

  async run(): Promise<HookResult> {
    const { config, fs, notifier, hostname } = this.context;
    await this.log.write('INFO', 'Starting LetsEncrypt certificate renewal process');

    try {
      assertLetsEncryptConfigured(config);
    } catch (error) {
      await this.log.write('ERROR', errorMessage(error));
      throw error;
    }

    const liveDir = path.join(config.paths.letsencryptLiveDir, config.takUri);
    if (!(await fs.exists(liveDir))) {
      const message = `LetsEncrypt certificates not found for domain ${config.takUri}`;
      await this.log.write('ERROR', message);
      throw new ConfigurationError(message);
    }

    const backup = await this.backup();

    await this.log.write('INFO', `Importing renewed LetsEncrypt certificates for domain ${config.takUri}`);
    try {
      await this.certificates.importCertificates();
    } catch (error) {
      await this.log.write('ERROR', `Failed to import LetsEncrypt certificates: ${errorMessage(error)}`);
      await notifier.notify({
        status: 'FAILED',
        subject: `TAK Server LetsEncrypt Renewal FAILED - ${config.takUri}`,
        message: `LetsEncrypt certificate import failed for ${config.takUri} on ${hostname}. Check ${this.log.path}`,
      });
      throw error;
    }

    let restarted: boolean;
    try {
      restarted = await this.restartTak();
    } catch (error) {
      await this.log.write('ERROR', errorMessage(error));
      await notifier.notify({
        status: 'FAILED',
        subject: `TAK Server LetsEncrypt Renewal FAILED - ${config.takUri}`,
        message: `TAK Server restart failed after LetsEncrypt renewal for ${config.takUri} on ${hostname}`,
      });
      throw error;
    }

    await this.log.write('SUCCESS', 'LetsEncrypt certificate renewal completed successfully');
    await notifier.notify({
      status: 'SUCCESS',
      subject: `TAK Server LetsEncrypt Renewal SUCCESS - ${config.takUri}`,
      message: `LetsEncrypt certificates renewed successfully for ${config.takUri} on ${hostname}`,
    });

    const report = await this.certificates.check();
    for (const cert of report.certificates) {
      await this.log.write('INFO', `${cert.name}: ${cert.state}${cert.daysLeft === null ? '' : ` (${cert.daysLeft} days)`}`);
    }

    return { backup, restarted };
  }

  /**
   * Copy TAK's current certs/files aside. A failed backup is logged and renewal continues.
   */
  private async backup(): Promise<string | null> {
    const { config, fs, now } = this.context;
    const certsDir = takCertsDir(config);
    if (certsDir === null) {
      return null;
    }
    const filesDir = path.join(certsDir, 'files');
    if (!(await fs.exists(filesDir))) {
      return null;
    }

    await this.log.write('INFO', 'Backing up existing certificates');
    const destination = path.join(config.paths.backupDir, `certs-backup-${formatCompactTimestamp(now())}`);
    try {
      await fs.copyDirectory(filesDir, destination);
    } catch (error) {
      await this.log.write('WARN', `Certificate backup failed: ${errorMessage(error)}`);
      return null;
    }
    await this.log.write('INFO', `Certificates backed up to ${destination}`);
    return destination;
  }

  private async restartTak(): Promise<boolean> {
    const { config, fs, executor } = this.context;
    await this.log.write('INFO', 'Restarting TAK Server services');

    if (config.installer === 'docker') {
      const releasePath = config.releasePath ?? '';
      const composeFile = path.join(releasePath, 'docker-compose.yml');
      if (!config.releasePath || !(await fs.exists(composeFile))) {
        throw new ConfigurationError(`docker-compose.yml not found in ${releasePath}, TAK Server not restarted`);
      }
      const result = await executor.run('docker', ['compose', '-f', composeFile, 'restart', 'tak-server'], {
        cwd: config.releasePath,
      });
      if (!result.passed) {
        throw new CommandFailedError('Failed to restart TAK Server container', result);
      }
      await this.log.write('INFO', 'TAK Server container restarted');
      return true;
    }

    if (config.installer === 'ubuntu') {
      const result = await executor.run('systemctl', ['restart', 'takserver']);
      if (!result.passed) {
        throw new CommandFailedError('Failed to restart takserver service', result);
      }
      await this.log.write('INFO', 'TAK Server service restarted');
      return true;
    }

    await this.log.write('WARN', `Unknown installer type: ${config.installer}. Manual service restart may be required.`);
    return false;
  }
}
