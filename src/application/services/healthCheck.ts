// Health Check Service
// Probes cron, systemd, certificates and the renewal log, then scores them

import * as path from 'path';
import { RenewalContext } from '../context';
import { CertificateProbe, HealthReport, RenewalLogProbe } from '../../domain/types/types';
import {
  recommendationsFor,
  rollUp,
  scoreCertificates,
  scoreCron,
  scoreRenewalLog,
  scoreSystemd,
} from '../../domain/policies/health/healthScoring';
import { parseLogDate, wholeDaysBetween } from '../../domain/time/dates';
import { isLetsEncryptEnabled, takCertsDir } from '../../config/renewalConfig';
import { FileLog } from '../../infrastructure/adapters/logging/fileLog';

export class HealthCheckService {
  private readonly log: FileLog;

  constructor(private readonly context: RenewalContext) {
    this.log = new FileLog(context.fs, context.files.healthLog, 'Health', context.now, context.logger);
  }

  async probeCertificates(): Promise<CertificateProbe> {
    const { config, fs, certificates, now } = this.context;
    const disabled: CertificateProbe = {
      enabled: false,
      liveDirExists: false,
      certFileExists: false,
      daysLeft: null,
      takIntegrated: false,
    };
    if (!isLetsEncryptEnabled(config) || config.takUri === null) {
      return disabled;
    }

    const liveDir = path.join(config.paths.letsencryptLiveDir, config.takUri);
    const certFile = path.join(liveDir, 'cert.pem');
    const liveDirExists = await fs.exists(liveDir);
    const certFileExists = liveDirExists && (await fs.exists(certFile));

    let daysLeft: number | null = null;
    if (certFileExists) {
      const expiry = await certificates.readExpiry(certFile);
      daysLeft = expiry ? wholeDaysBetween(now(), expiry) : null;
    }

    const certsDir = takCertsDir(config);
    const takIntegrated = certsDir !== null && (await fs.exists(path.join(certsDir, 'files', 'letsencrypt.pem')));

    return { enabled: true, liveDirExists, certFileExists, daysLeft, takIntegrated };
  }

  async probeRenewalLog(): Promise<RenewalLogProbe> {
    const { fs, files, now } = this.context;
    if (!(await fs.exists(files.renewalLog))) {
      return { exists: false, lastActivityAgeDays: null, errorCount: 0, successCount: 0 };
    }

    const lines = (await fs.readFile(files.renewalLog)).split('\n').filter(line => line.trim().length > 0);
    const lastDate = lines.length > 0 ? parseLogDate(lines[lines.length - 1]) : null;

    return {
      exists: true,
      lastActivityAgeDays: lastDate ? wholeDaysBetween(lastDate, now()) : null,
      errorCount: lines.filter(line => line.includes('ERROR')).length,
      successCount: lines.filter(line => line.includes('SUCCESS')).length,
    };
  }

  async run(): Promise<HealthReport> {
    const { schedulers, files, hostname, now } = this.context;
    await this.log.write('INFO', 'Starting renewal system health check');

    const components = {
      cron: scoreCron(await schedulers.cron.probe()),
      systemd: scoreSystemd(await schedulers.systemd.probe()),
      certificates: scoreCertificates(await this.probeCertificates()),
      logs: scoreRenewalLog(await this.probeRenewalLog()),
    };
    const overall = rollUp(components);

    await this.log.write(
      'INFO',
      `Health check completed: ${overall.status} (${overall.healthPercentage}%)`
    );

    return {
      timestamp: now().toISOString(),
      hostname,
      overall,
      components,
      recommendations: recommendationsFor(components, overall.status, files.renewalLog),
    };
  }
}
