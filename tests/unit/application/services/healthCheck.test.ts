import { RenewalTestHarness } from '@helpers/test-harness';
import { HealthCheckService } from '@/application/services/healthCheck';
import { TEST_NOW } from '@helpers/config-builders';

const STAMP = '[2024-06-15 12:00:00]';
const TAK_LETSENCRYPT_PEM = '/opt/tak/tak/certs/files/letsencrypt.pem';

describe('HealthCheckService', () => {
  let harness: RenewalTestHarness;

  beforeEach(() => {
    harness = new RenewalTestHarness();
  });

  function healthyHost(): void {
    harness.installCronJob();
    harness.installBinary();
    harness.installSystemdTimer();
    harness.installLiveCertificate(60);
    harness.fs.addFile(TAK_LETSENCRYPT_PEM, 'pem');
    harness.fs.addFile(
      harness.files.renewalLog,
      '[2024-06-14 02:00:00] [SUCCESS] LetsEncrypt certificate renewal completed successfully\n'
    );
  }

  it('should score a fully working host as healthy', async () => {
    healthyHost();

    const report = await new HealthCheckService(harness.context()).run();

    expect(report).toEqual({
      timestamp: TEST_NOW.toISOString(),
      hostname: 'tak-test-host',
      overall: { status: 'HEALTHY', healthPercentage: 100, totalScore: 400, maxScore: 400 },
      components: {
        cron: {
          status: 'HEALTHY',
          score: 100,
          details: ['Cron service: RUNNING', 'Jobs: 1 configured', 'Last run: 0d ago', 'Hook: ACCESSIBLE'],
        },
        systemd: {
          status: 'HEALTHY',
          score: 100,
          details: ['Timer: ACTIVE', 'Enabled: YES', 'Service: inactive', 'Next: Sun 2024-06-16 02:00:00 UTC'],
        },
        certificates: {
          status: 'HEALTHY',
          score: 100,
          details: ['Certificates: EXIST', 'Expires: 60d', 'TAK: INTEGRATED'],
        },
        logs: {
          status: 'HEALTHY',
          score: 100,
          details: ['Log: EXISTS', 'Last: 1d ago', 'Errors: 0', 'Success: 1'],
        },
      },
      recommendations: [],
    });
  });

  it('should record the run in the health log', async () => {
    healthyHost();

    await new HealthCheckService(harness.context()).run();

    expect(harness.logLines(harness.files.healthLog)).toEqual([
      `${STAMP} [INFO] Starting renewal system health check`,
      `${STAMP} [INFO] Health check completed: HEALTHY (100%)`,
    ]);
  });

  it('should flag an unconfigured host with an expired certificate as critical', async () => {
    harness.installLiveCertificate(-3);

    const report = await new HealthCheckService(harness.context()).run();

    expect(report.overall).toEqual({ status: 'CRITICAL', healthPercentage: 18, totalScore: 75, maxScore: 400 });
    expect(report.components.certificates).toEqual({
      status: 'CRITICAL',
      score: 25,
      details: ['Certificates: EXIST', 'Expires: -3d (EXPIRED)', 'TAK: NOT_INTEGRATED'],
    });
    expect(report.components.logs).toEqual({ status: 'CRITICAL', score: 0, details: ['Log: MISSING'] });
    expect(report.recommendations).toEqual([
      'Certificate issues detected - run certificate renewal immediately',
      'Cron system issues - check cron service and job configuration',
      'Both renewal systems failing - manual intervention required',
      'Check renewal logs for errors: tail -f /var/log/letsencrypt-renewal.log',
    ]);
  });

  describe('probeCertificates', () => {
    it('should report a disabled setup without looking at files', async () => {
      const disabled = new RenewalTestHarness({ LETSENCRYPT: 'false' });

      expect(await new HealthCheckService(disabled.context()).probeCertificates()).toEqual({
        enabled: false,
        liveDirExists: false,
        certFileExists: false,
        daysLeft: null,
        takIntegrated: false,
      });
    });

    it('should leave the expiry unknown when the certificate cannot be parsed', async () => {
      harness.fs.addFile('/etc/letsencrypt/live/tak.example.com/cert.pem', 'garbage');

      expect(await new HealthCheckService(harness.context()).probeCertificates()).toEqual({
        enabled: true,
        liveDirExists: true,
        certFileExists: true,
        daysLeft: null,
        takIntegrated: false,
      });
    });

    it('should look for TAK integration under the docker pack', async () => {
      const docker = new RenewalTestHarness({ INSTALLER: 'docker' });
      docker.installLiveCertificate(45);
      docker.fs.addFile('/opt/tak-root/tak-pack/certs/files/letsencrypt.pem', 'pem');

      const probe = await new HealthCheckService(docker.context()).probeCertificates();
      expect(probe.daysLeft).toBe(45);
      expect(probe.takIntegrated).toBe(true);
    });
  });

  describe('probeRenewalLog', () => {
    it('should count error and success lines and age the last entry', async () => {
      harness.fs.addFile(
        harness.files.renewalLog,
        [
          '[2024-06-02 02:00:00] [INFO] Starting LetsEncrypt certificate renewal process',
          '[2024-06-02 02:00:05] [ERROR] Failed to import LetsEncrypt certificates: keytool failed',
          '[2024-06-09 02:00:09] [SUCCESS] LetsEncrypt certificate renewal completed successfully',
          '[2024-06-10 02:00:09] [SUCCESS] LetsEncrypt certificate renewal completed successfully',
          '',
        ].join('\n')
      );

      expect(await new HealthCheckService(harness.context()).probeRenewalLog()).toEqual({
        exists: true,
        lastActivityAgeDays: 5,
        errorCount: 1,
        successCount: 2,
      });
    });

    it('should report a missing log', async () => {
      expect(await new HealthCheckService(harness.context()).probeRenewalLog()).toEqual({
        exists: false,
        lastActivityAgeDays: null,
        errorCount: 0,
        successCount: 0,
      });
    });
  });
});
