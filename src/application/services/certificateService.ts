// Certificate Service
// Request with certbot, import into TAK keystores, and report expiry

import * as path from 'path';
import { RenewalContext } from '../context';
import { CertificateCheck, CertificateReport } from '../../domain/types/types';
import { CommandFailedError, ConfigurationError } from '../../domain/errors';
import { CommandOptions } from '../../domain/ports/commandExecutor';
import { wholeDaysBetween } from '../../domain/time/dates';
import { takCertsDir } from '../../config/renewalConfig';

const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;
const CA_CERT_PATTERN = /(ca|ca-crt)\.pem$/;
const SERVER_CERT_PATTERN = /(server|tak).*\.pem$/;

// Keystore passwords reach openssl and keytool through the environment, never argv
const STORE_PASS_ENV = 'TAK_RENEWAL_STORE_PASS';

export const LETSENCRYPT_ROOT_URL = 'https://letsencrypt.org/certs/isrgrootx1.pem';
const ROOT_ALIAS = 'letsencrypt-root';

export const DEFAULT_WARN_DAYS = 30;

export type RequestOutcome = 'requested' | 'exists';

export interface ImportResult {
  certsDir: string;
  files: string[];
  truststore: string | null;
}

export class CertificateService {
  constructor(private readonly context: RenewalContext) {}

  private liveDir(takUri: string): string {
    return path.join(this.context.config.paths.letsencryptLiveDir, takUri);
  }

  private async mustRun(command: string, args: string[], failure: string, options?: CommandOptions): Promise<void> {
    const result = await this.context.executor.run(command, args, options);
    if (!result.passed) {
      throw new CommandFailedError(failure, result);
    }
  }

  /**
   * Obtain the first certificate for TAK_URI
   */
  async request(): Promise<RequestOutcome> {
    const { config, fs, logger } = this.context;
    const { takUri, leEmail } = config;
    if (!takUri || !leEmail) {
      throw new ConfigurationError('TAK_URI and LE_EMAIL must be configured to request a certificate');
    }
    if (IPV4_PATTERN.test(takUri)) {
      throw new ConfigurationError(`TAK_URI must be a domain name, not an IP address: ${takUri}`);
    }

    if (await fs.exists(this.liveDir(takUri))) {
      logger.log('Certificates', `Certificate for ${takUri} already exists, skipping request`);
      return 'exists';
    }

    const common = ['-d', takUri, '-m', leEmail, '--agree-tos'];
    if (config.leValidator === 'web') {
      logger.log('Certificates', `Requesting certificate for ${takUri} with the HTTP challenge`);
      await this.mustRun(
        config.paths.certbot,
        ['certonly', '--standalone', ...common, '--non-interactive'],
        'certbot certificate request failed'
      );
    } else {
      logger.log('Certificates', `Requesting certificate for ${takUri} with the DNS challenge`);
      await this.mustRun(
        config.paths.certbot,
        ['certonly', '--manual', '--preferred-challenges', 'dns', ...common],
        'certbot certificate request failed',
        { interactive: true, timeoutMs: 0 }
      );
    }
    return 'requested';
  }

  /**
   * Copy the live certificate into TAK's certs/files and build letsencrypt.p12 / letsencrypt.jks
   */
  async importCertificates(): Promise<ImportResult> {
    const { config, fs, logger } = this.context;
    if (!config.takUri) {
      throw new ConfigurationError('TAK_URI not configured');
    }
    const liveDir = this.liveDir(config.takUri);
    if (!(await fs.exists(liveDir))) {
      throw new ConfigurationError(`LetsEncrypt certificates not found in ${liveDir}. Run 'tak-renewal request' first.`);
    }
    if (!config.caPass) {
      throw new ConfigurationError('CA_PASS not configured');
    }
    const certsDir = takCertsDir(config);
    if (certsDir === null) {
      throw new ConfigurationError(
        config.installer === 'docker' ? 'ROOT_PATH not configured' : 'RELEASE_PATH not configured'
      );
    }
    if (config.installer !== 'docker' && !(await fs.exists(certsDir))) {
      throw new ConfigurationError(`TAK certs directory not found: ${certsDir}`);
    }

    const filesDir = path.join(certsDir, 'files');
    await fs.mkdir(filesDir);

    const pem = path.join(filesDir, 'letsencrypt.pem');
    const key = path.join(filesDir, 'letsencrypt.key.pem');
    const p12 = path.join(filesDir, 'letsencrypt.p12');
    const jks = path.join(filesDir, 'letsencrypt.jks');

    logger.log('Certificates', `Importing LetsEncrypt certificates for ${config.takUri} into ${filesDir}`);
    await fs.copyFile(path.join(liveDir, 'fullchain.pem'), pem);
    await fs.copyFile(path.join(liveDir, 'privkey.pem'), key);

    const env: Record<string, string> = { [STORE_PASS_ENV]: config.caPass };
    if (config.rootPath) {
      env.PATH = `${path.join(config.rootPath, 'jdk', 'bin')}:${process.env.PATH ?? ''}`;
    }
    const options: CommandOptions = { cwd: certsDir, env };

    await this.mustRun(
      'openssl',
      ['pkcs12', '-export', '-in', pem, '-inkey', key, '-name', 'letsencrypt', '-out', p12, '-passout', `env:${STORE_PASS_ENV}`],
      'Failed to export letsencrypt.p12',
      options
    );

    // keytool refuses to re-import the lebundle alias into an existing store
    await fs.remove(jks);
    await this.mustRun(
      'keytool',
      [
        '-importkeystore', '-noprompt',
        '-srckeystore', p12, '-srcstoretype', 'PKCS12', '-srcstorepass:env', STORE_PASS_ENV,
        '-destkeystore', jks, '-deststorepass:env', STORE_PASS_ENV,
      ],
      'Failed to build letsencrypt.jks',
      options
    );
    await this.mustRun(
      'keytool',
      ['-import', '-noprompt', '-alias', 'lebundle', '-trustcacerts', '-file', pem, '-keystore', jks, '-storepass:env', STORE_PASS_ENV],
      'Failed to import the LetsEncrypt chain into letsencrypt.jks',
      options
    );

    const truststore = await this.bundleRoot(filesDir, options);

    const written = [pem, key, p12, jks];
    for (const file of written) {
      await fs.chmod(file, 0o644);
    }
    logger.log('Certificates', 'LetsEncrypt certificates imported');
    return { certsDir, files: written, truststore };
  }

  /**
   * Add the LetsEncrypt root to TAK's `truststore-<TAK_CA_FILE>-bundle.p12`.
   * Skipped when TAK_CA_FILE is unset.
   */
  private async bundleRoot(filesDir: string, options: CommandOptions): Promise<string | null> {
    const { config, fs, executor, logger, rootCertificates } = this.context;
    if (!config.takCaFile) {
      logger.logVerbose('Certificates', 'TAK_CA_FILE not configured, LetsEncrypt root not bundled');
      return null;
    }
    const rootPem = path.join(filesDir, 'letsencrypt-root.pem');
    const truststore = path.join(filesDir, `truststore-${config.takCaFile}-bundle.p12`);

    logger.log('Certificates', `Adding the LetsEncrypt root to ${truststore}`);
    let pem: string;
    try {
      pem = await rootCertificates.download(LETSENCRYPT_ROOT_URL);
    } catch (error) {
      throw new Error(
        `Failed to download LetsEncrypt root certificate: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    await fs.writeFile(rootPem, pem, 0o644);

    const storeArgs = ['-keystore', truststore, '-storetype', 'PKCS12', '-storepass:env', STORE_PASS_ENV];
    if (await fs.exists(truststore)) {
      // A renewal replaces the root imported last time
      const removed = await executor.run('keytool', ['-delete', '-alias', ROOT_ALIAS, ...storeArgs], options);
      if (!removed.passed) {
        logger.logVerbose('Certificates', 'No previous LetsEncrypt root in the truststore', { stderr: removed.stderr });
      }
    }
    await this.mustRun(
      'keytool',
      ['-import', '-noprompt', '-alias', ROOT_ALIAS, '-file', rootPem, ...storeArgs],
      'Failed to import LetsEncrypt root certificate to truststore',
      options
    );
    return truststore;
  }

  async checkCertificate(certPath: string, name: string, warnDays: number): Promise<CertificateCheck> {
    const { fs, certificates, now } = this.context;
    if (!(await fs.exists(certPath))) {
      return { name, path: certPath, state: 'MISSING', expiresAt: null, daysLeft: null };
    }
    const expiry = await certificates.readExpiry(certPath);
    if (expiry === null) {
      return { name, path: certPath, state: 'UNREADABLE', expiresAt: null, daysLeft: null };
    }

    const daysLeft = wholeDaysBetween(now(), expiry);
    let state: CertificateCheck['state'] = 'OK';
    if (daysLeft < 0) {
      state = 'EXPIRED';
    } else if (daysLeft < warnDays) {
      state = 'WARNING';
    }
    return { name, path: certPath, state, expiresAt: expiry.toISOString(), daysLeft };
  }

  async check(warnDays = DEFAULT_WARN_DAYS): Promise<CertificateReport> {
    const { config, fs, hostname, now } = this.context;
    const certificates: CertificateCheck[] = [];
    const notes: string[] = [];

    if (config.takUri) {
      const liveDir = this.liveDir(config.takUri);
      if (await fs.exists(liveDir)) {
        certificates.push(await this.checkCertificate(path.join(liveDir, 'cert.pem'), 'LetsEncrypt Certificate', warnDays));
        certificates.push(await this.checkCertificate(path.join(liveDir, 'fullchain.pem'), 'LetsEncrypt Full Chain', warnDays));
      } else {
        notes.push(`No LetsEncrypt certificates found for domain ${config.takUri}`);
      }
    } else {
      notes.push('TAK_URI not configured, LetsEncrypt certificates skipped');
    }

    const certsDir = takCertsDir(config);
    const filesDir = certsDir ? path.join(certsDir, 'files') : null;
    if (filesDir && (await fs.exists(filesDir))) {
      const entries = (await fs.readdir(filesDir)).sort();
      const letsencrypt = path.join(filesDir, 'letsencrypt.pem');
      if (entries.includes('letsencrypt.pem')) {
        certificates.push(await this.checkCertificate(letsencrypt, 'TAK LetsEncrypt', warnDays));
      }

      const ca = entries.find(entry => CA_CERT_PATTERN.test(entry));
      if (ca) {
        certificates.push(await this.checkCertificate(path.join(filesDir, ca), 'TAK CA', warnDays));
      }

      const server = entries.find(
        entry => SERVER_CERT_PATTERN.test(entry) && !entry.includes('letsencrypt') && entry !== ca
      );
      if (server) {
        certificates.push(await this.checkCertificate(path.join(filesDir, server), 'TAK Server', warnDays));
      }
    } else {
      notes.push(`TAK certificate directory not found: ${filesDir ?? '(RELEASE_PATH not configured)'}`);
    }

    return {
      timestamp: now().toISOString(),
      hostname,
      domain: config.takUri,
      warnDays,
      certificates,
      notes,
    };
  }
}
