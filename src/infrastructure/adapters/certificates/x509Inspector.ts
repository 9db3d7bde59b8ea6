import { X509Certificate } from 'crypto';
import { CertificateInspectorPort } from '../../../domain/ports/certificateInspector';
import { FileSystemPort } from '../../../domain/ports/fileSystem';
import { LoggerPort } from '../../../domain/ports/logger';
import { LoggerAdapter } from '../logging/loggerAdapter';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;

export class X509Inspector implements CertificateInspectorPort {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly logger: LoggerPort = new LoggerAdapter()
  ) {}

  async readExpiry(certPath: string): Promise<Date | null> {
    if (!(await this.fs.exists(certPath))) {
      return null;
    }

    const pem = PEM_CERTIFICATE.exec(await this.fs.readFile(certPath));
    if (!pem) {
      this.logger.logVerbose('X509Inspector', 'No PEM certificate block found', { path: certPath });
      return null;
    }

    try {
      const expiry = new Date(new X509Certificate(pem[0]).validTo);
      return Number.isNaN(expiry.getTime()) ? null : expiry;
    } catch (error) {
      this.logger.logError('X509Inspector', `Unable to parse certificate ${certPath}`, error);
      return null;
    }
  }
}
