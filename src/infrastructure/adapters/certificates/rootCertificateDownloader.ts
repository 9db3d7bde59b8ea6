// Root Certificate Downloader - fetch a PEM root certificate over HTTPS

import axios from 'axios';
import { RootCertificateSourcePort } from '../../../domain/ports/rootCertificate';

const DOWNLOAD_TIMEOUT_MS = 30000;

export interface CertificateHttpClient {
  get(url: string, config?: { timeout?: number; responseType?: 'text' }): Promise<{ data: unknown }>;
}

export class RootCertificateDownloader implements RootCertificateSourcePort {
  constructor(private readonly http: CertificateHttpClient = axios) {}

  async download(url: string): Promise<string> {
    const response = await this.http.get(url, { timeout: DOWNLOAD_TIMEOUT_MS, responseType: 'text' });
    if (typeof response.data !== 'string' || !response.data.includes('-----BEGIN CERTIFICATE-----')) {
      throw new Error(`Response from ${url} is not a PEM certificate`);
    }
    return response.data;
  }
}
