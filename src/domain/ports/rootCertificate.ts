// Port: Root Certificate Source
// Fetches the LetsEncrypt root that TAK's truststore bundles

export interface RootCertificateSourcePort {
  /** PEM text of the certificate at `url` */
  download(url: string): Promise<string>;
}
