// Port: Certificate Inspector
// Reads the expiry of a PEM certificate

export interface CertificateInspectorPort {
  /**
   * Expiry (notAfter) of the first certificate in the PEM file.
   * Null when the file cannot be parsed as a certificate.
   */
  readExpiry(certPath: string): Promise<Date | null>;
}
