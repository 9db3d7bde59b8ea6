import { RenewalTestHarness } from '@helpers/test-harness';
import { CertificateService, LETSENCRYPT_ROOT_URL } from '@/application/services/certificateService';
import { FAKE_ROOT_PEM } from '@mocks/infrastructure/certificates/root-certificate.mock';
import { ConfigurationError } from '@/domain/errors';
import { TEST_NOW, daysFrom } from '@helpers/config-builders';

const CERTS_DIR = '/opt/tak/tak/certs';
const FILES_DIR = `${CERTS_DIR}/files`;
const PEM = `${FILES_DIR}/letsencrypt.pem`;
const KEY = `${FILES_DIR}/letsencrypt.key.pem`;
const P12 = `${FILES_DIR}/letsencrypt.p12`;
const JKS = `${FILES_DIR}/letsencrypt.jks`;

describe('CertificateService', () => {
  let harness: RenewalTestHarness;

  beforeEach(() => {
    harness = new RenewalTestHarness();
  });

  function service(h: RenewalTestHarness = harness): CertificateService {
    return new CertificateService(h.context());
  }

  describe('request', () => {
    it('should request with the HTTP challenge for the web validator', async () => {
      expect(await service().request()).toBe('requested');

      expect(harness.executor.lines()).toEqual([
        '/usr/bin/certbot certonly --standalone -d tak.example.com -m ops@example.com --agree-tos --non-interactive',
      ]);
    });

    it('should run the DNS challenge interactively', async () => {
      const dns = new RenewalTestHarness({ LE_VALIDATOR: 'dns' });

      await service(dns).request();

      const [call] = dns.executor.getCallHistory();
      expect(call.args).toEqual([
        'certonly', '--manual', '--preferred-challenges', 'dns',
        '-d', 'tak.example.com', '-m', 'ops@example.com', '--agree-tos',
      ]);
      expect(call.options).toEqual({ interactive: true, timeoutMs: 0 });
    });

    it('should skip a domain that already has a certificate', async () => {
      harness.installLiveCertificate();

      expect(await service().request()).toBe('exists');
      expect(harness.executor.lines()).toEqual([]);
    });

    it('should refuse an IP address', async () => {
      const ip = new RenewalTestHarness({ TAK_URI: '10.0.0.5' });

      await expect(service(ip).request()).rejects.toThrow(
        new ConfigurationError('TAK_URI must be a domain name, not an IP address: 10.0.0.5')
      );
    });

    it('should require a contact email', async () => {
      const noEmail = new RenewalTestHarness({ LE_EMAIL: '' });

      await expect(service(noEmail).request()).rejects.toThrow(
        'TAK_URI and LE_EMAIL must be configured to request a certificate'
      );
    });

    it('should surface certbot errors', async () => {
      harness.executor.setCommandResponse('certbot certonly', { exitCode: 1, stderr: 'Some challenges have failed.' });

      await expect(service().request()).rejects.toThrow('certbot certificate request failed: Some challenges have failed.');
    });
  });

  describe('importCertificates', () => {
    beforeEach(async () => {
      harness.installLiveCertificate();
      harness.simulateKeystoreTools();
      await harness.fs.mkdir(CERTS_DIR);
    });

    it('should copy the chain and key into the TAK files directory', async () => {
      const result = await service().importCertificates();

      expect(result).toEqual({ certsDir: CERTS_DIR, files: [PEM, KEY, P12, JKS], truststore: null });
      expect(harness.fs.content(PEM)).toBe('fullchain.pem\n');
      expect(harness.fs.content(KEY)).toBe('privkey.pem\n');
      expect([PEM, KEY, P12, JKS].map(file => harness.fs.modeOf(file))).toEqual([0o644, 0o644, 0o644, 0o644]);
    });

    it('should build the PKCS12 and JKS stores', async () => {
      await service().importCertificates();

      expect(harness.executor.lines()).toEqual([
        `openssl pkcs12 -export -in ${PEM} -inkey ${KEY} -name letsencrypt -out ${P12} -passout env:TAK_RENEWAL_STORE_PASS`,
        `keytool -importkeystore -noprompt -srckeystore ${P12} -srcstoretype PKCS12 -srcstorepass:env TAK_RENEWAL_STORE_PASS ` +
          `-destkeystore ${JKS} -deststorepass:env TAK_RENEWAL_STORE_PASS`,
        `keytool -import -noprompt -alias lebundle -trustcacerts -file ${PEM} -keystore ${JKS} -storepass:env TAK_RENEWAL_STORE_PASS`,
      ]);
    });

    it('should pass the store password and the bundled JDK through the environment', async () => {
      await service().importCertificates();

      for (const call of harness.executor.getCallHistory()) {
        expect(call.line).not.toContain('test-secret');
        expect(call.options.cwd).toBe(CERTS_DIR);
        expect(call.options.env).toEqual({
          TAK_RENEWAL_STORE_PASS: 'test-secret',
          PATH: `/opt/tak-root/jdk/bin:${process.env.PATH ?? ''}`,
        });
      }
    });

    it('should rebuild the JKS from scratch', async () => {
      harness.fs.addFile(JKS, 'stale');
      let storeBeforeImport: string | undefined = 'unchecked';
      harness.executor.setCommandEffect('keytool -importkeystore', call => {
        storeBeforeImport = harness.fs.content(JKS);
        harness.fs.addFile(call.args[call.args.indexOf('-destkeystore') + 1], 'jks');
      });

      await service().importCertificates();

      expect(storeBeforeImport).toBeUndefined();
      expect(harness.fs.content(JKS)).toBe('jks');
    });

    it('should stop at the first keystore failure', async () => {
      harness.executor.setCommandResponse('keytool -import -noprompt -alias lebundle', {
        exitCode: 1,
        stderr: 'Certificate not imported, alias <lebundle> already exists',
      });

      await expect(service().importCertificates()).rejects.toThrow(
        'Failed to import the LetsEncrypt chain into letsencrypt.jks: Certificate not imported, alias <lebundle> already exists'
      );
      expect(harness.fs.getCallHistory().filter(call => call.method === 'chmod')).toEqual([]);
    });

    it('should create the docker certs directory when missing', async () => {
      const docker = new RenewalTestHarness({ INSTALLER: 'docker' });
      docker.installLiveCertificate();
      docker.simulateKeystoreTools();

      const result = await service(docker).importCertificates();

      expect(result.certsDir).toBe('/opt/tak-root/tak-pack/certs');
      expect(docker.fs.content('/opt/tak-root/tak-pack/certs/files/letsencrypt.pem')).toBe('fullchain.pem\n');
    });
  });

  describe('importCertificates with TAK_CA_FILE', () => {
    const ROOT_PEM = `${FILES_DIR}/letsencrypt-root.pem`;
    const TRUSTSTORE = `${FILES_DIR}/truststore-tak-ca-bundle.p12`;
    const STORE_ARGS = `-keystore ${TRUSTSTORE} -storetype PKCS12 -storepass:env TAK_RENEWAL_STORE_PASS`;
    let withCa: RenewalTestHarness;

    beforeEach(async () => {
      withCa = new RenewalTestHarness({ TAK_CA_FILE: 'tak-ca' });
      withCa.installLiveCertificate();
      withCa.simulateKeystoreTools();
      await withCa.fs.mkdir(CERTS_DIR);
    });

    it('should add the LetsEncrypt root to the TAK truststore', async () => {
      const result = await service(withCa).importCertificates();

      expect(result.truststore).toBe(TRUSTSTORE);
      expect(withCa.rootCertificates.requested).toEqual([LETSENCRYPT_ROOT_URL]);
      expect(withCa.fs.content(ROOT_PEM)).toBe(FAKE_ROOT_PEM);
      expect(withCa.fs.modeOf(ROOT_PEM)).toBe(0o644);
      expect(withCa.executor.lines().slice(3)).toEqual([
        `keytool -import -noprompt -alias letsencrypt-root -file ${ROOT_PEM} ${STORE_ARGS}`,
      ]);
    });

    it('should replace the root in an existing truststore', async () => {
      withCa.fs.addFile(TRUSTSTORE, 'p12');
      withCa.executor.setCommandResponse('keytool -delete', { exitCode: 1, stderr: 'Alias <letsencrypt-root> does not exist' });

      await service(withCa).importCertificates();

      expect(withCa.executor.lines().slice(3)).toEqual([
        `keytool -delete -alias letsencrypt-root ${STORE_ARGS}`,
        `keytool -import -noprompt -alias letsencrypt-root -file ${ROOT_PEM} ${STORE_ARGS}`,
      ]);
    });

    it('should fail the import when the root cannot be downloaded', async () => {
      withCa.rootCertificates.failure = new Error('getaddrinfo ENOTFOUND letsencrypt.org');

      await expect(service(withCa).importCertificates()).rejects.toThrow(
        'Failed to download LetsEncrypt root certificate: getaddrinfo ENOTFOUND letsencrypt.org'
      );
      expect(withCa.fs.getCallHistory().filter(call => call.method === 'chmod')).toEqual([]);
    });

    it('should fail the import when keytool rejects the root', async () => {
      withCa.executor.setCommandResponse('keytool -import -noprompt -alias letsencrypt-root', {
        exitCode: 1,
        stderr: 'keystore password was incorrect',
      });

      await expect(service(withCa).importCertificates()).rejects.toThrow(
        'Failed to import LetsEncrypt root certificate to truststore: keystore password was incorrect'
      );
    });
  });

  describe('importCertificates preconditions', () => {
    it('should require the live certificate', async () => {
      await expect(service().importCertificates()).rejects.toThrow(
        "LetsEncrypt certificates not found in /etc/letsencrypt/live/tak.example.com. Run 'tak-renewal request' first."
      );
    });

    it('should require CA_PASS', async () => {
      const noPass = new RenewalTestHarness({ CA_PASS: '' });
      noPass.installLiveCertificate();

      await expect(service(noPass).importCertificates()).rejects.toThrow('CA_PASS not configured');
    });

    it('should require an existing TAK certs directory on ubuntu installs', async () => {
      harness.installLiveCertificate();

      await expect(service().importCertificates()).rejects.toThrow(`TAK certs directory not found: ${CERTS_DIR}`);
      expect(harness.executor.lines()).toEqual([]);
    });
  });

  describe('check', () => {
    it('should grade every certificate it finds', async () => {
      harness.installLiveCertificate(60);
      const files: Array<[string, number]> = [
        ['letsencrypt.pem', 60],
        ['ca.pem', 20],
        ['takserver.pem', -1],
      ];
      for (const [name, days] of files) {
        harness.fs.addFile(`${FILES_DIR}/${name}`, 'pem');
        harness.certificates.setExpiry(`${FILES_DIR}/${name}`, daysFrom(TEST_NOW, days));
      }
      harness.fs.addFile(KEY, 'key');

      const report = await service().check();

      expect(report.timestamp).toBe(TEST_NOW.toISOString());
      expect(report.warnDays).toBe(30);
      expect(report.notes).toEqual([]);
      expect(report.certificates.map(cert => [cert.name, cert.state, cert.daysLeft])).toEqual([
        ['LetsEncrypt Certificate', 'OK', 60],
        ['LetsEncrypt Full Chain', 'OK', 60],
        ['TAK LetsEncrypt', 'OK', 60],
        ['TAK CA', 'WARNING', 20],
        ['TAK Server', 'EXPIRED', -1],
      ]);
      expect(report.certificates[3]).toEqual({
        name: 'TAK CA',
        path: `${FILES_DIR}/ca.pem`,
        state: 'WARNING',
        expiresAt: daysFrom(TEST_NOW, 20).toISOString(),
        daysLeft: 20,
      });
    });

    it('should honour a custom warning window', async () => {
      harness.installLiveCertificate(60);

      const report = await service().check(90);

      expect(report.certificates.map(cert => cert.state)).toEqual(['WARNING', 'WARNING']);
    });

    it('should explain what it could not find', async () => {
      const report = await service().check();

      expect(report.certificates).toEqual([]);
      expect(report.notes).toEqual([
        'No LetsEncrypt certificates found for domain tak.example.com',
        `TAK certificate directory not found: ${FILES_DIR}`,
      ]);
    });
  });

  describe('checkCertificate', () => {
    it('should report missing and unreadable files', async () => {
      harness.fs.addFile('/tmp/broken.pem', 'not a certificate');

      expect(await service().checkCertificate('/tmp/absent.pem', 'Absent', 30)).toEqual({
        name: 'Absent',
        path: '/tmp/absent.pem',
        state: 'MISSING',
        expiresAt: null,
        daysLeft: null,
      });
      expect((await service().checkCertificate('/tmp/broken.pem', 'Broken', 30)).state).toBe('UNREADABLE');
    });
  });
});
