// Renewal configuration unit tests

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_PATHS,
  assertLetsEncryptConfigured,
  buildRenewalConfig,
  hookCommand,
  isLetsEncryptEnabled,
  loadRenewalConfig,
  monitorCommand,
  renewalFiles,
  takCertsDir,
} from '@/config/renewalConfig';
import { ConfigurationError } from '@/domain/errors';

describe('Renewal configuration', () => {
  describe('buildRenewalConfig', () => {
    it('should read TAK keys and fall back to default paths', () => {
      const config = buildRenewalConfig({
        TAK_URI: 'tak.example.com',
        LETSENCRYPT: 'true',
        LE_VALIDATOR: 'web',
        INSTALLER: 'docker',
        CA_PASS: 'test-secret',
      });

      expect(config.takUri).toBe('tak.example.com');
      expect(config.letsencrypt).toBe(true);
      expect(config.leValidator).toBe('web');
      expect(config.installer).toBe('docker');
      expect(config.caPass).toBe('test-secret');
      expect(config.paths).toEqual(DEFAULT_PATHS);
      expect(config.schedules).toEqual({ primary: '0 2 * * 0', fallback: '0 3 * * 0', monitor: '0 1 * * *' });
    });

    it('should treat blank values as unset', () => {
      const config = buildRenewalConfig({ TAK_URI: '  ', LE_EMAIL: '' });
      expect(config.takUri).toBeNull();
      expect(config.leEmail).toBeNull();
    });

    it('should default unknown validators to dns and unknown installers to unknown', () => {
      const config = buildRenewalConfig({ LE_VALIDATOR: 'http', INSTALLER: 'rhel' });
      expect(config.leValidator).toBe('dns');
      expect(config.installer).toBe('unknown');
    });

    it('should honour tool path overrides', () => {
      const config = buildRenewalConfig({ TAK_RENEWAL_STATE_DIR: '/tmp/state', TAK_RENEWAL_LOG_DIR: '/tmp/logs' });
      const files = renewalFiles(config.paths);
      expect(files.primaryMarker).toBe('/tmp/state/tak-renewal-primary');
      expect(files.failoverHistory).toBe('/tmp/state/tak-renewal-failover-history');
      expect(files.renewalLog).toBe('/tmp/logs/letsencrypt-renewal.log');
      expect(files.failoverLog).toBe('/tmp/logs/tak-renewal-failover.log');
    });
  });

  describe('LetsEncrypt checks', () => {
    it('should require both TAK_URI and LETSENCRYPT=true', () => {
      expect(isLetsEncryptEnabled(buildRenewalConfig({ TAK_URI: 'tak.example.com', LETSENCRYPT: 'true' }))).toBe(true);
      expect(isLetsEncryptEnabled(buildRenewalConfig({ TAK_URI: 'tak.example.com', LETSENCRYPT: 'false' }))).toBe(false);
      expect(() => assertLetsEncryptConfigured(buildRenewalConfig({ LETSENCRYPT: 'true' }))).toThrow(
        'LetsEncrypt not properly configured. TAK_URI=, LETSENCRYPT=true'
      );
    });
  });

  describe('commands and directories', () => {
    it('should pass the config file to scheduled commands', () => {
      const config = buildRenewalConfig({}, '/opt/tak/config.inc.sh');
      expect(hookCommand(config)).toBe('/usr/local/bin/tak-renewal --config /opt/tak/config.inc.sh hook');
      expect(monitorCommand(config)).toBe('/usr/local/bin/tak-renewal --config /opt/tak/config.inc.sh failover check');
      expect(hookCommand(buildRenewalConfig({}))).toBe('/usr/local/bin/tak-renewal hook');
    });

    it('should locate TAK certs by installer', () => {
      expect(takCertsDir(buildRenewalConfig({ INSTALLER: 'docker', ROOT_PATH: '/srv/tak' }))).toBe('/srv/tak/tak-pack/certs');
      expect(takCertsDir(buildRenewalConfig({ INSTALLER: 'ubuntu', RELEASE_PATH: '/opt/tak' }))).toBe('/opt/tak/tak/certs');
      expect(takCertsDir(buildRenewalConfig({ INSTALLER: 'ubuntu' }))).toBeNull();
    });
  });

  describe('loadRenewalConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tak-renewal-config-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should parse export lines and let the file win over the environment', async () => {
      const file = path.join(dir, 'config.inc.sh');
      await fs.writeFile(
        file,
        ['# TAK settings', 'export TAK_URI=tak.example.com', 'export LETSENCRYPT="true"', 'LE_EMAIL=ops@example.com', ''].join('\n')
      );

      const config = await loadRenewalConfig(file, { TAK_URI: 'other.example.com', INSTALLER: 'ubuntu' });

      expect(config.configFile).toBe(file);
      expect(config.takUri).toBe('tak.example.com');
      expect(config.letsencrypt).toBe(true);
      expect(config.leEmail).toBe('ops@example.com');
      expect(config.installer).toBe('ubuntu');
    });

    it('should use the environment alone without a file', async () => {
      const config = await loadRenewalConfig(undefined, { TAK_URI: 'env.example.com' });
      expect(config.takUri).toBe('env.example.com');
      expect(config.configFile).toBeNull();
    });

    it('should raise a ConfigurationError for an unreadable file', async () => {
      await expect(loadRenewalConfig(path.join(dir, 'missing.sh'), {})).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
