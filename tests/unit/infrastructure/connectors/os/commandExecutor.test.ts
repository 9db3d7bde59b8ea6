import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { isCommandAllowed, runCommand } from '@/infrastructure/connectors/os/executors/commandExecutor';

describe('commandExecutor', () => {
  describe('isCommandAllowed', () => {
    it.each(['crontab', 'systemctl', '/usr/bin/certbot', 'keytool', '/usr/bin/docker'])('should allow %s', command => {
      expect(isCommandAllowed(command)).toEqual({ allowed: true });
    });

    it('should reject tools outside the allowlist', () => {
      expect(isCommandAllowed('/bin/rm')).toEqual({
        allowed: false,
        reason: "Command 'rm' is not in the renewal allowlist",
      });
    });

    it('should reject an empty command', () => {
      expect(isCommandAllowed('  ')).toEqual({ allowed: false, reason: 'Empty command' });
    });
  });

  describe('runCommand', () => {
    beforeEach(() => {
      jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should refuse a blocked command without spawning it', async () => {
      const result = await runCommand('curl', ['https://example.com']);

      expect(result).toEqual({
        command: 'curl https://example.com',
        exitCode: 126,
        stdout: '',
        stderr: "Command blocked: Command 'curl' is not in the renewal allowlist",
        passed: false,
      });
    });

    describe('with real processes', () => {
      let tempDir: string;

      beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'executor-test-'));
      });

      afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
      });

      // Shell script under an allowlisted tool name
      async function tool(name: string, body: string): Promise<string> {
        const file = path.join(tempDir, name);
        await fs.writeFile(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
        return file;
      }

      it('should feed input to stdin and collect trimmed stdout', async () => {
        const mail = await tool('mail', 'cat');

        const result = await runCommand(mail, ['-s', 'subject'], { input: 'renewal ok\n' });

        expect(result).toEqual({
          command: `${mail} -s subject`,
          exitCode: 0,
          stdout: 'renewal ok',
          stderr: '',
          passed: true,
        });
      });

      it('should pass extra environment and the working directory', async () => {
        const keytool = await tool('keytool', 'printf "%s %s" "$TAK_RENEWAL_STORE_PASS" "$(pwd -P)"');

        const result = await runCommand(keytool, [], { cwd: tempDir, env: { TAK_RENEWAL_STORE_PASS: 'test-secret' } });

        expect(result.stdout).toBe(`test-secret ${await fs.realpath(tempDir)}`);
      });

      it('should resolve a non-zero exit with its stderr', async () => {
        const certbot = await tool('certbot', 'echo "Some challenges have failed." >&2\nexit 3');

        const result = await runCommand(certbot, ['renew']);

        expect(result.exitCode).toBe(3);
        expect(result.passed).toBe(false);
        expect(result.stderr).toBe('Some challenges have failed.');
      });

      it('should survive a child that exits without reading its input', async () => {
        const crontab = await tool('crontab', 'exit 1');

        const result = await runCommand(crontab, ['-'], { input: 'x'.repeat(4 * 1024 * 1024) });

        expect(result.exitCode).toBe(1);
        expect(result.passed).toBe(false);
      });

      it('should report a missing binary as exit code 127', async () => {
        const result = await runCommand(path.join(tempDir, 'missing', 'openssl'), ['version']);

        expect(result.exitCode).toBe(127);
        expect(result.passed).toBe(false);
        expect(result.stderr).toContain('ENOENT');
      });

      it('should report a timed out command as exit code 128', async () => {
        const systemctl = await tool('systemctl', 'exec sleep 5');

        const result = await runCommand(systemctl, ['daemon-reload'], { timeoutMs: 200 });

        expect(result.exitCode).toBe(128);
        expect(result.stderr).toBe('Terminated by SIGTERM');
      });
    });
  });
});
