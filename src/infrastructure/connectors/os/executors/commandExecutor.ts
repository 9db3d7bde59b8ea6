// Command Executor - run the OS tools the renewal system drives
// Allowlist check before execution; argument arrays only, never a shell string

import { spawn } from 'child_process';
import * as path from 'path';
import { CommandResult } from '../../../../domain/types/types';
import { CommandOptions } from '../../../../domain/ports/commandExecutor';
import { log as logShared, logVerbose, logPerformance } from '../../../adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('CommandExecutor', message, ...args);
}

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

// Tools the renewal system is allowed to invoke
const ALLOWED_COMMANDS = [
  'crontab',
  'systemctl',
  'service',
  'journalctl',
  'certbot',
  'openssl',
  'keytool',
  'docker',
  'mail',
  'which',
] as const;

/**
 * Validate command against the allowlist (compared by basename, so
 * `/usr/bin/certbot` is allowed)
 */
export function isCommandAllowed(command: string): { allowed: boolean; reason?: string } {
  const base = path.basename(command.trim());
  if (!base) {
    return { allowed: false, reason: 'Empty command' };
  }
  if (!(ALLOWED_COMMANDS as readonly string[]).includes(base)) {
    return { allowed: false, reason: `Command '${base}' is not in the renewal allowlist` };
  }
  return { allowed: true };
}

function display(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

/**
 * Run a command and collect its output. Non-zero exits resolve normally;
 * spawn failures (e.g. ENOENT) resolve with exit code 127.
 */
export function runCommand(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  const rendered = display(command, args);
  const validation = isCommandAllowed(command);
  if (!validation.allowed) {
    log(`Command blocked: ${rendered} (${validation.reason})`);
    return Promise.resolve({
      command: rendered,
      exitCode: 126,
      stdout: '',
      stderr: `Command blocked: ${validation.reason}`,
      passed: false,
    });
  }

  const startTime = Date.now();
  logVerbose('CommandExecutor', 'Starting command', {
    command: rendered,
    cwd: options.cwd,
    has_input: options.input !== undefined,
    interactive: options.interactive === true,
  });

  return new Promise(resolve => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (exitCode: number, extraStderr = ''): void => {
      if (settled) return;
      settled = true;
      const duration = Date.now() - startTime;
      logPerformance(`[CommandExecutor] ${path.basename(command)}`, duration, { exit_code: exitCode });
      const result: CommandResult = {
        command: rendered,
        exitCode,
        stdout: stdout.trim(),
        stderr: (stderr + extraStderr).trim(),
        passed: exitCode === 0,
      };
      logVerbose('CommandExecutor', 'Command finished', {
        command: rendered,
        exit_code: exitCode,
        stdout_length: result.stdout.length,
        stderr_length: result.stderr.length,
        duration_ms: duration,
      });
      resolve(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: options.interactive ? 'inherit' : ['pipe', 'pipe', 'pipe'],
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      log(`Command failed to start: ${rendered}: ${error.message}`);
      finish(error.code === 'ENOENT' ? 127 : 1, `\n${error.message}`);
    });

    child.on('close', (code, signal) => {
      if (signal) {
        finish(128, `\nTerminated by ${signal}`);
        return;
      }
      finish(code ?? 1);
    });

    if (child.stdin) {
      // EPIPE when the child exits without reading its input; close still reports the exit code
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        logVerbose('CommandExecutor', 'stdin closed early', { command: rendered, code: error.code });
      });
      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    }
  });
}
