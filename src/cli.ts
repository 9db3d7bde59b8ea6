#!/usr/bin/env node
// Operator CLI Entrypoint
// Every command loads the config, wires a context and runs one service

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { RenewalContext, createRenewalContext } from './application/context';
import { RenewalSystemService } from './application/services/renewalSystem';
import { FailoverMonitor } from './application/services/failoverMonitor';
import { HealthCheckService } from './application/services/healthCheck';
import { RenewalHook } from './application/services/renewalHook';
import { CertificateService, DEFAULT_WARN_DAYS } from './application/services/certificateService';
import {
  renderCertificateJson,
  renderCertificateText,
  renderFailoverStatus,
  renderHealthJson,
  renderHealthText,
  renderSystemStatus,
} from './application/presenters/reports';
import { exitCodeFor } from './domain/policies/health/healthScoring';
import { describeSchedule, validateCronSchedule } from './domain/schedulers/crontab';
import { SchedulerUnavailableError } from './domain/errors';
import { SchedulerKind } from './domain/enums/scheduler';
import { assertLetsEncryptConfigured, loadRenewalConfig } from './config/renewalConfig';
import { FileLog } from './infrastructure/adapters/logging/fileLog';
import {
  logError,
  logVerbose as logVerboseShared,
  logPerformance as logPerformanceShared,
} from './infrastructure/adapters/logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`CLI:${component}`, message, data);
}

function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  logPerformanceShared(`[CLI] ${operation}`, duration, metadata);
}

export type ContextFactory = (configFile?: string) => Promise<RenewalContext>;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: line => process.stdout.write(line + '\n'),
  err: line => process.stderr.write(line + '\n'),
};

const HEALTH_ERROR_EXIT = exitCodeFor('ERROR');

function parseDays(value: string): number {
  const days = Number.parseInt(value, 10);
  if (Number.isNaN(days) || days < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of days.');
  }
  return days;
}

/**
 * Build the command tree. Actions record their exit code instead of exiting,
 * so the caller decides what to do with it.
 */
export function buildProgram(createContext: ContextFactory, io: CliIO = consoleIO): { program: Command; exitCode: () => number } {
  let exitCode = 0;
  const program = new Command();

  program
    .exitOverride()
    .name('tak-renewal')
    .description('LetsEncrypt renewal for TAK Server with cron/systemd failover')
    .option('--config <file>', 'Shell-style config file (export KEY=value lines)')
    .configureOutput({
      writeOut: text => io.out(text.replace(/\n$/, '')),
      writeErr: text => io.err(text.replace(/\n$/, '')),
    });

  const context = (): Promise<RenewalContext> => createContext(program.opts<{ config?: string }>().config);

  /**
   * Run one action. Thrown errors are logged, printed and mapped to `failureCode`.
   */
  const action = async (name: string, run: () => Promise<number | void>, failureCode = 1): Promise<void> => {
    const startTime = Date.now();
    logVerbose(name, 'Command started');
    try {
      const code = await run();
      exitCode = code ?? 0;
    } catch (error) {
      logError('CLI', `${name} failed`, error);
      io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
      exitCode = failureCode;
    }
    logPerformance(name, Date.now() - startTime, { exit_code: exitCode });
  };

  // ---- dual renewal system ----
  const system = program.command('system').description('Dual scheduler renewal system (cron primary, systemd fallback)');

  system
    .command('setup [primarySchedule] [fallbackSchedule]')
    .description('Install both schedulers, write role markers and schedule the failover monitor')
    .action((primarySchedule?: string, fallbackSchedule?: string) =>
      action('SystemSetup', async () => {
        const result = await new RenewalSystemService(await context()).setup(primarySchedule, fallbackSchedule);
        io.out(`Primary renewal system: ${result.primary}`);
        io.out(`Fallback renewal system: ${result.fallback ?? 'none'}`);
        io.out(`Failover monitoring: ${result.monitoring ? 'scheduled' : 'not scheduled'}`);
      })
    );

  system
    .command('remove')
    .description('Remove both schedulers, the monitor job and all markers')
    .action(() =>
      action('SystemRemove', async () => {
        const result = await new RenewalSystemService(await context()).remove();
        result.warnings.forEach(warning => io.err(`Warning: ${warning}`));
        io.out('Dual renewal system removed');
      })
    );

  system
    .command('status')
    .description('Show primary, fallback and monitoring state')
    .action(() =>
      action('SystemStatus', async () => {
        const status = await new RenewalSystemService(await context()).status();
        renderSystemStatus(status).forEach(line => io.out(line));
      })
    );

  // ---- single cron backend ----
  const cron = program.command('cron').description('Cron renewal job only');

  cron
    .command('setup [schedule]')
    .description('Add the certbot renewal job to root crontab')
    .action((schedule?: string) =>
      action('CronSetup', async () => {
        const ctx = await context();
        assertLetsEncryptConfigured(ctx.config);
        const normalized = validateCronSchedule(schedule ?? ctx.config.schedules.primary);
        if (!(await ctx.schedulers.cron.isAvailable())) {
          throw new SchedulerUnavailableError(SchedulerKind.CRON);
        }
        await ctx.schedulers.cron.install({ schedule: normalized });
        io.out(`LetsEncrypt renewal cron job configured: ${describeSchedule(normalized)}`);
      })
    );

  cron
    .command('remove')
    .description('Remove the certbot renewal job from root crontab')
    .action(() =>
      action('CronRemove', async () => {
        await (await context()).schedulers.cron.remove();
        io.out('LetsEncrypt renewal cron job removed');
      })
    );

  cron
    .command('status')
    .description('List renewal jobs and the tail of the cron log')
    .action(() =>
      action('CronStatus', async () => {
        const ctx = await context();
        const jobs = await ctx.schedulers.cron.listRenewalJobs();
        io.out('LetsEncrypt cron jobs:');
        (jobs.length > 0 ? jobs : ['No LetsEncrypt cron jobs configured']).forEach(job => io.out(`  ${job}`));
        io.out(`Cron service: ${(await ctx.schedulers.cron.isServiceRunning()) ? 'running' : 'not running'}`);
        const tail = await new FileLog(ctx.fs, ctx.files.cronLog, 'Cron', ctx.now, ctx.logger).tail(10);
        io.out('');
        io.out('Recent cron log:');
        (tail.length > 0 ? tail : ['No log entries']).forEach(line => io.out(`  ${line}`));
      })
    );

  // ---- single systemd backend ----
  const systemd = program.command('systemd').description('systemd renewal timer only');

  systemd
    .command('setup')
    .description('Install and start letsencrypt-renewal.timer')
    .action(() =>
      action('SystemdSetup', async () => {
        const ctx = await context();
        assertLetsEncryptConfigured(ctx.config);
        await ctx.schedulers.systemd.install();
        io.out('LetsEncrypt renewal timer installed and started');
      })
    );

  systemd
    .command('remove')
    .description('Stop the timer and delete both unit files')
    .action(() =>
      action('SystemdRemove', async () => {
        await (await context()).schedulers.systemd.remove();
        io.out('LetsEncrypt systemd components removed');
      })
    );

  systemd
    .command('status')
    .description('Timer, service and journal status')
    .action(() =>
      action('SystemdStatus', async () => {
        const lines = await (await context()).schedulers.systemd.describeUnits();
        lines.forEach(line => io.out(line));
      })
    );

  // ---- health ----
  program
    .command('health')
    .description('Score the renewal machinery; exit 0 healthy, 1 warning, 2 critical, 3 error')
    .option('--json', 'Print the report as JSON')
    .action((options: { json?: boolean }) =>
      action(
        'Health',
        async () => {
          const report = await new HealthCheckService(await context()).run();
          if (options.json) {
            io.out(renderHealthJson(report));
          } else {
            renderHealthText(report).forEach(line => io.out(line));
          }
          return exitCodeFor(report.overall.status);
        },
        HEALTH_ERROR_EXIT
      )
    );

  // ---- failover ----
  const failover = program.command('failover').description('Failover between cron and systemd');

  const runCheck = async (force: boolean): Promise<number> => {
    const outcome = await new FailoverMonitor(await context()).check(force);
    switch (outcome.action) {
      case 'healthy':
        io.out(`Primary system (${outcome.primary}) healthy`);
        return 0;
      case 'failed-over':
        io.out(`Failover completed: ${outcome.from} -> ${outcome.to}`);
        return 0;
      case 'emergency-activated':
        io.err(`No active renewal system found; ${outcome.primary} activated as emergency primary`);
        return 1;
      case 'failover-failed':
        io.err(`Failover failed: ${outcome.reason ?? 'unknown reason'}`);
        return 1;
      case 'no-scheduler':
        io.err('No renewal systems available - manual intervention required');
        return 1;
    }
  };

  failover
    .command('check')
    .description('Check the primary scheduler and fail over when it is unhealthy')
    .option('--force', 'Fail over even when the primary is healthy')
    .action((options: { force?: boolean }) => action('FailoverCheck', () => runCheck(options.force === true)));

  failover
    .command('force')
    .description('Switch to the fallback scheduler now')
    .action(() => action('FailoverForce', () => runCheck(true)));

  failover
    .command('status')
    .description('Primary, scheduler health and failover history')
    .action(() =>
      action('FailoverStatus', async () => {
        const status = await new FailoverMonitor(await context()).status();
        renderFailoverStatus(status).forEach(line => io.out(line));
      })
    );

  // ---- certificate lifecycle ----
  program
    .command('hook')
    .description('certbot deploy hook: back up, import, restart TAK Server, notify')
    .action(() =>
      action('Hook', async () => {
        const result = await new RenewalHook(await context()).run();
        if (result.backup) io.out(`Backup: ${result.backup}`);
        io.out('LetsEncrypt certificate renewal completed successfully');
      })
    );

  program
    .command('import')
    .description('Import the live LetsEncrypt certificate into TAK Server keystores')
    .action(() =>
      action('Import', async () => {
        const result = await new CertificateService(await context()).importCertificates();
        result.files.forEach(file => io.out(`Written: ${file}`));
        if (result.truststore) io.out(`LetsEncrypt root added to ${result.truststore}`);
      })
    );

  program
    .command('request')
    .description('Request the first LetsEncrypt certificate for TAK_URI')
    .action(() =>
      action('Request', async () => {
        const outcome = await new CertificateService(await context()).request();
        io.out(outcome === 'exists' ? 'Certificate already exists, nothing requested' : 'Certificate requested');
      })
    );

  program
    .command('cert-check')
    .description('Report expiry of LetsEncrypt and TAK certificates')
    .option('--warn-days <days>', 'Warn when fewer days remain', parseDays, DEFAULT_WARN_DAYS)
    .option('--json', 'Print the report as JSON')
    .action((options: { warnDays: number; json?: boolean }) =>
      action('CertCheck', async () => {
        const report = await new CertificateService(await context()).check(options.warnDays);
        if (options.json) {
          io.out(renderCertificateJson(report));
        } else {
          renderCertificateText(report).forEach(line => io.out(line));
        }
        return report.certificates.every(cert => cert.state === 'OK') ? 0 : 1;
      })
    );

  return { program, exitCode: () => exitCode };
}

/**
 * Parse argv (node-style, including the executable and script) and return the exit code
 */
export async function runCli(argv: string[], createContext: ContextFactory, io: CliIO = consoleIO): Promise<number> {
  const { program, exitCode } = buildProgram(createContext, io);
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode();
}

async function defaultContext(configFile?: string): Promise<RenewalContext> {
  return createRenewalContext(await loadRenewalConfig(configFile));
}

if (require.main === module) {
  runCli(process.argv, defaultContext)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logError('CLI', 'Unexpected failure', error);
      process.exitCode = 1;
    });
}
