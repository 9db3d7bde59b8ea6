// Renewal context - everything a service needs, wired once per CLI invocation

import * as os from 'os';
import { RenewalConfig, RenewalFiles, renewalFiles } from '../config/renewalConfig';
import { CommandExecutorPort } from '../domain/ports/commandExecutor';
import { FileSystemPort } from '../domain/ports/fileSystem';
import { LoggerPort } from '../domain/ports/logger';
import { MarkerStorePort } from '../domain/ports/persistence';
import { CertificateInspectorPort } from '../domain/ports/certificateInspector';
import { RootCertificateSourcePort } from '../domain/ports/rootCertificate';
import { NotifierPort } from '../domain/ports/notifier';
import { Schedulers } from '../domain/ports/scheduler';
import { CommandExecutorAdapter } from '../infrastructure/adapters/os/commandExecutorAdapter';
import { FileSystemAdapter } from '../infrastructure/adapters/os/fileSystemAdapter';
import { LoggerAdapter } from '../infrastructure/adapters/logging/loggerAdapter';
import { FileMarkerStore } from '../infrastructure/adapters/persistence/markerStore';
import { X509Inspector } from '../infrastructure/adapters/certificates/x509Inspector';
import { RootCertificateDownloader } from '../infrastructure/adapters/certificates/rootCertificateDownloader';
import { MailWebhookNotifier } from '../infrastructure/adapters/notifications/notifier';
import { CronScheduler } from '../infrastructure/adapters/schedulers/cronScheduler';
import { SystemdScheduler } from '../infrastructure/adapters/schedulers/systemdScheduler';

export interface RenewalContext {
  config: RenewalConfig;
  files: RenewalFiles;
  executor: CommandExecutorPort;
  fs: FileSystemPort;
  schedulers: Schedulers;
  markers: MarkerStorePort;
  certificates: CertificateInspectorPort;
  rootCertificates: RootCertificateSourcePort;
  notifier: NotifierPort;
  logger: LoggerPort;
  hostname: string;
  now: () => Date;
}

/**
 * Production wiring over the real OS adapters
 */
export function createRenewalContext(config: RenewalConfig): RenewalContext {
  const executor = new CommandExecutorAdapter();
  const fs = new FileSystemAdapter();
  const logger = new LoggerAdapter(config.takUri ?? undefined);
  const files = renewalFiles(config.paths);
  const now = (): Date => new Date();
  const hostname = os.hostname();

  return {
    config,
    files,
    executor,
    fs,
    schedulers: {
      cron: new CronScheduler(executor, fs, config, logger, now),
      systemd: new SystemdScheduler(executor, fs, config, logger),
    },
    markers: new FileMarkerStore(fs, files),
    certificates: new X509Inspector(fs, logger),
    rootCertificates: new RootCertificateDownloader(),
    notifier: new MailWebhookNotifier(
      executor,
      { email: config.notificationEmail, webhookUrl: config.webhookUrl, hostname, now },
      logger
    ),
    logger,
    hostname,
    now,
  };
}
