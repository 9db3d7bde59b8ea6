// Renewal configuration
// Reads the TAK config file (`export KEY=value` lines) over the process environment

import * as fs from 'fs/promises';
import * as path from 'path';
import dotenv from 'dotenv';
import { ConfigurationError } from '../domain/errors';

export type Installer = 'docker' | 'ubuntu' | 'unknown';
export type Validator = 'web' | 'dns';

export interface RenewalPaths {
  stateDir: string;
  logDir: string;
  letsencryptLiveDir: string;
  systemdUnitDir: string;
  backupDir: string;
  certbot: string;
  binary: string; // the installed tak-renewal executable, invoked by cron/systemd
}

export interface RenewalSchedules {
  primary: string;
  fallback: string;
  monitor: string;
}

export interface RenewalConfig {
  configFile: string | null;
  takUri: string | null;
  letsencrypt: boolean;
  leEmail: string | null;
  leValidator: Validator;
  notificationEmail: string | null;
  webhookUrl: string | null;
  releasePath: string | null;
  rootPath: string | null;
  installer: Installer;
  caPass: string | null;
  takCaFile: string | null;
  paths: RenewalPaths;
  schedules: RenewalSchedules;
}

export const DEFAULT_PATHS: RenewalPaths = {
  stateDir: '/var/lib',
  logDir: '/var/log',
  letsencryptLiveDir: '/etc/letsencrypt/live',
  systemdUnitDir: '/etc/systemd/system',
  backupDir: '/var/backups/tak-certs',
  certbot: '/usr/bin/certbot',
  binary: '/usr/local/bin/tak-renewal',
};

export const DEFAULT_SCHEDULES: RenewalSchedules = {
  primary: '0 2 * * 0', // Sunday 02:00
  fallback: '0 3 * * 0', // Sunday 03:00
  monitor: '0 1 * * *', // daily 01:00
};

type Source = Record<string, string | undefined>;

function value(source: Source, key: string): string | null {
  const raw = source[key];
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseInstaller(raw: string | null): Installer {
  if (raw === 'docker' || raw === 'ubuntu') return raw;
  return 'unknown';
}

function parseValidator(raw: string | null): Validator {
  // anything other than `web` falls back to the DNS challenge
  return raw === 'web' ? 'web' : 'dns';
}

/**
 * Build a config from an already-merged key/value source
 */
export function buildRenewalConfig(source: Source, configFile: string | null = null): RenewalConfig {
  return {
    configFile,
    takUri: value(source, 'TAK_URI'),
    letsencrypt: value(source, 'LETSENCRYPT') === 'true',
    leEmail: value(source, 'LE_EMAIL'),
    leValidator: parseValidator(value(source, 'LE_VALIDATOR')),
    notificationEmail: value(source, 'LE_NOTIFICATION_EMAIL'),
    webhookUrl: value(source, 'LE_WEBHOOK_URL'),
    releasePath: value(source, 'RELEASE_PATH'),
    rootPath: value(source, 'ROOT_PATH'),
    installer: parseInstaller(value(source, 'INSTALLER')),
    caPass: value(source, 'CA_PASS'),
    takCaFile: value(source, 'TAK_CA_FILE'),
    paths: {
      stateDir: value(source, 'TAK_RENEWAL_STATE_DIR') ?? DEFAULT_PATHS.stateDir,
      logDir: value(source, 'TAK_RENEWAL_LOG_DIR') ?? DEFAULT_PATHS.logDir,
      letsencryptLiveDir: value(source, 'TAK_RENEWAL_LETSENCRYPT_DIR') ?? DEFAULT_PATHS.letsencryptLiveDir,
      systemdUnitDir: value(source, 'TAK_RENEWAL_SYSTEMD_DIR') ?? DEFAULT_PATHS.systemdUnitDir,
      backupDir: value(source, 'TAK_RENEWAL_BACKUP_DIR') ?? DEFAULT_PATHS.backupDir,
      certbot: value(source, 'TAK_RENEWAL_CERTBOT') ?? DEFAULT_PATHS.certbot,
      binary: value(source, 'TAK_RENEWAL_BIN') ?? DEFAULT_PATHS.binary,
    },
    schedules: {
      primary: value(source, 'TAK_RENEWAL_PRIMARY_SCHEDULE') ?? DEFAULT_SCHEDULES.primary,
      fallback: value(source, 'TAK_RENEWAL_FALLBACK_SCHEDULE') ?? DEFAULT_SCHEDULES.fallback,
      monitor: value(source, 'TAK_RENEWAL_MONITOR_SCHEDULE') ?? DEFAULT_SCHEDULES.monitor,
    },
  };
}

/**
 * Load the renewal config. Values from the config file win over the environment.
 */
export async function loadRenewalConfig(
  configFile?: string | null,
  env: NodeJS.ProcessEnv = process.env
): Promise<RenewalConfig> {
  if (!configFile) {
    return buildRenewalConfig(env, null);
  }

  const resolved = path.resolve(configFile);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read config file ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const fromFile = dotenv.parse(content);
  return buildRenewalConfig({ ...env, ...fromFile }, resolved);
}

export function isLetsEncryptEnabled(config: RenewalConfig): boolean {
  return config.takUri !== null && config.letsencrypt;
}

/**
 * Narrowed config for operations that need a domain
 */
export type LetsEncryptConfig = RenewalConfig & { takUri: string; letsencrypt: true };

export function assertLetsEncryptConfigured(config: RenewalConfig): asserts config is LetsEncryptConfig {
  if (config.takUri === null || !config.letsencrypt) {
    throw new ConfigurationError(
      `LetsEncrypt not properly configured. TAK_URI=${config.takUri ?? ''}, LETSENCRYPT=${config.letsencrypt}`
    );
  }
}

export interface RenewalFiles {
  primaryMarker: string;
  fallbackMarker: string;
  failedPrimaryMarker: string;
  failoverHistory: string;
  renewalLog: string;
  cronLog: string;
  systemLog: string;
  healthLog: string;
  failoverLog: string;
}

export function renewalFiles(paths: RenewalPaths): RenewalFiles {
  return {
    primaryMarker: path.join(paths.stateDir, 'tak-renewal-primary'),
    fallbackMarker: path.join(paths.stateDir, 'tak-renewal-fallback'),
    failedPrimaryMarker: path.join(paths.stateDir, 'tak-renewal-failed-primary'),
    failoverHistory: path.join(paths.stateDir, 'tak-renewal-failover-history'),
    renewalLog: path.join(paths.logDir, 'letsencrypt-renewal.log'),
    cronLog: path.join(paths.logDir, 'letsencrypt-cron.log'),
    systemLog: path.join(paths.logDir, 'tak-renewal-system.log'),
    healthLog: path.join(paths.logDir, 'tak-renewal-health.log'),
    failoverLog: path.join(paths.logDir, 'tak-renewal-failover.log'),
  };
}

/**
 * The command cron/systemd run after certbot renews: `<binary> [--config <file>] hook`
 */
export function hookCommand(config: RenewalConfig): string {
  const configArg = config.configFile ? ` --config ${config.configFile}` : '';
  return `${config.paths.binary}${configArg} hook`;
}

/**
 * Directory holding TAK's `files/` certificate folder: docker installs keep it
 * under ROOT_PATH/tak-pack, host installs under RELEASE_PATH/tak
 */
export function takCertsDir(config: RenewalConfig): string | null {
  if (config.installer === 'docker') {
    return config.rootPath ? path.join(config.rootPath, 'tak-pack', 'certs') : null;
  }
  return config.releasePath ? path.join(config.releasePath, 'tak', 'certs') : null;
}

export function monitorCommand(config: RenewalConfig): string {
  const configArg = config.configFile ? ` --config ${config.configFile}` : '';
  return `${config.paths.binary}${configArg} failover check`;
}
