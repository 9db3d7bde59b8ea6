// tak-renewal - Main Entry Point
// Exports all public APIs

// CLI
export { buildProgram, runCli } from './src/cli';
export type { CliIO, ContextFactory } from './src/cli';

// Configuration
export {
  loadRenewalConfig,
  buildRenewalConfig,
  assertLetsEncryptConfigured,
  isLetsEncryptEnabled,
  renewalFiles,
  hookCommand,
  monitorCommand,
  takCertsDir,
  DEFAULT_PATHS,
  DEFAULT_SCHEDULES,
} from './src/config/renewalConfig';
export type { RenewalConfig, RenewalFiles, RenewalPaths, RenewalSchedules, LetsEncryptConfig } from './src/config/renewalConfig';

// Services
export { createRenewalContext } from './src/application/context';
export type { RenewalContext } from './src/application/context';
export { RenewalSystemService } from './src/application/services/renewalSystem';
export type { SetupResult, RemoveResult, RenewalSystemStatus } from './src/application/services/renewalSystem';
export { FailoverMonitor } from './src/application/services/failoverMonitor';
export type { FailoverStatus, SchedulerHealthSummary } from './src/application/services/failoverMonitor';
export { HealthCheckService } from './src/application/services/healthCheck';
export { RenewalHook } from './src/application/services/renewalHook';
export type { HookResult } from './src/application/services/renewalHook';
export { CertificateService } from './src/application/services/certificateService';

// Policies
export {
  scoreCron,
  scoreSystemd,
  scoreCertificates,
  scoreRenewalLog,
  rollUp,
  exitCodeFor,
} from './src/domain/policies/health/healthScoring';
export { cronIssues, systemdIssues, resolvePrimary, decideFailover } from './src/domain/policies/failover/failoverPolicy';
export type { FailoverDecision } from './src/domain/policies/failover/failoverPolicy';

// Errors
export { ConfigurationError, CommandFailedError, SchedulerUnavailableError } from './src/domain/errors';

// Types
export { SchedulerKind } from './src/domain/enums/scheduler';
export type {
  HealthReport,
  HealthStatus,
  ComponentHealth,
  FailoverOutcome,
  FailoverMarkers,
  CertificateReport,
  CertificateCheck,
  Notification,
} from './src/domain/types/types';
