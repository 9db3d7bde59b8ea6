// Error types raised by the renewal tooling
// The CLI maps any of these to a non-zero exit code

import { CommandResult } from './types/types';
import { SchedulerKind } from './enums/scheduler';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly result: CommandResult
  ) {
    const stderr = result.stderr.trim();
    super(stderr ? `${message}: ${stderr}` : message);
    this.name = 'CommandFailedError';
  }
}

export class SchedulerUnavailableError extends Error {
  constructor(public readonly kind: SchedulerKind | null, message?: string) {
    super(message ?? (kind ? `Scheduler ${kind} is not available on this system` : 'Neither cron nor systemd available for scheduling'));
    this.name = 'SchedulerUnavailableError';
  }
}
