import { LoggerPort } from '../../../domain/ports/logger';
import { log, logVerbose, logPerformance, logStateTransition, logError } from './logger';

/**
 * LoggerPort over the shared logger. An optional scope (the TAK domain in
 * production) is prepended to every module/component name, e.g. `tak.example.com:Cron`.
 */
export class LoggerAdapter implements LoggerPort {
  constructor(private readonly scope?: string) {}

  private scoped(name: string): string {
    return this.scope ? `${this.scope}:${name}` : name;
  }

  log(module: string, message: string, ...args: unknown[]): void {
    log(this.scoped(module), message, ...args);
  }

  logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
    logVerbose(this.scoped(component), message, data);
  }

  logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
    logPerformance(this.scope ? `[${this.scope}] ${operation}` : operation, duration, metadata);
  }

  logStateTransition(from: string, to: string, context?: Record<string, unknown>): void {
    logStateTransition(from, to, this.scope ? { scope: this.scope, ...context } : context);
  }

  logError(module: string, message: string, error?: unknown): void {
    logError(this.scoped(module), message, error);
  }
}
