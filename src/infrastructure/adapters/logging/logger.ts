// Shared logging utilities for tak-renewal
// All modules should import from this file instead of defining their own
// Diagnostics go to stderr; stdout is reserved for command output (reports, JSON)

function isVerbose(): boolean {
  return process.env.TAK_RENEWAL_VERBOSE === 'true';
}

function writeErrorLine(line: string): void {
  if (typeof process !== 'undefined' && process.stderr) {
    process.stderr.write(line + '\n');
  } else {
    console.error(line);
  }
}

export function log(module: string, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const argsStr = args.length > 0 ? ' ' + JSON.stringify(args) : '';
  writeErrorLine(`[${timestamp}] [${module}] ${message}${argsStr}`);
}

export function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  if (!isVerbose()) return;
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | Data: ${JSON.stringify(data)}` : '';
  writeErrorLine(`[${timestamp}] [VERBOSE] [${component}] ${message}${dataStr}`);
}

export function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  if (!isVerbose()) return;
  const timestamp = new Date().toISOString();
  const metadataStr = metadata ? ` | Metadata: ${JSON.stringify(metadata)}` : '';
  writeErrorLine(`[${timestamp}] [PERFORMANCE] ${operation} took ${duration}ms${metadataStr}`);
}

export function logStateTransition(from: string, to: string, context?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
  writeErrorLine(`[${timestamp}] [STATE_TRANSITION] ${from} -> ${to}${contextStr}`);
}

export function logError(module: string, message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  const errorStr = error instanceof Error ? ` | Error: ${error.message}` : error ? ` | Error: ${JSON.stringify(error)}` : '';
  writeErrorLine(`[${timestamp}] [ERROR] [${module}] ${message}${errorStr}`);
}
