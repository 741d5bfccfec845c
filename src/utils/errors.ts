/**
 * Error Types for Agent Warden
 *
 * Typed error classes shared by the supervisor, probes, config loader and CLI.
 */

export class WardenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WardenError';
  }
}

export class ConfigError extends WardenError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class TimeoutError extends WardenError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class WorkerLoadError extends WardenError {
  constructor(specifier: string, reason: string) {
    super(`Failed to load agent module "${specifier}": ${reason}`);
    this.name = 'WorkerLoadError';
  }
}

/**
 * Thrown by a worker that observed its stop signal. The supervisor treats it
 * as cancellation rather than failure.
 */
export class WorkerCancelledError extends WardenError {
  constructor(message?: string) {
    super(message || 'Agent worker was cancelled');
    this.name = 'WorkerCancelledError';
  }
}

/**
 * Render any thrown value as a message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
