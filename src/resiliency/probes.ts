/**
 * Health probes
 *
 * Environment and dependency checks evaluated on every `/health` poll. Neither
 * probe throws: failures are logged and reported as a status.
 */

import { TimeoutError, errorMessage } from '../utils/errors.js';
import type { DependencyStatus } from './health-state.js';
import type { Logger } from './logger.js';

export type EnvironmentCheck =
  | { status: 'healthy' }
  | { status: 'missing'; missing: string[] };

/**
 * Connectivity capability for an external dependency (the agent's database).
 * Implementations own their connection timeouts.
 */
export interface ConnectivityCheck {
  testConnection(): Promise<boolean>;
}

export function checkEnvironment(
  requiredKeys: readonly string[],
  env: Record<string, string | undefined>
): EnvironmentCheck {
  const missing = requiredKeys.filter((key) => !env[key]);
  return missing.length === 0 ? { status: 'healthy' } : { status: 'missing', missing };
}

export function formatEnvironmentStatus(result: EnvironmentCheck): string {
  return result.status === 'healthy' ? 'healthy' : `missing: ${result.missing.join(', ')}`;
}

export interface DependencyProbeOptions {
  timeoutMs: number;
  logger: Logger;
}

export async function checkDependency(
  check: ConnectivityCheck,
  options: DependencyProbeOptions
): Promise<DependencyStatus> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError('database connectivity check', options.timeoutMs)),
      options.timeoutMs
    );
  });

  try {
    const ok = await Promise.race([check.testConnection(), timeout]);
    return ok ? 'healthy' : 'unhealthy';
  } catch (err) {
    options.logger.error('Database health check failed', { error: errorMessage(err) });
    return 'unhealthy';
  } finally {
    clearTimeout(timer);
  }
}
