/**
 * Warden configuration loaded from environment variables.
 */

import { ConfigError } from '../utils/errors.js';
import type { SupervisorConfig } from '../resiliency/supervisor.js';
import type { LogLevel } from '../resiliency/logger.js';
import { WardenEnvSchema } from './schemas.js';

/** Keys the agent needs to do its job; checked on every health poll. */
export const REQUIRED_ENV_KEYS = [
  'LIVEKIT_URL',
  'LIVEKIT_API_KEY',
  'LIVEKIT_API_SECRET',
  'OPENAI_API_KEY',
  'DATABASE_URL',
] as const;

export type EnvSource = Record<string, string | undefined>;

export interface WardenConfig {
  server: {
    port: number;
    host: string;
    serviceName: string;
  };
  agentModule: string;
  databaseUrl?: string;
  probeTimeoutMs: number;
  supervisor: SupervisorConfig;
  logging: {
    level: LogLevel;
    json: boolean;
    file?: string;
  };
}

export function loadWardenConfig(env: EnvSource = process.env): WardenConfig {
  // Blank variables behave as unset so defaults still apply
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const parsed = WardenEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  return {
    server: {
      port: vars.PORT,
      host: vars.HOST,
      serviceName: vars.SERVICE_NAME,
    },
    agentModule: vars.AGENT_MODULE,
    databaseUrl: present.DATABASE_URL,
    probeTimeoutMs: vars.WARDEN_PROBE_TIMEOUT_MS,
    supervisor: {
      maxRetries: vars.WARDEN_MAX_RETRIES,
      initialRetryDelayMs: vars.WARDEN_RETRY_DELAY_MS,
      backoffFactor: vars.WARDEN_BACKOFF_FACTOR,
      maxRetryDelayMs: vars.WARDEN_MAX_RETRY_DELAY_MS,
      staleRestartMs: vars.WARDEN_STALE_RESTART_MS,
      joinTimeoutMs: vars.WARDEN_JOIN_TIMEOUT_MS,
      stopGraceMs: vars.WARDEN_STOP_GRACE_MS,
    },
    logging: {
      level: vars.WARDEN_LOG_LEVEL,
      json: vars.WARDEN_LOG_JSON ?? vars.NODE_ENV === 'production',
      file: vars.WARDEN_LOG_FILE,
    },
  };
}
