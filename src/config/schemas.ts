import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const durationMs = z.coerce.number().int().nonnegative();

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

// Environment variables read by the warden itself. The agent's required keys
// are checked by the environment probe instead, so their absence never blocks
// startup.
export const WardenEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  SERVICE_NAME: z.string().min(1).default('agent-warden'),
  AGENT_MODULE: z.string().min(1).default('./agent.js'),
  NODE_ENV: z.string().optional(),
  WARDEN_MAX_RETRIES: z.coerce.number().int().positive().default(5),
  WARDEN_RETRY_DELAY_MS: durationMs.default(30_000),
  WARDEN_BACKOFF_FACTOR: z.coerce.number().min(1).default(1.5),
  WARDEN_MAX_RETRY_DELAY_MS: durationMs.default(300_000),
  WARDEN_STALE_RESTART_MS: durationMs.default(300_000),
  WARDEN_JOIN_TIMEOUT_MS: durationMs.default(10_000),
  WARDEN_STOP_GRACE_MS: durationMs.default(2_000),
  WARDEN_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  WARDEN_LOG_LEVEL: LogLevelSchema.default('info'),
  WARDEN_LOG_JSON: flag.optional(),
  WARDEN_LOG_FILE: z.string().min(1).optional(),
});

export type WardenEnv = z.infer<typeof WardenEnvSchema>;
