/**
 * Wires configuration, supervisor, probes and the health server into one
 * process-level unit.
 */

import { ModuleWorker } from './agent/module-worker.js';
import { REQUIRED_ENV_KEYS, type EnvSource, type WardenConfig } from './config/env-config.js';
import { PostgresConnectivityCheck } from './health/db-driver.js';
import { createHealthServer, type HealthServer } from './health/server.js';
import { HealthState } from './resiliency/health-state.js';
import { Logger, configure } from './resiliency/logger.js';
import {
  checkDependency,
  checkEnvironment,
  formatEnvironmentStatus,
  type ConnectivityCheck,
} from './resiliency/probes.js';
import { AgentSupervisor, type AgentWorker } from './resiliency/supervisor.js';

export interface WardenOptions {
  config: WardenConfig;
  env?: EnvSource;
  logger?: Logger;
  worker?: AgentWorker;
  database?: ConnectivityCheck;
  requiredEnvKeys?: readonly string[];
}

export interface Warden {
  state: HealthState;
  supervisor: AgentSupervisor;
  server: HealthServer;
  /** Boot the agent (when the environment allows) and start listening */
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface CheckReport {
  healthy: boolean;
  database: string;
  environment: string;
}

function rootLogger(config: WardenConfig): Logger {
  return new Logger('warden', {
    level: config.logging.level,
    json: config.logging.json,
    file: config.logging.file,
  });
}

function defaultDatabase(config: WardenConfig, logger: Logger): ConnectivityCheck {
  return new PostgresConnectivityCheck({
    connectionString: config.databaseUrl,
    connectTimeoutMs: config.probeTimeoutMs,
    logger: logger.child('database'),
  });
}

export function createWarden(options: WardenOptions): Warden {
  const { config } = options;
  const env = options.env ?? process.env;
  const requiredEnvKeys = options.requiredEnvKeys ?? REQUIRED_ENV_KEYS;
  configure({ level: config.logging.level, json: config.logging.json });
  const logger = options.logger ?? rootLogger(config);

  const state = new HealthState();
  const worker = options.worker ?? new ModuleWorker({ modulePath: config.agentModule });
  const database = options.database ?? defaultDatabase(config, logger);

  const supervisor = new AgentSupervisor({
    worker,
    state,
    config: config.supervisor,
    logger: logger.child('supervisor', { agent: worker.name }),
  });

  const server = createHealthServer({
    state,
    supervisor,
    database,
    requiredEnvKeys,
    env,
    serviceName: config.server.serviceName,
    port: config.server.port,
    host: config.server.host,
    probeTimeoutMs: config.probeTimeoutMs,
    logger: logger.child('http'),
  });

  return {
    state,
    supervisor,
    server,

    async start() {
      const envResult = checkEnvironment(requiredEnvKeys, env);
      if (envResult.status === 'healthy') {
        await supervisor.start();
      } else {
        // The first /health poll still auto-starts the agent, keys or not
        logger.error('Missing required environment variables; agent not started', {
          missing: envResult.missing,
        });
        state.setStatus('unhealthy');
        state.setEnvironment(formatEnvironmentStatus(envResult));
      }
      await server.start();
    },

    async stop() {
      await supervisor.stop();
      await server.stop();
    },
  };
}

/**
 * One-shot readiness probe used by the `check` command. Does not touch the
 * agent.
 */
export async function runChecks(options: Omit<WardenOptions, 'worker'>): Promise<CheckReport> {
  const { config } = options;
  const env = options.env ?? process.env;
  const logger = options.logger ?? rootLogger(config);
  const database = options.database ?? defaultDatabase(config, logger);

  const databaseStatus = await checkDependency(database, {
    timeoutMs: config.probeTimeoutMs,
    logger,
  });
  const envResult = checkEnvironment(options.requiredEnvKeys ?? REQUIRED_ENV_KEYS, env);

  return {
    healthy: databaseStatus === 'healthy' && envResult.status === 'healthy',
    database: databaseStatus,
    environment: formatEnvironmentStatus(envResult),
  };
}
