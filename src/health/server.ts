/**
 * Agent Warden - Health Server
 *
 * express app polled by the platform health checker. `/health` re-probes the
 * environment and database and gives the supervisor a chance to self-heal;
 * `/status` only reads.
 */

import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { EnvSource } from '../config/env-config.js';
import type { HealthState } from '../resiliency/health-state.js';
import { createLogger, type Logger } from '../resiliency/logger.js';
import {
  checkDependency,
  checkEnvironment,
  formatEnvironmentStatus,
  type ConnectivityCheck,
} from '../resiliency/probes.js';
import type { AgentSupervisor } from '../resiliency/supervisor.js';
import { errorMessage } from '../utils/errors.js';

export const ENDPOINTS = ['/health', '/status', '/restart', '/metrics'] as const;

export type SupervisorControl = Pick<
  AgentSupervisor,
  'maybeAutoRestart' | 'manualRestart' | 'getRuntime' | 'getMetrics' | 'maxRetries'
>;

export interface HealthServerOptions {
  state: HealthState;
  supervisor: SupervisorControl;
  database: ConnectivityCheck;
  requiredEnvKeys: readonly string[];
  env?: EnvSource;
  serviceName?: string;
  port?: number;
  host?: string;
  probeTimeoutMs?: number;
  logger?: Logger;
}

export interface HealthServer {
  app: Express;
  start(): Promise<void>;
  stop(): Promise<void>;
  address(): AddressInfo | null;
}

export function createHealthServer(options: HealthServerOptions): HealthServer {
  const { state, supervisor, database, requiredEnvKeys } = options;
  const env = options.env ?? process.env;
  const serviceName = options.serviceName ?? 'agent-warden';
  const probeTimeoutMs = options.probeTimeoutMs ?? 5000;
  const logger = options.logger ?? createLogger('http');
  const app = express();

  app.disable('x-powered-by');

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: serviceName,
      status: state.snapshot().status,
      uptime: state.uptimeSeconds(),
      endpoints: ENDPOINTS,
    });
  });

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const databaseStatus = await checkDependency(database, { timeoutMs: probeTimeoutMs, logger });
      const envResult = checkEnvironment(requiredEnvKeys, env);

      await supervisor.maybeAutoRestart();

      const ready = databaseStatus === 'healthy' && envResult.status === 'healthy';
      const agentOk = state.snapshot().errorCount < supervisor.maxRetries;
      const snapshot = state.recordCheck({
        status: ready && agentOk ? 'healthy' : 'unhealthy',
        database: databaseStatus,
        environment: formatEnvironmentStatus(envResult),
      });

      // Agent errors alone keep 200 while the supervisor is still recovering
      res.status(ready ? 200 : 503).json(snapshot);
    } catch (err) {
      logger.error('Health check error', { error: errorMessage(err) });
      state.setStatus('error');
      res.status(503).json({
        status: 'error',
        error: errorMessage(err),
        uptime: state.uptimeSeconds(),
      });
    }
  });

  app.get('/status', (_req: Request, res: Response) => {
    res.json(state.snapshot());
  });

  app.get('/restart', (_req: Request, res: Response) => {
    try {
      supervisor.manualRestart().catch((err: unknown) => {
        logger.logError(err, 'Manual restart failed');
      });
      res.json({ status: 'success', message: 'Agent restart initiated' });
    } catch (err) {
      logger.error('Manual restart error', { error: errorMessage(err) });
      res.status(500).json({ status: 'error', error: errorMessage(err) });
    }
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    const body = supervisor.getMetrics().toPrometheus({
      errorCount: state.snapshot().errorCount,
      running: supervisor.getRuntime().running,
    });
    res.type('text/plain; version=0.0.4').send(body);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ status: 'error', error: 'Not found' });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.logError(err, 'Unhandled request error');
    res.status(500).json({ status: 'error', error: err.message });
  });

  let server: Server | null = null;

  return {
    app,

    async start() {
      const port = options.port ?? 8080;
      const host = options.host ?? '0.0.0.0';
      await new Promise<void>((resolve, reject) => {
        const listener = app.listen(port, host);
        listener.once('error', reject);
        listener.once('listening', () => {
          listener.off('error', reject);
          server = listener;
          resolve();
        });
      });
      logger.info(`Health server listening on ${host}:${port}`);
    },

    async stop() {
      const listener = server;
      if (!listener) return;
      server = null;
      await new Promise<void>((resolve, reject) => {
        listener.close((err) => (err ? reject(err) : resolve()));
      });
    },

    address() {
      const info = server?.address();
      return info && typeof info === 'object' ? info : null;
    },
  };
}
