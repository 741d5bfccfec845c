export * from './resiliency/index.js';
export * from './utils/errors.js';
export { loadWardenConfig, REQUIRED_ENV_KEYS, type EnvSource, type WardenConfig } from './config/env-config.js';
export { ModuleWorker, type ModuleLoader, type ModuleWorkerOptions } from './agent/module-worker.js';
export {
  PostgresConnectivityCheck,
  type PgClientFactory,
  type PgClientLike,
  type PostgresCheckOptions,
} from './health/db-driver.js';
export {
  createHealthServer,
  ENDPOINTS,
  type HealthServer,
  type HealthServerOptions,
  type SupervisorControl,
} from './health/server.js';
export { createWarden, runChecks, type CheckReport, type Warden, type WardenOptions } from './warden.js';
