/**
 * Agent Resiliency Module
 *
 * Supervision, health bookkeeping, probes, logging and metrics for a single
 * long-running agent.
 *
 * Usage:
 *
 * ```ts
 * import { AgentSupervisor, HealthState, createLogger } from './resiliency/index.js';
 *
 * const state = new HealthState();
 * const supervisor = new AgentSupervisor({
 *   worker: { name: 'voice-agent', run: (signal) => runAgent(signal) },
 *   state,
 *   config: { maxRetries: 5, initialRetryDelayMs: 30_000 },
 * });
 * await supervisor.start();
 *
 * // Later, from a health poll
 * await supervisor.maybeAutoRestart();
 * console.log(supervisor.getMetrics().toPrometheus({
 *   errorCount: state.snapshot().errorCount,
 *   running: supervisor.getRuntime().running,
 * }));
 * ```
 */

export {
  AgentSupervisor,
  DEFAULT_SUPERVISOR_CONFIG,
  type AgentWorker,
  type SupervisorClock,
  type SupervisorConfig,
  type SupervisorOptions,
  type SupervisorRuntime,
} from './supervisor.js';

export {
  HealthState,
  type AgentPhase,
  type DependencyStatus,
  type HealthSnapshot,
  type OverallStatus,
  type ProbeUpdate,
} from './health-state.js';

export {
  checkDependency,
  checkEnvironment,
  formatEnvironmentStatus,
  type ConnectivityCheck,
  type DependencyProbeOptions,
  type EnvironmentCheck,
} from './probes.js';

export { nextDelay, delaySchedule, type BackoffPolicy } from './backoff.js';

export { Mutex } from './mutex.js';

export { SupervisorMetrics, type AgentMetricsSnapshot, type MetricsGauges } from './metrics.js';

export {
  Logger,
  RotatingFile,
  configure,
  createLogger,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
