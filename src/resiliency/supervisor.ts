/**
 * Agent Supervisor
 *
 * Runs the agent worker, contains its failures and restarts it with bounded,
 * backoff-delayed retries. Three paths can launch a new worker-runner:
 * - `start()` at boot
 * - `maybeAutoRestart()` when a health poll finds the agent stale
 * - `manualRestart()` from the `/restart` endpoint
 *
 * Those paths are serialized by a mutex. A runner only writes shared state
 * while it is the current, non-aborted runner, so an abandoned runner whose
 * worker ignores its stop signal can keep executing but can no longer touch
 * counters or the agent phase.
 */

import { EventEmitter } from 'node:events';
import { WorkerCancelledError, errorMessage } from '../utils/errors.js';
import { nextDelay } from './backoff.js';
import type { HealthState } from './health-state.js';
import { createLogger, type Logger } from './logger.js';
import { SupervisorMetrics } from './metrics.js';
import { Mutex } from './mutex.js';

/**
 * The supervised unit of work. `run` resolves when the agent stops cleanly
 * and rejects when it fails; it should return promptly once `signal` aborts.
 */
export interface AgentWorker {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
}

export interface SupervisorConfig {
  maxRetries: number;
  initialRetryDelayMs: number;
  backoffFactor: number;
  maxRetryDelayMs: number;
  /** Minimum time since the last restart attempt before a poll may auto-restart */
  staleRestartMs: number;
  /** Bounded wait for a previous runner to finish before it is abandoned */
  joinTimeoutMs: number;
  /** Grace period for a worker to honour its stop signal on manual restart */
  stopGraceMs: number;
}

export interface SupervisorClock {
  now(): number;
  /** Resolves after `ms`, or as soon as `signal` aborts */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export interface SupervisorRuntime {
  retryCount: number;
  retryDelayMs: number;
  lastRestartAt: number | null;
  running: boolean;
  exhausted: boolean;
  runnerId: number | null;
}

export interface SupervisorOptions {
  worker: AgentWorker;
  state: HealthState;
  config?: Partial<SupervisorConfig>;
  logger?: Logger;
  metrics?: SupervisorMetrics;
  clock?: Partial<SupervisorClock>;
}

interface Runner {
  id: number;
  controller: AbortController;
  done: Promise<void>;
  finished: boolean;
}

export const DEFAULT_SUPERVISOR_CONFIG: SupervisorConfig = {
  maxRetries: 5,
  initialRetryDelayMs: 30_000,
  backoffFactor: 1.5,
  maxRetryDelayMs: 300_000,
  staleRestartMs: 300_000,
  joinTimeoutMs: 10_000,
  stopGraceMs: 2_000,
};

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const finish = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal.addEventListener('abort', finish, { once: true });
  });
}

export class AgentSupervisor extends EventEmitter {
  private readonly config: SupervisorConfig;
  private readonly worker: AgentWorker;
  private readonly state: HealthState;
  private readonly logger: Logger;
  private readonly metrics: SupervisorMetrics;
  private readonly clock: SupervisorClock;
  private readonly mutex = new Mutex();

  private runner?: Runner;
  private nextRunnerId = 0;
  private retryCount = 0;
  private retryDelayMs: number;
  private lastRestartAt: number | null = null;
  private running = false;
  private exhausted = false;
  private shuttingDown = false;

  constructor(options: SupervisorOptions) {
    super();
    this.config = { ...DEFAULT_SUPERVISOR_CONFIG, ...options.config };
    this.worker = options.worker;
    this.state = options.state;
    this.logger = options.logger ?? createLogger('supervisor');
    this.metrics = options.metrics ?? new SupervisorMetrics();
    this.clock = {
      now: options.clock?.now ?? Date.now,
      sleep: options.clock?.sleep ?? abortableSleep,
    };
    this.retryDelayMs = this.initialDelay();
  }

  /**
   * Launch the worker-runner unless one is already live or the retry budget
   * is spent. Resolves to whether a runner was spawned.
   */
  async start(): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      if (this.shuttingDown) {
        return false;
      }
      if (this.isRunnerLive()) {
        this.logger.debug('Agent runner already active; start ignored', { runnerId: this.runner?.id });
        return false;
      }
      if (this.retryCount >= this.config.maxRetries) {
        this.logger.warn('Retry budget exhausted; a manual restart is required', {
          retryCount: this.retryCount,
          maxRetries: this.config.maxRetries,
        });
        return false;
      }
      this.spawnRunner();
      return true;
    });
  }

  /**
   * Self-healing path, called on every health poll. Restarts the agent when
   * it is not running, the retry budget is not spent, and the last restart
   * attempt is older than the staleness threshold. Skipped while another
   * lifecycle operation holds or awaits the lock, so a poll never waits on a
   * manual restart's join.
   */
  async maybeAutoRestart(): Promise<boolean> {
    if (this.mutex.locked) {
      this.logger.debug('Lifecycle operation in progress; auto-restart check skipped');
      return false;
    }
    return this.mutex.runExclusive(async () => {
      if (!this.isAutoRestartDue()) {
        return false;
      }

      this.logger.info('Attempting to restart agent after extended downtime', {
        retryCount: this.retryCount,
        lastRestartAt: this.lastRestartAt,
      });

      const previous = this.runner;
      if (previous && !previous.finished) {
        previous.controller.abort();
        if (!(await this.join(previous, this.config.joinTimeoutMs))) {
          this.abandon(previous);
        }
      }

      const runner = this.spawnRunner();
      this.lastRestartAt = this.clock.now();
      this.metrics.recordRestart('auto');
      this.emit('restarted', { reason: 'auto', runnerId: runner.id });
      return true;
    });
  }

  /**
   * Reset the failure counters and replace the current runner. Waits up to
   * `stopGraceMs` for the old worker to stop, then up to `joinTimeoutMs`
   * more, and abandons it if it is still going.
   */
  async manualRestart(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.logger.info('Manual agent restart requested');

      this.retryCount = 0;
      this.exhausted = false;
      this.state.resetErrors();

      const previous = this.runner;
      if (previous && !previous.finished) {
        previous.controller.abort();
        this.running = false;
        const stopped =
          (await this.join(previous, this.config.stopGraceMs)) ||
          (await this.join(previous, this.config.joinTimeoutMs));
        if (!stopped) {
          this.abandon(previous);
        }
      }

      const runner = this.spawnRunner();
      this.lastRestartAt = this.clock.now();
      this.metrics.recordRestart('manual');
      this.emit('restarted', { reason: 'manual', runnerId: runner.id });
    });
  }

  /**
   * Stop the agent for shutdown. No runner is started afterwards.
   */
  async stop(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.shuttingDown = true;
      const runner = this.runner;
      if (!runner || runner.finished) {
        return;
      }

      this.logger.info('Stopping agent', { runnerId: runner.id });
      runner.controller.abort();
      this.running = false;
      this.state.setAgentPhase('stopped');
      if (!(await this.join(runner, this.config.joinTimeoutMs))) {
        this.abandon(runner);
      }
    });
  }

  getRuntime(): SupervisorRuntime {
    return {
      retryCount: this.retryCount,
      retryDelayMs: this.retryDelayMs,
      lastRestartAt: this.lastRestartAt,
      running: this.running,
      exhausted: this.exhausted,
      runnerId: this.runner?.id ?? null,
    };
  }

  getMetrics(): SupervisorMetrics {
    return this.metrics;
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  private initialDelay(): number {
    return Math.min(this.config.initialRetryDelayMs, this.config.maxRetryDelayMs);
  }

  private isRunnerLive(): boolean {
    return this.runner !== undefined && !this.runner.finished && !this.runner.controller.signal.aborted;
  }

  private isAutoRestartDue(): boolean {
    if (this.shuttingDown || this.running || this.retryCount >= this.config.maxRetries) {
      return false;
    }
    // Never restarted yet counts as stale
    return this.lastRestartAt === null || this.clock.now() - this.lastRestartAt > this.config.staleRestartMs;
  }

  private owns(runner: Runner): boolean {
    return this.runner === runner && !runner.controller.signal.aborted;
  }

  private spawnRunner(): Runner {
    const runner: Runner = {
      id: ++this.nextRunnerId,
      controller: new AbortController(),
      done: Promise.resolve(),
      finished: false,
    };
    this.runner = runner;
    this.retryDelayMs = this.initialDelay();
    this.exhausted = false;
    this.running = true;
    this.state.setAgentPhase('running');
    this.metrics.recordSpawn();

    runner.done = this.runLoop(runner)
      .catch((err: unknown) => {
        this.logger.logError(err, 'Agent runner crashed', { runnerId: runner.id });
      })
      .finally(() => {
        runner.finished = true;
      });

    return runner;
  }

  private async runLoop(runner: Runner): Promise<void> {
    const { signal } = runner.controller;

    while (this.owns(runner)) {
      this.running = true;
      this.state.setAgentPhase('running');
      this.logger.info(
        `Starting agent ${this.worker.name} (attempt ${this.retryCount + 1}/${this.config.maxRetries})`,
        { runnerId: runner.id }
      );
      this.emit('started', { runnerId: runner.id, attempt: this.retryCount + 1 });

      try {
        await this.worker.run(signal);
      } catch (err) {
        if (!this.owns(runner)) {
          return;
        }
        if (err instanceof WorkerCancelledError) {
          this.markStopped(runner, 'cancelled');
          return;
        }

        const delayMs = this.recordFailure(runner, err);
        if (delayMs === null) {
          return;
        }
        await this.clock.sleep(delayMs, signal);
        if (!this.owns(runner)) {
          return;
        }
        this.retryDelayMs = nextDelay(this.retryDelayMs, {
          initialDelayMs: this.config.initialRetryDelayMs,
          factor: this.config.backoffFactor,
          maxDelayMs: this.config.maxRetryDelayMs,
        });
        continue;
      }

      if (this.owns(runner)) {
        this.markStopped(runner, 'completed');
      }
      return;
    }
  }

  private markStopped(runner: Runner, reason: 'completed' | 'cancelled'): void {
    this.running = false;
    this.state.setAgentPhase('stopped');
    this.logger.info(reason === 'completed' ? 'Agent stopped normally' : 'Agent stopped by cancellation', {
      runnerId: runner.id,
    });
    this.emit('stopped', { runnerId: runner.id, reason });
  }

  /**
   * Count a failure and decide what happens next: the delay to sleep before
   * the next attempt, or null once the retry budget is spent.
   */
  private recordFailure(runner: Runner, err: unknown): number | null {
    const message = errorMessage(err);
    this.retryCount++;
    const errorCount = this.state.recordWorkerFailure(message);
    this.running = false;
    this.state.setAgentPhase('stopped');
    this.lastRestartAt = this.clock.now();
    this.metrics.recordFailure(message);

    this.logger.error(`Agent error (attempt ${this.retryCount}/${this.config.maxRetries})`, {
      runnerId: runner.id,
      error: message,
      errorCount,
    });
    this.emit('failed', { runnerId: runner.id, error: message, retryCount: this.retryCount, errorCount });

    if (this.retryCount < this.config.maxRetries) {
      const delayMs = this.retryDelayMs;
      this.logger.info(`Restarting agent in ${delayMs / 1000} seconds`, { runnerId: runner.id });
      this.emit('retrying', { runnerId: runner.id, attempt: this.retryCount + 1, delayMs });
      return delayMs;
    }

    this.exhausted = true;
    this.metrics.recordExhausted();
    this.logger.error('Maximum retry attempts reached. Agent will not restart automatically.', {
      runnerId: runner.id,
      maxRetries: this.config.maxRetries,
    });
    this.emit('exhausted', { runnerId: runner.id, errorCount });
    return null;
  }

  /**
   * Wait up to `timeoutMs` for a runner's loop to finish.
   */
  private async join(runner: Runner, timeoutMs: number): Promise<boolean> {
    if (runner.finished) {
      return true;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([runner.done.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private abandon(runner: Runner): void {
    this.logger.warn('Previous agent runner did not stop in time; abandoning it', { runnerId: runner.id });
    this.emit('abandoned', { runnerId: runner.id });
  }
}
