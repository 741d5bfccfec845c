/**
 * Health State
 *
 * The single shared record behind `/status` and `/health`. The HTTP layer
 * writes probe results; the supervisor writes the agent phase and failure
 * counters. Readers always get a copy.
 */

export type OverallStatus = 'starting' | 'healthy' | 'unhealthy' | 'error';
export type DependencyStatus = 'unknown' | 'healthy' | 'unhealthy';
export type AgentPhase = 'starting' | 'running' | 'stopped';

export interface HealthSnapshot {
  status: OverallStatus;
  database: DependencyStatus;
  /** 'unknown', 'healthy' or 'missing: KEY_A, KEY_B' */
  environment: string;
  agent: AgentPhase;
  errorCount: number;
  lastError: string | null;
  lastCheck: string | null;
  /** Seconds, as of the last health evaluation */
  uptime: number;
  startedAt: string;
}

export interface ProbeUpdate {
  status: OverallStatus;
  database?: DependencyStatus;
  environment?: string;
}

export class HealthState {
  private readonly startedAtMs: number;
  private state: HealthSnapshot;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAtMs = now();
    this.state = {
      status: 'starting',
      database: 'unknown',
      environment: 'unknown',
      agent: 'starting',
      errorCount: 0,
      lastError: null,
      lastCheck: null,
      uptime: 0,
      startedAt: new Date(this.startedAtMs).toISOString(),
    };
  }

  snapshot(): HealthSnapshot {
    return { ...this.state };
  }

  /** Whole seconds since the process started. */
  uptimeSeconds(): number {
    return Math.floor((this.now() - this.startedAtMs) / 1000);
  }

  /**
   * Record the outcome of a health evaluation, stamping the check time and
   * uptime
   */
  recordCheck(update: ProbeUpdate): HealthSnapshot {
    this.state = {
      ...this.state,
      ...update,
      lastCheck: new Date(this.now()).toISOString(),
      uptime: this.uptimeSeconds(),
    };
    return this.snapshot();
  }

  setStatus(status: OverallStatus): void {
    this.state.status = status;
  }

  setEnvironment(environment: string): void {
    this.state.environment = environment;
  }

  // Supervisor-owned fields

  setAgentPhase(phase: AgentPhase): void {
    this.state.agent = phase;
  }

  recordWorkerFailure(message: string): number {
    this.state.errorCount += 1;
    this.state.lastError = message;
    return this.state.errorCount;
  }

  resetErrors(): void {
    this.state.errorCount = 0;
    this.state.lastError = null;
  }
}
