/**
 * Supervisor Metrics
 *
 * In-memory counters for the supervised agent, exported as JSON or in the
 * Prometheus text format.
 */

export interface AgentMetricsSnapshot {
  spawns: number;
  failures: number;
  autoRestarts: number;
  manualRestarts: number;
  exhaustions: number;
  lastFailureAt?: string;
  lastFailureReason?: string;
}

export interface MetricsGauges {
  errorCount: number;
  running: boolean;
}

export class SupervisorMetrics {
  private counters: AgentMetricsSnapshot = {
    spawns: 0,
    failures: 0,
    autoRestarts: 0,
    manualRestarts: 0,
    exhaustions: 0,
  };
  private readonly startTime = Date.now();

  recordSpawn(): void {
    this.counters.spawns++;
  }

  recordFailure(reason: string): void {
    this.counters.failures++;
    this.counters.lastFailureAt = new Date().toISOString();
    this.counters.lastFailureReason = reason;
  }

  recordRestart(reason: 'auto' | 'manual'): void {
    if (reason === 'auto') {
      this.counters.autoRestarts++;
    } else {
      this.counters.manualRestarts++;
    }
  }

  recordExhausted(): void {
    this.counters.exhaustions++;
  }

  toJSON(): AgentMetricsSnapshot {
    return { ...this.counters };
  }

  toPrometheus(gauges: MetricsGauges): string {
    const lines: string[] = [];
    const metric = (name: string, type: 'counter' | 'gauge', help: string, value: number): void => {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} ${type}`);
      lines.push(`${name} ${value}`);
    };

    metric(
      'agent_warden_uptime_seconds',
      'gauge',
      'Seconds since the supervisor started',
      Math.floor((Date.now() - this.startTime) / 1000)
    );
    metric('agent_warden_agent_spawns_total', 'counter', 'Agent runner spawns', this.counters.spawns);
    metric('agent_warden_agent_failures_total', 'counter', 'Agent failures', this.counters.failures);
    metric(
      'agent_warden_auto_restarts_total',
      'counter',
      'Restarts triggered by the staleness check',
      this.counters.autoRestarts
    );
    metric(
      'agent_warden_manual_restarts_total',
      'counter',
      'Restarts requested through /restart',
      this.counters.manualRestarts
    );
    metric(
      'agent_warden_retry_exhaustions_total',
      'counter',
      'Times the retry budget ran out',
      this.counters.exhaustions
    );
    metric('agent_warden_error_count', 'gauge', 'Consecutive agent failures', gauges.errorCount);
    metric('agent_warden_agent_running', 'gauge', 'Whether the agent is running (0/1)', gauges.running ? 1 : 0);

    return lines.join('\n') + '\n';
  }
}
