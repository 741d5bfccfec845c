import { describe, it, expect } from 'vitest';
import { SupervisorMetrics } from './metrics.js';

describe('SupervisorMetrics', () => {
  it('counts lifecycle events', () => {
    const metrics = new SupervisorMetrics();
    metrics.recordSpawn();
    metrics.recordSpawn();
    metrics.recordFailure('connection reset');
    metrics.recordRestart('auto');
    metrics.recordRestart('manual');
    metrics.recordRestart('manual');
    metrics.recordExhausted();

    expect(metrics.toJSON()).toMatchObject({
      spawns: 2,
      failures: 1,
      autoRestarts: 1,
      manualRestarts: 2,
      exhaustions: 1,
      lastFailureReason: 'connection reset',
    });
    expect(typeof metrics.toJSON().lastFailureAt).toBe('string');
  });

  it('exports Prometheus series', () => {
    const metrics = new SupervisorMetrics();
    metrics.recordSpawn();
    metrics.recordFailure('boom');

    const lines = metrics.toPrometheus({ errorCount: 1, running: false }).split('\n');

    expect(lines).toContain('# TYPE agent_warden_agent_spawns_total counter');
    expect(lines).toContain('agent_warden_agent_spawns_total 1');
    expect(lines).toContain('agent_warden_agent_failures_total 1');
    expect(lines).toContain('agent_warden_error_count 1');
    expect(lines).toContain('agent_warden_agent_running 0');
  });
});
