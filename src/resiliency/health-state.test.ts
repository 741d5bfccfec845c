import { describe, it, expect } from 'vitest';
import { HealthState } from './health-state.js';

describe('HealthState', () => {
  it('starts in the starting state', () => {
    const state = new HealthState(() => Date.UTC(2026, 0, 1));

    expect(state.snapshot()).toEqual({
      status: 'starting',
      database: 'unknown',
      environment: 'unknown',
      agent: 'starting',
      errorCount: 0,
      lastError: null,
      lastCheck: null,
      uptime: 0,
      startedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('stamps check time and uptime when recording a check', () => {
    let now = Date.UTC(2026, 0, 1);
    const state = new HealthState(() => now);
    now += 90_500;

    const snapshot = state.recordCheck({ status: 'healthy', database: 'healthy', environment: 'healthy' });

    expect(snapshot).toMatchObject({
      status: 'healthy',
      database: 'healthy',
      environment: 'healthy',
      lastCheck: '2026-01-01T00:01:30.500Z',
      uptime: 90,
    });
  });

  it('counts worker failures until reset', () => {
    const state = new HealthState();

    expect(state.recordWorkerFailure('first')).toBe(1);
    expect(state.recordWorkerFailure('second')).toBe(2);
    expect(state.snapshot()).toMatchObject({ errorCount: 2, lastError: 'second' });

    state.resetErrors();
    expect(state.snapshot()).toMatchObject({ errorCount: 0, lastError: null });
  });

  it('hands out copies', () => {
    const state = new HealthState();
    const snapshot = state.snapshot();
    snapshot.errorCount = 99;

    expect(state.snapshot().errorCount).toBe(0);
  });
});
