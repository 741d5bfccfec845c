import { describe, it, expect, afterEach, vi } from 'vitest';
import { checkDependency, checkEnvironment, formatEnvironmentStatus, type ConnectivityCheck } from './probes.js';
import { Logger, type LogEntry } from './logger.js';

const KEYS = ['A', 'B', 'C', 'D', 'E'];

describe('checkEnvironment', () => {
  it('is healthy when every key is set', () => {
    const env = { A: '1', B: '2', C: '3', D: '4', E: '5' };
    expect(checkEnvironment(KEYS, env)).toEqual({ status: 'healthy' });
  });

  it('names every missing key, not just the first', () => {
    const result = checkEnvironment(KEYS, { A: '1', B: '2', C: '3' });

    expect(result).toEqual({ status: 'missing', missing: ['D', 'E'] });
    expect(formatEnvironmentStatus(result)).toBe('missing: D, E');
  });

  it('treats empty values as missing', () => {
    expect(checkEnvironment(KEYS, { A: '', B: '2', C: '3', D: '4', E: '5' })).toEqual({
      status: 'missing',
      missing: ['A'],
    });
  });

  it('formats a healthy result', () => {
    expect(formatEnvironmentStatus({ status: 'healthy' })).toBe('healthy');
  });
});

describe('checkDependency', () => {
  const logger = new Logger('probe', { console: false });

  afterEach(() => {
    vi.useRealTimers();
    logger.removeAllListeners();
  });

  it('maps the connectivity result', async () => {
    const up: ConnectivityCheck = { testConnection: async () => true };
    const down: ConnectivityCheck = { testConnection: async () => false };

    expect(await checkDependency(up, { timeoutMs: 1000, logger })).toBe('healthy');
    expect(await checkDependency(down, { timeoutMs: 1000, logger })).toBe('unhealthy');
  });

  it('logs and swallows errors from the check', async () => {
    const entries: LogEntry[] = [];
    logger.on('log', (entry: LogEntry) => entries.push(entry));
    const failing: ConnectivityCheck = {
      testConnection: async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
      },
    };

    expect(await checkDependency(failing, { timeoutMs: 1000, logger })).toBe('unhealthy');
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'error',
      message: 'Database health check failed',
      error: 'connect ECONNREFUSED 127.0.0.1:5432',
    });
  });

  it('gives up on a check that never settles', async () => {
    vi.useFakeTimers();
    const entries: LogEntry[] = [];
    logger.on('log', (entry: LogEntry) => entries.push(entry));
    const hanging: ConnectivityCheck = { testConnection: () => new Promise<boolean>(() => {}) };

    const result = checkDependency(hanging, { timeoutMs: 5000, logger });
    await vi.advanceTimersByTimeAsync(5000);

    expect(await result).toBe('unhealthy');
    expect(entries[0].error).toBe('Timeout after 5000ms: database connectivity check');
  });
});
