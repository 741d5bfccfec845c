import { describe, it, expect } from 'vitest';
import {
  WardenError,
  ConfigError,
  TimeoutError,
  WorkerLoadError,
  WorkerCancelledError,
  errorMessage,
} from './errors.js';

describe('Error Classes', () => {
  it('WardenError is the base class', () => {
    const err = new WardenError('test error');
    expect(err.message).toBe('test error');
    expect(err.name).toBe('WardenError');
    expect(err).toBeInstanceOf(Error);
  });

  it('ConfigError joins every issue', () => {
    const err = new ConfigError(['PORT: Expected number', 'HOST: Required']);
    expect(err.message).toBe('Invalid configuration: PORT: Expected number; HOST: Required');
    expect(err.issues).toEqual(['PORT: Expected number', 'HOST: Required']);
    expect(err).toBeInstanceOf(WardenError);
  });

  it('TimeoutError includes operation and duration', () => {
    const err = new TimeoutError('database check', 5000);
    expect(err.message).toBe('Timeout after 5000ms: database check');
    expect(err.name).toBe('TimeoutError');
  });

  it('WorkerLoadError names the module', () => {
    const err = new WorkerLoadError('./agent.js', 'no main export');
    expect(err.message).toBe('Failed to load agent module "./agent.js": no main export');
  });

  it('WorkerCancelledError has a default message', () => {
    expect(new WorkerCancelledError().message).toBe('Agent worker was cancelled');
    expect(new WorkerCancelledError('stopped').message).toBe('stopped');
  });

  describe('errorMessage', () => {
    it('uses Error messages', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('stringifies other values', () => {
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
