import { describe, it, expect, vi } from 'vitest';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ModuleWorker } from './module-worker.js';
import { WorkerLoadError } from '../utils/errors.js';

describe('ModuleWorker', () => {
  it('resolves relative paths against the working directory', async () => {
    const load = vi.fn(async () => ({ main: async () => undefined }));
    const worker = new ModuleWorker({ modulePath: './dist/agent.js', cwd: '/srv/app', load });

    await worker.run(new AbortController().signal);

    expect(worker.name).toBe('agent');
    expect(load).toHaveBeenCalledWith(pathToFileURL(path.resolve('/srv/app', './dist/agent.js')).href);
  });

  it('imports package names as they are', async () => {
    const load = vi.fn(async () => ({ default: async () => undefined }));
    const worker = new ModuleWorker({ modulePath: 'voice-agent', load });

    await worker.run(new AbortController().signal);

    expect(worker.name).toBe('voice-agent');
    expect(load).toHaveBeenCalledWith('voice-agent');
  });

  it('passes the stop signal to main', async () => {
    const main = vi.fn(async (_signal: AbortSignal) => undefined);
    const worker = new ModuleWorker({ modulePath: './agent.ts', load: async () => ({ main }) });
    const controller = new AbortController();

    await worker.run(controller.signal);

    expect(main).toHaveBeenCalledWith(controller.signal);
  });

  it('propagates failures from the agent', async () => {
    const worker = new ModuleWorker({
      modulePath: './agent.js',
      load: async () => ({
        main: async () => {
          throw new Error('room connection lost');
        },
      }),
    });

    await expect(worker.run(new AbortController().signal)).rejects.toThrow('room connection lost');
  });

  it('rejects modules without an entry point', async () => {
    const worker = new ModuleWorker({ modulePath: './agent.js', load: async () => ({ start: 1 }) });

    await expect(worker.run(new AbortController().signal)).rejects.toBeInstanceOf(WorkerLoadError);
  });

  it('wraps import failures', async () => {
    const worker = new ModuleWorker({
      modulePath: './missing.js',
      load: async () => {
        throw new Error('Cannot find module');
      },
    });

    await expect(worker.run(new AbortController().signal)).rejects.toThrow(/Cannot find module/);
  });
});
