/**
 * Agent worker backed by a module's entry point.
 *
 * The module must export `main(signal)` (or a default function). Its promise
 * settling ends the run: resolve for a clean stop, reject for a failure.
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { AgentWorker } from '../resiliency/supervisor.js';
import { WorkerLoadError, errorMessage } from '../utils/errors.js';

export type ModuleLoader = (specifier: string) => Promise<unknown>;

export interface ModuleWorkerOptions {
  /** Relative or absolute file path, or a package name */
  modulePath: string;
  cwd?: string;
  load?: ModuleLoader;
}

function isPathLike(modulePath: string): boolean {
  return modulePath.startsWith('.') || path.isAbsolute(modulePath);
}

function findEntry(mod: unknown): Function | undefined {
  if (typeof mod !== 'object' || mod === null) {
    return undefined;
  }
  if ('main' in mod && typeof mod.main === 'function') {
    return mod.main;
  }
  if ('default' in mod && typeof mod.default === 'function') {
    return mod.default;
  }
  return undefined;
}

export class ModuleWorker implements AgentWorker {
  readonly name: string;
  private readonly specifier: string;
  private readonly load: ModuleLoader;

  constructor(options: ModuleWorkerOptions) {
    const cwd = options.cwd ?? process.cwd();
    this.specifier = isPathLike(options.modulePath)
      ? pathToFileURL(path.resolve(cwd, options.modulePath)).href
      : options.modulePath;
    this.name = path.basename(options.modulePath).replace(/\.[cm]?[jt]s$/, '') || 'agent';
    this.load = options.load ?? ((specifier) => import(specifier));
  }

  async run(signal: AbortSignal): Promise<void> {
    let mod: unknown;
    try {
      mod = await this.load(this.specifier);
    } catch (err) {
      throw new WorkerLoadError(this.specifier, errorMessage(err));
    }

    const entry = findEntry(mod);
    if (!entry) {
      throw new WorkerLoadError(this.specifier, 'module exports no main() or default function');
    }

    const result: unknown = entry.call(undefined, signal);
    await result;
  }
}
