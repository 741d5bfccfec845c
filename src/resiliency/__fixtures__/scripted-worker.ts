/**
 * Test doubles for the supervisor: a worker that follows a script of
 * behaviours, and a clock whose time and sleeps the test controls.
 */

import type { AgentWorker, SupervisorClock } from '../supervisor.js';

/**
 * - fail: rejects immediately
 * - complete: resolves immediately
 * - hang: runs until its signal aborts, then resolves
 * - manual: ignores its signal; the test settles it through `calls`
 */
export type WorkerBehaviour = 'fail' | 'complete' | 'hang' | 'manual';

export interface WorkerCall {
  signal: AbortSignal;
  resolve: () => void;
  reject: (err: Error) => void;
}

export class ScriptedWorker implements AgentWorker {
  readonly name = 'test-agent';
  readonly calls: WorkerCall[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly script: WorkerBehaviour[]) {}

  get runs(): number {
    return this.calls.length;
  }

  run(signal: AbortSignal): Promise<void> {
    const behaviour = this.script[this.calls.length] ?? this.script[this.script.length - 1] ?? 'hang';

    const settled = new Promise<void>((resolve, reject) => {
      this.calls.push({ signal, resolve, reject });

      if (behaviour === 'fail') {
        reject(new Error(`agent crashed on run ${this.calls.length}`));
      } else if (behaviour === 'complete') {
        resolve();
      } else if (behaviour === 'hang') {
        if (signal.aborted) {
          resolve();
        } else {
          signal.addEventListener('abort', () => resolve(), { once: true });
        }
      }
    });

    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    const release = (): void => {
      this.active--;
    };
    return settled.then(release, (err: unknown) => {
      release();
      throw err;
    });
  }
}

export interface ManualClock extends SupervisorClock {
  /** Delays requested from `sleep`, in order */
  sleeps: number[];
  advance(ms: number): void;
}

/**
 * Clock whose sleeps return immediately. Pass `holdSleeps` to make every
 * sleep wait for its abort signal instead.
 */
export function createManualClock(start = 1_000_000, holdSleeps = false): ManualClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    sleep(ms: number, signal: AbortSignal): Promise<void> {
      sleeps.push(ms);
      if (!holdSleeps || signal.aborted) {
        return Promise.resolve();
      }
      return new Promise((resolve) => {
        signal.addEventListener('abort', () => resolve(), { once: true });
      });
    },
  };
}
