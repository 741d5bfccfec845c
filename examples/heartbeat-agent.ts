/**
 * Heartbeat agent
 *
 * Minimal agent module for trying the warden locally. Logs a heartbeat until
 * the supervisor aborts it; set HEARTBEAT_FAIL_AFTER to make it crash after
 * that many beats and watch the retry backoff.
 *
 * Run:
 *   npm run build
 *   AGENT_MODULE=./dist/examples/heartbeat-agent.js node dist/src/cli/index.js
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../src/resiliency/logger.js';

const logger = createLogger('heartbeat-agent');

export async function main(signal: AbortSignal): Promise<void> {
  const intervalMs = Number(process.env.HEARTBEAT_INTERVAL_MS ?? 5000);
  const failAfter = Number(process.env.HEARTBEAT_FAIL_AFTER ?? 0);
  let beats = 0;

  logger.info('Agent connected');
  while (!signal.aborted) {
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (err) {
      if (signal.aborted) break;
      throw err;
    }
    beats++;
    logger.info('Heartbeat', { beats });
    if (failAfter > 0 && beats >= failAfter) {
      throw new Error(`Simulated crash after ${beats} heartbeats`);
    }
  }
  logger.info('Agent disconnected');
}
