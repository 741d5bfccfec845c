#!/usr/bin/env node
/**
 * Agent Warden CLI
 * Runs a voice agent under supervision behind an HTTP health surface.
 */

import { Command } from 'commander';
import { loadWardenConfig, type WardenConfig } from '../config/env-config.js';
import { errorMessage } from '../utils/errors.js';
import { createWarden, runChecks } from '../warden.js';

const program = new Command();

function loadConfigOrExit(overrides: { port?: string; agent?: string }): WardenConfig {
  try {
    return loadWardenConfig({
      ...process.env,
      ...(overrides.port ? { PORT: overrides.port } : {}),
      ...(overrides.agent ? { AGENT_MODULE: overrides.agent } : {}),
    });
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
}

program
  .name('agent-warden')
  .description('Supervise an agent process and expose health endpoints')
  .version('0.1.0');

// Run the supervisor and health server
program
  .command('serve', { isDefault: true })
  .description('Start the agent under supervision and serve health endpoints')
  .option('-p, --port <port>', 'HTTP port (overrides PORT)')
  .option('-a, --agent <module>', 'Agent module to run (overrides AGENT_MODULE)')
  .action(async (options: { port?: string; agent?: string }) => {
    const config = loadConfigOrExit(options);
    const warden = createWarden({ config });

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`\nReceived ${signal}, shutting down...`);
      try {
        await warden.stop();
        process.exit(0);
      } catch (err) {
        console.error('Shutdown failed:', errorMessage(err));
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    try {
      await warden.start();
    } catch (err) {
      console.error('Failed to start warden:', errorMessage(err));
      await warden.supervisor.stop();
      process.exit(1);
    }
  });

// One-shot readiness probe
program
  .command('check')
  .description('Probe the database and environment once and print the result')
  .action(async () => {
    const config = loadConfigOrExit({});
    const report = await runChecks({ config });
    console.log(JSON.stringify(report, null, 2));
    process.exit(report.healthy ? 0 : 1);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
