/**
 * `gpuwatch run` — poll until SIGINT/SIGTERM.
 */

import { Command } from 'commander';
import type { DeepPartial } from '../../core/config.js';
import type { MonitorConfig } from '../../core/types.js';
import { createMonitor } from '../../monitor/factory.js';
import { configureLogging, loadConfig, parseInteger, type GlobalOptions } from '../shared.js';

interface RunOptions {
  interval?: number;
  dashboard: boolean;
  once?: boolean;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Poll GPU telemetry, record snapshots, update the dashboard and raise idle alerts')
    .option('-i, --interval <seconds>', 'Poll interval in seconds', parseInteger)
    .option('--no-dashboard', 'Skip the remote dashboard even if configured')
    .option('--once', 'Run a single tick and exit')
    .action(async (_options: RunOptions, command: Command) => {
      await runMonitor(command.optsWithGlobals<RunOptions & GlobalOptions>());
    });

  return cmd;
}

async function runMonitor(options: RunOptions & GlobalOptions): Promise<void> {
  const overrides: DeepPartial<MonitorConfig> = {};
  if (options.interval !== undefined) overrides.pollIntervalSeconds = options.interval;
  if (!options.dashboard) overrides.dashboard = { enabled: false };

  const config = loadConfig(options, overrides);
  const logger = configureLogging(config);
  const runtime = createMonitor(config, { logger });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    runtime.monitor.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await runtime.source.probe();
    logger.info({ database: config.database.path, dashboard: config.dashboard.enabled, notifier: config.notifier.channel }, 'Telemetry available');

    if (options.once) {
      await runtime.monitor.tick();
    } else {
      await runtime.monitor.run();
    }
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    runtime.close();
  }
}
