/**
 * `gpuwatch prune` — one-off retention sweep.
 */

import { Command } from 'commander';
import { SnapshotStore } from '../../store/snapshot-store.js';
import { formatTime, loadConfig, parseNumber, type GlobalOptions } from '../shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface PruneOptions {
  days?: number;
}

export function createPruneCommand(): Command {
  const cmd = new Command('prune');

  cmd
    .description('Delete snapshots older than the retention window')
    .option('-d, --days <days>', 'Retention in days (defaults to retention.days)', parseNumber)
    .action((_options: PruneOptions, command: Command) => {
      prune(command.optsWithGlobals<PruneOptions & GlobalOptions>());
    });

  return cmd;
}

function prune(options: PruneOptions & GlobalOptions): void {
  const config = loadConfig(options);
  const days = options.days ?? config.retention.days;
  const store = SnapshotStore.open(config.database.path ?? ':memory:');

  try {
    const result = store.evictOlderThan(days * DAY_MS);
    console.log(
      `Removed ${result.deviceRows} device rows and ${result.processRows} process rows older than ${formatTime(result.cutoff)}`,
    );
  } finally {
    store.close();
  }
}
