/**
 * `gpuwatch sessions` — per-process history rebuilt from snapshots.
 */

import { Command } from 'commander';
import { createNotionStore, createSessionPublisher, sessionQueryDefaults } from '../../monitor/factory.js';
import { SnapshotStore } from '../../store/snapshot-store.js';
import type { ProcessSession } from '../../store/types.js';
import { configureLogging, formatTime, loadConfig, parseNumber, type GlobalOptions } from '../shared.js';

interface SessionsOptions {
  since: number;
  json?: boolean;
  publish?: boolean;
}

export function createSessionsCommand(): Command {
  const cmd = new Command('sessions');

  cmd
    .description('List process sessions seen in the recent past')
    .option('-s, --since <minutes>', 'Look back this many minutes', parseNumber, 60)
    .option('--json', 'Output as JSON')
    .option('--publish', 'Also write unpublished sessions to the process history database')
    .action(async (_options: SessionsOptions, command: Command) => {
      await showSessions(command.optsWithGlobals<SessionsOptions & GlobalOptions>());
    });

  return cmd;
}

async function showSessions(options: SessionsOptions & GlobalOptions): Promise<void> {
  const config = loadConfig(options);
  const store = SnapshotStore.open(config.database.path ?? ':memory:');

  const now = Date.now();
  let sessions: ProcessSession[];
  try {
    sessions = store.listProcessSessions({ ...sessionQueryDefaults(config), since: now - options.since * 60_000, now });

    if (options.publish) {
      const logger = configureLogging(config);
      const publisher = createSessionPublisher(config, store, createNotionStore(config), {
        logger: logger.child({ component: 'session-publisher' }),
      });
      const result = await publisher.publish(sessions, now);
      console.error(`Published ${result.published} sessions (${result.skipped} already published, ${result.failed} failed)`);
      if (result.failed > 0) process.exitCode = 1;
    }
  } finally {
    store.close();
  }

  if (options.json) {
    console.log(JSON.stringify(sessions, null, 2));
    return;
  }

  if (sessions.length === 0) {
    console.log(`No process sessions in the last ${options.since} minutes`);
    return;
  }

  console.log(
    ['GPU', 'PID', 'OWNER', 'STATUS', 'FIRST SEEN', 'MINUTES', 'AVG MB', 'PEAK MB', 'AVG UTIL'].join('\t'),
  );
  for (const s of sessions) {
    console.log(
      [
        s.deviceId,
        s.pid,
        s.owner,
        s.status,
        formatTime(s.firstSeen),
        s.durationMinutes.toFixed(1),
        s.avgMemoryMb,
        s.peakMemoryMb,
        s.avgUtilizationPct === undefined ? '-' : `${s.avgUtilizationPct.toFixed(1)}%`,
      ].join('\t'),
    );
  }
}
