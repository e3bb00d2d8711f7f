/**
 * `gpuwatch status` — latest device readings and recent idle alerts.
 */

import { Command } from 'commander';
import { SnapshotStore } from '../../store/snapshot-store.js';
import type { AlertRecord, DeviceSnapshot } from '../../store/types.js';
import { VERSION } from '../../version.js';
import { fileSize } from '../../utils/fs.js';
import { formatTime, loadConfig, type GlobalOptions } from '../shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface StatusOptions {
  json?: boolean;
}

export function createStatusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Show the latest device readings and idle alerts from the last 24 hours')
    .option('--json', 'Output as JSON')
    .action((_options: StatusOptions, command: Command) => {
      showStatus(command.optsWithGlobals<StatusOptions & GlobalOptions>());
    });

  return cmd;
}

function showStatus(options: StatusOptions & GlobalOptions): void {
  const config = loadConfig(options);
  const dbPath = config.database.path ?? ':memory:';
  const store = SnapshotStore.open(dbPath);

  let devices: DeviceSnapshot[];
  let alerts: AlertRecord[];
  let rows: ReturnType<SnapshotStore['countRows']>;
  try {
    devices = store.latestDevices();
    alerts = store.listAlerts(Date.now() - DAY_MS);
    rows = store.countRows();
  } finally {
    store.close();
  }

  if (options.json) {
    console.log(JSON.stringify({ version: VERSION, database: dbPath, rows, devices, alerts }, null, 2));
    return;
  }

  console.log();
  console.log(`  gpuwatch v${VERSION}`);
  console.log('  ' + '─'.repeat(40));
  console.log(`  Database: ${dbPath} (${Math.round(fileSize(dbPath) / 1024)} KB)`);
  console.log(`  Rows:     ${rows.devices} device, ${rows.processes} process, ${rows.alerts} alerts`);
  console.log();

  console.log('  Devices:');
  if (devices.length === 0) {
    console.log('    No snapshots recorded yet');
  }
  for (const d of devices) {
    console.log(
      `    GPU ${d.deviceId} ${d.name}: ${d.utilizationPct.toFixed(1)}% util, ` +
        `${Math.round(d.memoryUsedMb)}/${Math.round(d.memoryTotalMb)} MB, ` +
        `${Math.round(d.temperatureC)}°C (${formatTime(d.timestamp)})`,
    );
  }
  console.log();

  console.log(`  Idle alerts (24h): ${alerts.length}`);
  for (const a of alerts) {
    console.log(
      `    ${formatTime(a.timestamp)}  GPU ${a.deviceId}  PID ${a.pid}  ${a.owner}  ` +
        `${a.avgUtilizationPct.toFixed(1)}%${a.delivered ? '' : '  (not delivered)'}`,
    );
  }
  console.log();
}
