/**
 * SnapshotStore — append-only GPU telemetry time series on SQLite
 *
 * Device and process rows are written once per poll and removed only by the
 * retention sweep. Idle alerts are kept as an audit trail and are not swept.
 * Published process sessions are remembered per (device, pid) until they age
 * past retention.
 * better-sqlite3 is synchronous; every call blocks the poll loop.
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { nanoid } from 'nanoid';
import { StorageError, toError } from '../core/errors.js';
import { ensureDirSync } from '../utils/fs.js';
import type {
  AlertLog,
  AlertRecord,
  DeviceMetric,
  DeviceSnapshot,
  EvictionResult,
  ProcessSession,
  ProcessSnapshot,
  SessionLedger,
  SessionQuery,
  SessionStatus,
  WindowReader,
} from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS device_snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    device_id INTEGER NOT NULL,
    name TEXT NOT NULL DEFAULT '',
    utilization REAL NOT NULL,
    memory_used REAL NOT NULL,
    memory_total REAL NOT NULL,
    temperature REAL NOT NULL
  );

  CREATE TABLE IF NOT EXISTS process_snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    device_id INTEGER NOT NULL,
    pid INTEGER NOT NULL,
    owner TEXT NOT NULL,
    memory_used REAL NOT NULL
  );

  CREATE TABLE IF NOT EXISTS idle_alerts (
    id TEXT PRIMARY KEY,
    timestamp INTEGER NOT NULL,
    device_id INTEGER NOT NULL,
    pid INTEGER NOT NULL,
    owner TEXT NOT NULL,
    avg_utilization REAL NOT NULL,
    sample_count INTEGER NOT NULL,
    reason TEXT NOT NULL,
    delivered INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS published_sessions (
    device_id INTEGER NOT NULL,
    pid INTEGER NOT NULL,
    page_id TEXT NOT NULL,
    published_at INTEGER NOT NULL,
    PRIMARY KEY (device_id, pid)
  );

  CREATE INDEX IF NOT EXISTS idx_device_snapshots_device_ts ON device_snapshots(device_id, timestamp);
  CREATE INDEX IF NOT EXISTS idx_device_snapshots_ts ON device_snapshots(timestamp);
  CREATE INDEX IF NOT EXISTS idx_process_snapshots_key_ts ON process_snapshots(device_id, pid, timestamp);
  CREATE INDEX IF NOT EXISTS idx_process_snapshots_ts ON process_snapshots(timestamp);
  CREATE INDEX IF NOT EXISTS idx_idle_alerts_ts ON idle_alerts(timestamp);
`;

const METRIC_COLUMNS: Record<DeviceMetric, string> = {
  utilization: 'utilization',
  memoryUsed: 'memory_used',
  temperature: 'temperature',
};

/** Default lookback after which a process with no new rows counts as ended */
const DEFAULT_LIVE_WINDOW_MS = 2 * 60 * 1000;

interface DeviceRow {
  timestamp: number;
  device_id: number;
  name: string;
  utilization: number;
  memory_used: number;
  memory_total: number;
  temperature: number;
}

interface AlertRow {
  id: string;
  timestamp: number;
  device_id: number;
  pid: number;
  owner: string;
  avg_utilization: number;
  sample_count: number;
  reason: string;
  delivered: number;
}

interface SessionRow {
  device_id: number;
  pid: number;
  owner: string;
  first_seen: number;
  last_seen: number;
  samples: number;
  avg_memory: number;
  peak_memory: number;
}

export interface SnapshotStoreOptions {
  /** Clock used when no explicit `now` is passed */
  now?: () => number;
}

export class SnapshotStore implements WindowReader, AlertLog, SessionLedger {
  private readonly db: Database.Database;
  private readonly now: () => number;

  private constructor(db: Database.Database, options: SnapshotStoreOptions) {
    this.db = db;
    this.now = options.now ?? Date.now;
  }

  /**
   * Open (or create) the store. Pass ':memory:' for a throwaway database.
   */
  static open(path: string, options: SnapshotStoreOptions = {}): SnapshotStore {
    try {
      if (path !== ':memory:') {
        ensureDirSync(dirname(path));
      }
      const db = new Database(path);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.exec(SCHEMA);
      return new SnapshotStore(db, options);
    } catch (err) {
      throw new StorageError(`Cannot open snapshot store at ${path}: ${toError(err).message}`, 'open', toError(err));
    }
  }

  // ─────────────────────────────────────────────────────────
  // WRITES
  // ─────────────────────────────────────────────────────────

  /**
   * Insert one poll's rows in a single transaction. Empty lists are a no-op.
   */
  append(devices: DeviceSnapshot[], processes: ProcessSnapshot[]): { devices: number; processes: number } {
    if (devices.length === 0 && processes.length === 0) {
      return { devices: 0, processes: 0 };
    }

    return this.guard('append', () => {
      const insertDevice = this.db.prepare<[number, number, string, number, number, number, number]>(`
        INSERT INTO device_snapshots
          (timestamp, device_id, name, utilization, memory_used, memory_total, temperature)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      const insertProcess = this.db.prepare<[number, number, number, string, number]>(`
        INSERT INTO process_snapshots (timestamp, device_id, pid, owner, memory_used)
        VALUES (?, ?, ?, ?, ?)
      `);

      const write = this.db.transaction(() => {
        for (const d of devices) {
          insertDevice.run(
            d.timestamp,
            d.deviceId,
            d.name,
            d.utilizationPct,
            d.memoryUsedMb,
            d.memoryTotalMb,
            d.temperatureC,
          );
        }
        for (const p of processes) {
          insertProcess.run(p.timestamp, p.deviceId, p.pid, p.owner, p.memoryUsedMb);
        }
      });
      write();

      return { devices: devices.length, processes: processes.length };
    });
  }

  /**
   * Delete snapshot rows strictly older than `now - retentionMs`.
   */
  evictOlderThan(retentionMs: number, now: number = this.now()): EvictionResult {
    const cutoff = now - retentionMs;

    return this.guard('evict', () => {
      const sweep = this.db.transaction(() => {
        const deviceRows = this.db
          .prepare<[number]>('DELETE FROM device_snapshots WHERE timestamp < ?')
          .run(cutoff).changes;
        const processRows = this.db
          .prepare<[number]>('DELETE FROM process_snapshots WHERE timestamp < ?')
          .run(cutoff).changes;
        this.db.prepare<[number]>('DELETE FROM published_sessions WHERE published_at < ?').run(cutoff);
        return { cutoff, deviceRows, processRows };
      });
      return sweep();
    });
  }

  recordAlert(record: Omit<AlertRecord, 'id'>): AlertRecord {
    const full: AlertRecord = { id: `alert_${nanoid(12)}`, ...record };

    return this.guard('recordAlert', () => {
      this.db.prepare<[string, number, number, number, string, number, number, string, number]>(`
        INSERT INTO idle_alerts
          (id, timestamp, device_id, pid, owner, avg_utilization, sample_count, reason, delivered)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        full.id,
        full.timestamp,
        full.deviceId,
        full.pid,
        full.owner,
        full.avgUtilizationPct,
        full.sampleCount,
        full.reason,
        full.delivered ? 1 : 0,
      );
      return full;
    });
  }

  markSessionPublished(deviceId: number, pid: number, pageId: string, publishedAt: number): void {
    this.guard('markSessionPublished', () => {
      this.db
        .prepare<[number, number, string, number]>(
          'INSERT OR REPLACE INTO published_sessions (device_id, pid, page_id, published_at) VALUES (?, ?, ?, ?)',
        )
        .run(deviceId, pid, pageId, publishedAt);
    });
  }

  isSessionPublished(deviceId: number, pid: number): boolean {
    return this.guard('isSessionPublished', () => {
      const row = this.db
        .prepare<[number, number], { found: number }>(
          'SELECT 1 AS found FROM published_sessions WHERE device_id = ? AND pid = ?',
        )
        .get(deviceId, pid);
      return row !== undefined;
    });
  }

  // ─────────────────────────────────────────────────────────
  // WINDOW QUERIES
  // ─────────────────────────────────────────────────────────

  /**
   * Mean of a device metric over rows with timestamp >= since.
   * Returns undefined (not 0) when the window holds no rows.
   */
  windowAverage(deviceId: number, metric: DeviceMetric, since: number): number | undefined {
    const column = METRIC_COLUMNS[metric];

    return this.guard('windowAverage', () => {
      const row = this.db
        .prepare<[number, number], { value: number | null }>(
          `SELECT AVG(${column}) AS value FROM device_snapshots WHERE device_id = ? AND timestamp >= ?`,
        )
        .get(deviceId, since);
      return row?.value ?? undefined;
    });
  }

  windowCount(deviceId: number, pid: number, since: number): number {
    return this.guard('windowCount', () => {
      const row = this.db
        .prepare<[number, number, number], { count: number }>(
          'SELECT COUNT(*) AS count FROM process_snapshots WHERE device_id = ? AND pid = ? AND timestamp >= ?',
        )
        .get(deviceId, pid, since);
      return row?.count ?? 0;
    });
  }

  // ─────────────────────────────────────────────────────────
  // REPORTING
  // ─────────────────────────────────────────────────────────

  /** Most recent snapshot per device, ordered by device id */
  latestDevices(): DeviceSnapshot[] {
    return this.guard('latestDevices', () => {
      // SQLite returns bare columns from the row holding MAX(timestamp)
      const rows = this.db
        .prepare<[], DeviceRow>(`
          SELECT timestamp, device_id, name, utilization, memory_used, memory_total, temperature,
                 MAX(timestamp) AS latest
          FROM device_snapshots
          GROUP BY device_id
          ORDER BY device_id
        `)
        .all();
      return rows.map(toDeviceSnapshot);
    });
  }

  listAlerts(since: number): AlertRecord[] {
    return this.guard('listAlerts', () => {
      const rows = this.db
        .prepare<[number], AlertRow>('SELECT * FROM idle_alerts WHERE timestamp >= ? ORDER BY timestamp DESC')
        .all(since);
      return rows.map((row) => ({
        id: row.id,
        timestamp: row.timestamp,
        deviceId: row.device_id,
        pid: row.pid,
        owner: row.owner,
        avgUtilizationPct: row.avg_utilization,
        sampleCount: row.sample_count,
        reason: row.reason,
        delivered: row.delivered === 1,
      }));
    });
  }

  /**
   * Reconstruct process sessions from consecutive snapshot presence.
   * A (device, pid) pair whose pid was reused inside the range shows up as one session.
   */
  listProcessSessions(query: SessionQuery): ProcessSession[] {
    const now = query.now ?? this.now();
    const liveWindowMs = query.liveWindowMs ?? DEFAULT_LIVE_WINDOW_MS;

    return this.guard('listProcessSessions', () => {
      const sessions = this.db
        .prepare<[number], SessionRow>(`
          SELECT device_id, pid, MAX(owner) AS owner,
                 MIN(timestamp) AS first_seen, MAX(timestamp) AS last_seen,
                 COUNT(*) AS samples, AVG(memory_used) AS avg_memory, MAX(memory_used) AS peak_memory
          FROM process_snapshots
          WHERE timestamp >= ?
          GROUP BY device_id, pid
          ORDER BY first_seen, device_id, pid
        `)
        .all(query.since);

      const utilization = this.db.prepare<[number, number, number], { avg: number | null; peak: number | null }>(`
        SELECT AVG(utilization) AS avg, MAX(utilization) AS peak
        FROM device_snapshots
        WHERE device_id = ? AND timestamp >= ? AND timestamp <= ?
      `);

      return sessions.map((row): ProcessSession => {
        const util = utilization.get(row.device_id, row.first_seen, row.last_seen);
        const durationMinutes = (row.last_seen - row.first_seen) / 60_000;
        const ended = row.last_seen < now - liveWindowMs;
        const avgUtilizationPct = util?.avg ?? undefined;

        return {
          deviceId: row.device_id,
          pid: row.pid,
          owner: row.owner,
          firstSeen: row.first_seen,
          lastSeen: row.last_seen,
          durationMinutes,
          sampleCount: row.samples,
          avgMemoryMb: Math.round(row.avg_memory),
          peakMemoryMb: row.peak_memory,
          avgUtilizationPct,
          peakUtilizationPct: util?.peak ?? undefined,
          ended,
          status: sessionStatus(ended, avgUtilizationPct, durationMinutes, query),
        };
      });
    });
  }

  countRows(): { devices: number; processes: number; alerts: number } {
    return this.guard('countRows', () => {
      const count = (table: string): number =>
        this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;
      return {
        devices: count('device_snapshots'),
        processes: count('process_snapshots'),
        alerts: count('idle_alerts'),
      };
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Snapshot store ${operation} failed: ${toError(err).message}`, operation, toError(err));
    }
  }
}

function toDeviceSnapshot(row: DeviceRow): DeviceSnapshot {
  return {
    timestamp: row.timestamp,
    deviceId: row.device_id,
    name: row.name,
    utilizationPct: row.utilization,
    memoryUsedMb: row.memory_used,
    memoryTotalMb: row.memory_total,
    temperatureC: row.temperature,
  };
}

function sessionStatus(
  ended: boolean,
  avgUtilizationPct: number | undefined,
  durationMinutes: number,
  query: SessionQuery,
): SessionStatus {
  if (ended) return 'completed';
  const idlePct = query.idleUtilizationPct ?? 5;
  const idleMinutes = query.idleMinutes ?? 10;
  if (avgUtilizationPct !== undefined && avgUtilizationPct < idlePct && durationMinutes > idleMinutes) {
    return 'idle';
  }
  return 'running';
}
