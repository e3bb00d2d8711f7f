/**
 * Monitor — the poll loop
 *
 * One tick: collect telemetry -> append snapshots -> reconcile dashboard ->
 * idle detection -> publish ended sessions, plus a retention sweep every ~hour
 * of ticks. Ticks never
 * overlap; the next one starts one interval after the previous one started,
 * or immediately when a tick ran longer than the interval.
 *
 * Per-tick failures are contained to the tick. The only error that escapes
 * run() is an unexpected (non-CollectionError) failure of the telemetry
 * source, which the CLI treats as fatal.
 */

import { CollectionError, StorageError, toError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger, type Logger } from '../core/logger.js';
import type { TickReport } from '../core/types.js';
import { buildDashboard, DEFAULT_TITLE } from '../dashboard/model.js';
import type { DashboardReconciler } from '../dashboard/reconciler.js';
import type { SessionPublisher } from '../dashboard/session-publisher.js';
import type { IdleDetector } from '../idle/idle-detector.js';
import type { SnapshotStore } from '../store/snapshot-store.js';
import type { DeviceSnapshot, ProcessSnapshot } from '../store/types.js';
import type { DeviceFact, ProcessFact, TelemetrySource } from '../telemetry/types.js';
import { interruptibleSleep, stopwatch } from '../utils/timer.js';

const SECONDS_PER_HOUR = 3600;

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<boolean>;

export interface MonitorOptions {
  source: TelemetrySource;
  store: Pick<SnapshotStore, 'append' | 'evictOlderThan'>;
  detector: IdleDetector;
  /** Omit to run without a remote dashboard */
  reconciler?: DashboardReconciler;
  /** Omit to keep process history local */
  publisher?: SessionPublisher;
  pollIntervalSeconds: number;
  retentionMs: number;
  dashboardTitle?: string;
  now?: () => number;
  sleep?: SleepFn;
  logger?: Logger;
}

interface Telemetry {
  devices: DeviceFact[];
  processes: ProcessFact[];
}

export class Monitor {
  readonly events = new EventBus();

  private readonly source: TelemetrySource;
  private readonly store: Pick<SnapshotStore, 'append' | 'evictOlderThan'>;
  private readonly detector: IdleDetector;
  private readonly reconciler?: DashboardReconciler;
  private readonly publisher?: SessionPublisher;
  private readonly pollIntervalMs: number;
  private readonly retentionMs: number;
  private readonly sweepEvery: number;
  private readonly dashboardTitle: string;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  private tickCount = 0;
  private running = false;
  private stopRequested = false;
  private abort: AbortController | null = null;

  constructor(options: MonitorOptions) {
    this.source = options.source;
    this.store = options.store;
    this.detector = options.detector;
    this.reconciler = options.reconciler;
    this.publisher = options.publisher;
    this.pollIntervalMs = options.pollIntervalSeconds * 1000;
    this.retentionMs = options.retentionMs;
    this.sweepEvery = Math.ceil(SECONDS_PER_HOUR / options.pollIntervalSeconds);
    this.dashboardTitle = options.dashboardTitle ?? DEFAULT_TITLE;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? interruptibleSleep;
    this.logger = options.logger ?? getLogger().child({ component: 'monitor' });
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  /**
   * Poll until stop() is called. Rejects only on a fatal telemetry failure.
   * A stop() issued before run() makes run() return without ticking.
   */
  async run(): Promise<void> {
    if (this.running) return;
    if (this.stopRequested) {
      this.stopRequested = false;
      this.logger.info('Stop requested before start, not polling');
      return;
    }
    this.running = true;
    const abort = new AbortController();
    this.abort = abort;

    this.logger.info(
      { intervalSeconds: this.pollIntervalMs / 1000, sweepEveryTicks: this.sweepEvery, dashboard: !!this.reconciler, processHistory: !!this.publisher },
      'Monitor started',
    );

    try {
      while (!this.stopRequested) {
        const report = await this.tick();
        if (this.stopRequested) break;
        await this.sleep(Math.max(0, this.pollIntervalMs - report.durationMs), abort.signal);
      }
    } finally {
      this.running = false;
      this.stopRequested = false;
      this.abort = null;
      this.logger.info({ ticks: this.tickCount }, 'Monitor stopped');
    }
  }

  /** Stop after the current tick; interrupts the inter-tick sleep immediately */
  stop(): void {
    this.stopRequested = true;
    this.abort?.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  get ticks(): number {
    return this.tickCount;
  }

  // ─────────────────────────────────────────────────────────
  // TICK
  // ─────────────────────────────────────────────────────────

  async tick(): Promise<TickReport> {
    this.tickCount++;
    const timer = stopwatch();
    const timestamp = this.now();
    const report: TickReport = {
      tick: this.tickCount,
      timestamp,
      devices: 0,
      processes: 0,
      snapshotsWritten: 0,
      alerts: [],
      durationMs: 0,
    };

    const telemetry = await this.collect(report);
    if (telemetry) {
      await this.process(telemetry, report);
    }

    if (this.tickCount % this.sweepEvery === 0) {
      this.sweep(report);
    }

    report.durationMs = Math.round(timer.elapsed());

    if (report.skipped) {
      this.logger.info({ tick: report.tick, reason: report.skipped, durationMs: report.durationMs }, 'Tick skipped');
      this.events.emit('tick:skipped', report);
    } else {
      this.logger.info(
        {
          tick: report.tick,
          devices: report.devices,
          processes: report.processes,
          snapshotsWritten: report.snapshotsWritten,
          alerts: report.alerts.length,
          reconcile: report.reconcile?.status ?? 'disabled',
          published: report.published?.published,
          durationMs: report.durationMs,
        },
        'Tick complete',
      );
      this.events.emit('tick:completed', report);
    }

    return report;
  }

  private async collect(report: TickReport): Promise<Telemetry | undefined> {
    try {
      const devices = await this.source.listDevices();
      if (devices.length === 0) {
        report.skipped = 'no-telemetry';
        return undefined;
      }
      const processes = await this.source.listProcesses();
      return { devices, processes };
    } catch (err) {
      if (err instanceof CollectionError) {
        this.logger.warn({ tick: report.tick, error: err.message }, 'Telemetry unavailable');
        report.skipped = 'collection-error';
        return undefined;
      }
      throw err;
    }
  }

  private async process(telemetry: Telemetry, report: TickReport): Promise<void> {
    const { devices, processes } = telemetry;
    const timestamp = report.timestamp;
    report.devices = devices.length;
    report.processes = processes.length;
    this.events.emit('telemetry:collected', { devices, processes, timestamp });

    let stored = false;
    try {
      const written = this.store.append(toDeviceSnapshots(devices, timestamp), toProcessSnapshots(processes, timestamp));
      report.snapshotsWritten = written.devices + written.processes;
      stored = true;
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this.logger.warn({ tick: report.tick, error: err.message }, 'Snapshot write failed, skipping idle detection');
    }

    if (this.reconciler) {
      report.reconcile = await this.reconciler.reconcile(
        buildDashboard(devices, processes, new Date(timestamp), this.dashboardTitle),
      );
    }

    if (stored) {
      try {
        report.alerts = await this.detector.evaluate(processes, timestamp);
      } catch (err) {
        this.logger.error({ tick: report.tick, error: toError(err).message }, 'Idle detection failed');
      }
      for (const alert of report.alerts) {
        this.events.emit('alert:fired', alert);
      }

      if (this.publisher) {
        try {
          report.published = await this.publisher.publishRecent(timestamp);
        } catch (err) {
          this.logger.error({ tick: report.tick, error: toError(err).message }, 'Session publishing failed');
        }
      }
    }
  }

  private sweep(report: TickReport): void {
    try {
      const eviction = this.store.evictOlderThan(this.retentionMs, report.timestamp);
      report.eviction = eviction;
      this.logger.info(
        { deviceRows: eviction.deviceRows, processRows: eviction.processRows, cutoff: new Date(eviction.cutoff).toISOString() },
        'Retention sweep',
      );
      this.events.emit('retention:swept', eviction);
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this.logger.warn({ error: err.message }, 'Retention sweep failed');
    }
  }
}

function toDeviceSnapshots(devices: DeviceFact[], timestamp: number): DeviceSnapshot[] {
  return devices.map((d) => ({
    timestamp,
    deviceId: d.id,
    name: d.name,
    utilizationPct: d.utilizationPct,
    memoryUsedMb: d.memoryUsedMb,
    memoryTotalMb: d.memoryTotalMb,
    temperatureC: d.temperatureC,
  }));
}

function toProcessSnapshots(processes: ProcessFact[], timestamp: number): ProcessSnapshot[] {
  return processes.map((p) => ({
    timestamp,
    deviceId: p.deviceId,
    pid: p.pid,
    owner: p.owner,
    memoryUsedMb: p.memoryUsedMb,
  }));
}
