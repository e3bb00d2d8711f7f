/**
 * Monitor — Unit Tests
 *
 * One tick end to end against in-process stand-ins, failure containment per
 * stage, retention cadence and the run/stop lifecycle.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Monitor, type MonitorOptions } from '../../../src/monitor/monitor.js';
import { IdleDetector } from '../../../src/idle/idle-detector.js';
import { DashboardReconciler } from '../../../src/dashboard/reconciler.js';
import { SnapshotStore } from '../../../src/store/snapshot-store.js';
import type { TickReport } from '../../../src/core/types.js';
import {
  FakeDocumentStore,
  FakeTelemetrySource,
  RecordingNotifier,
  device,
  proc,
  silentLogger,
} from '../../helpers/fakes.js';

describe('Monitor', () => {
  let source: FakeTelemetrySource;
  let store: SnapshotStore;
  let documents: FakeDocumentStore;
  let notifier: RecordingNotifier;
  let clock: number;

  function createMonitor(overrides: Partial<MonitorOptions> = {}): Monitor {
    return new Monitor({
      source,
      store,
      detector: new IdleDetector({ store, notifier, logger: silentLogger }),
      reconciler: new DashboardReconciler({ documentId: 'doc-1', store: documents, logger: silentLogger }),
      pollIntervalSeconds: 60,
      retentionMs: 7 * 24 * 60 * 60 * 1000,
      now: () => clock,
      sleep: async () => true,
      logger: silentLogger,
      ...overrides,
    });
  }

  beforeEach(() => {
    source = new FakeTelemetrySource();
    source.devices = [device(0, { utilizationPct: 80 }), device(1)];
    source.processes = [proc(0, 111, 'alice')];
    store = SnapshotStore.open(':memory:');
    documents = new FakeDocumentStore();
    notifier = new RecordingNotifier();
    clock = 1_700_000_000_000;
  });

  afterEach(() => {
    store.close();
  });

  // ── Tick ───────────────────────────────────────────────────

  describe('tick', () => {
    it('stores snapshots and reconciles the dashboard', async () => {
      const monitor = createMonitor();
      const completed = vi.fn();
      monitor.events.on('tick:completed', completed);

      const report = await monitor.tick();

      expect(report).toMatchObject({
        tick: 1,
        timestamp: clock,
        devices: 2,
        processes: 1,
        snapshotsWritten: 3,
        alerts: [],
      });
      expect(report.skipped).toBeUndefined();
      expect(report.reconcile?.status).toBe('rebuilt');
      expect(store.countRows()).toEqual({ devices: 2, processes: 1, alerts: 0 });
      expect(completed).toHaveBeenCalledWith(report);
    });

    it('runs without a dashboard', async () => {
      const report = await createMonitor({ reconciler: undefined }).tick();

      expect(report.reconcile).toBeUndefined();
      expect(documents.calls).toHaveLength(0);
    });

    it('skips a tick with no devices', async () => {
      source.devices = [];
      const report = await createMonitor().tick();

      expect(report.skipped).toBe('no-telemetry');
      expect(store.countRows().devices).toBe(0);
      expect(documents.calls).toHaveLength(0);
    });

    it('skips a tick when telemetry is unavailable and recovers on the next', async () => {
      const monitor = createMonitor();
      const skipped = vi.fn();
      monitor.events.on('tick:skipped', skipped);
      source.failNextWith();

      const first = await monitor.tick();
      const second = await monitor.tick();

      expect(first.skipped).toBe('collection-error');
      expect(skipped).toHaveBeenCalledTimes(1);
      expect(second.skipped).toBeUndefined();
      expect(second.tick).toBe(2);
    });

    it('propagates unexpected telemetry failures', async () => {
      source.nextError = new Error('driver crashed');
      await expect(createMonitor().tick()).rejects.toThrow('driver crashed');
    });

    it('still reconciles when snapshots cannot be written', async () => {
      store.close();

      const report = await createMonitor().tick();

      expect(report.snapshotsWritten).toBe(0);
      expect(report.alerts).toEqual([]);
      expect(report.reconcile?.status).toBe('rebuilt');
    });

    it('fires idle alerts once the window has enough samples', async () => {
      source.processes = [proc(0, 111, 'alice'), proc(1, 222, 'bob')];
      const monitor = createMonitor();
      const fired = vi.fn();
      monitor.events.on('alert:fired', fired);

      const reports: TickReport[] = [];
      for (let i = 0; i < 4; i++) {
        reports.push(await monitor.tick());
        clock += 60_000;
      }

      expect(reports.map((r) => r.alerts.map((a) => a.pid))).toEqual([[], [], [222], []]);
      expect(fired).toHaveBeenCalledTimes(1);
      expect(notifier.sent.map((m) => m.recipient)).toEqual(['bob']);
    });
  });

  // ── Retention ──────────────────────────────────────────────

  describe('retention sweep', () => {
    it('runs every ceil(3600 / interval) ticks, skipped ticks included', async () => {
      const monitor = createMonitor({ pollIntervalSeconds: 1800, retentionMs: 1000 });
      source.devices = [device(0)];
      source.processes = [];

      const first = await monitor.tick();
      clock += 5000;
      source.devices = [];
      const second = await monitor.tick();

      expect(first.eviction).toBeUndefined();
      expect(second.skipped).toBe('no-telemetry');
      expect(second.eviction).toEqual({ cutoff: clock - 1000, deviceRows: 1, processRows: 0 });
    });

    it('keeps snapshots inside the retention window', async () => {
      const monitor = createMonitor({ pollIntervalSeconds: 3600, retentionMs: 60_000 });
      const swept = vi.fn();
      monitor.events.on('retention:swept', swept);

      const report = await monitor.tick();

      expect(report.eviction).toEqual({ cutoff: clock - 60_000, deviceRows: 0, processRows: 0 });
      expect(swept).toHaveBeenCalledTimes(1);
      expect(store.countRows().devices).toBe(2);
    });
  });

  // ── Lifecycle ──────────────────────────────────────────────

  describe('run / stop', () => {
    it('waits out the rest of the interval between ticks until stopped', async () => {
      let monitor: Monitor | undefined;
      const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => {
        if (monitor && monitor.ticks >= 3) monitor.stop();
        return true;
      });
      monitor = createMonitor({ sleep });

      await monitor.run();

      expect(monitor.ticks).toBe(3);
      expect(monitor.isRunning()).toBe(false);
      expect(sleep).toHaveBeenCalledTimes(3);
      for (const [ms] of sleep.mock.calls) {
        expect(ms).toBeGreaterThanOrEqual(0);
        expect(ms).toBeLessThanOrEqual(60_000);
      }
    });

    it('stop() interrupts the sleep between ticks', async () => {
      const monitor = createMonitor({ pollIntervalSeconds: 3600, sleep: undefined });
      monitor.events.once('tick:completed', () => {
        setTimeout(() => monitor.stop(), 5);
      });

      await monitor.run();

      expect(monitor.ticks).toBe(1);
    });

    it('returns without ticking when stopped before it starts', async () => {
      let monitor: Monitor | undefined;
      const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => {
        monitor?.stop();
        return true;
      });
      monitor = createMonitor({ sleep });

      monitor.stop();
      await monitor.run();

      expect(monitor.ticks).toBe(0);
      expect(sleep).not.toHaveBeenCalled();
      expect(monitor.isRunning()).toBe(false);

      await monitor.run();

      expect(monitor.ticks).toBe(1);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('rejects on a fatal telemetry failure', async () => {
      source.nextError = new Error('driver crashed');
      const monitor = createMonitor();

      await expect(monitor.run()).rejects.toThrow('driver crashed');
      expect(monitor.isRunning()).toBe(false);
    });
  });
});
