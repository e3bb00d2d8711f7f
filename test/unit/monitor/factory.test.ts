import { describe, it, expect, afterEach, vi } from 'vitest';
import { createMonitor, type MonitorRuntime } from '../../../src/monitor/factory.js';
import { MonitorConfigSchema } from '../../../src/core/types.js';
import { SnapshotStore } from '../../../src/store/snapshot-store.js';
import { FakeDocumentStore, FakeTelemetrySource, device, silentLogger } from '../../helpers/fakes.js';

describe('createMonitor', () => {
  let runtime: MonitorRuntime | undefined;

  afterEach(() => {
    runtime?.close();
    runtime = undefined;
  });

  function build(raw: unknown, documents = new FakeDocumentStore()) {
    const source = new FakeTelemetrySource();
    source.devices = [device(0)];
    runtime = createMonitor(MonitorConfigSchema.parse(raw), {
      source,
      store: SnapshotStore.open(':memory:'),
      documentStore: documents,
      notifier: null,
      logger: silentLogger,
    });
    return runtime;
  }

  it('wires the dashboard when it is enabled', async () => {
    const documents = new FakeDocumentStore();
    const { monitor } = build(
      { dashboard: { enabled: true, token: 'test-secret', documentId: 'doc-1', title: 'Lab GPUs' } },
      documents,
    );

    const report = await monitor.tick();

    expect(report.reconcile?.status).toBe('rebuilt');
    expect(documents.blocks[0].text.startsWith('Lab GPUs - Updated: ')).toBe(true);
  });

  it('leaves the dashboard out when disabled', async () => {
    const documents = new FakeDocumentStore();
    const { monitor, store } = build({}, documents);

    const report = await monitor.tick();

    expect(report.reconcile).toBeUndefined();
    expect(documents.calls).toHaveLength(0);
    expect(store.countRows().devices).toBe(1);
  });

  it('publishes ended sessions to the process history database', async () => {
    const now = Date.now();
    const store = SnapshotStore.open(':memory:');
    store.append([], [{ timestamp: now - 30 * 60_000, deviceId: 0, pid: 999, owner: 'alice', memoryUsedMb: 512 }]);
    const createDatabasePage = vi.fn(async (_databaseId: string, _properties: Record<string, unknown>) => 'page-1');
    const source = new FakeTelemetrySource();
    source.devices = [device(0)];
    runtime = createMonitor(
      MonitorConfigSchema.parse({ dashboard: { enabled: true, token: 'test-secret', processHistoryDatabaseId: 'db-1' } }),
      { source, store, pageWriter: { createDatabasePage }, notifier: null, now: () => now, logger: silentLogger },
    );

    const report = await runtime.monitor.tick();

    expect(report.reconcile).toBeUndefined();
    expect(report.published).toEqual({ published: 1, skipped: 0, failed: 0, errors: [] });
    expect(createDatabasePage).toHaveBeenCalledWith(
      'db-1',
      expect.objectContaining({ 'Process': { title: [{ text: { content: 'GPU 0 - alice - PID 999' } }] } }),
    );

    const next = await runtime.monitor.tick();
    expect(next.published).toEqual({ published: 0, skipped: 1, failed: 0, errors: [] });
  });

  it('leaves process history local without a database id', async () => {
    const { monitor } = build({ dashboard: { enabled: true, token: 'test-secret', documentId: 'doc-1' } });

    const report = await monitor.tick();

    expect(report.published).toBeUndefined();
  });
});
