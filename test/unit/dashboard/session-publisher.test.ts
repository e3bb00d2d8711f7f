/**
 * SessionPublisher — Unit Tests
 *
 * Database rows built from stored sessions, posted through the Notion client
 * over a stubbed fetch, and published once per (device, pid).
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { SessionPublisher, sessionPageProperties } from '../../../src/dashboard/session-publisher.js';
import { NotionDocumentStore } from '../../../src/dashboard/notion-store.js';
import { SnapshotStore } from '../../../src/store/snapshot-store.js';
import type { ProcessSession } from '../../../src/store/types.js';
import { silentLogger } from '../../helpers/fakes.js';

const MIN = 60_000;
const T0 = Date.UTC(2024, 0, 15, 10, 0, 0);
const NOW = T0 + 10 * MIN;

function json(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function sentBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

describe('sessionPageProperties', () => {
  const running: ProcessSession = {
    deviceId: 1,
    pid: 4242,
    owner: 'bob',
    firstSeen: T0,
    lastSeen: T0 + 5 * MIN,
    durationMinutes: 5,
    sampleCount: 6,
    avgMemoryMb: 1234,
    peakMemoryMb: 2048.6,
    avgUtilizationPct: 12.345,
    peakUtilizationPct: undefined,
    ended: false,
    status: 'running',
  };

  it('maps a running session without an end time', () => {
    expect(sessionPageProperties(running)).toEqual({
      'Process': { title: [{ text: { content: 'GPU 1 - bob - PID 4242' } }] },
      'GPU ID': { select: { name: 'GPU 1' } },
      'Username': { select: { name: 'bob' } },
      'PID': { number: 4242 },
      'Start Time': { date: { start: '2024-01-15T10:00:00.000Z' } },
      'Avg Utilization': { number: 12.3 },
      'Peak Utilization': { number: 0 },
      'Avg Memory': { number: 1234 },
      'Peak Memory': { number: 2049 },
      'Status': { status: { name: 'Running' } },
    });
  });

  it('adds the end time once a session has ended and labels idle sessions', () => {
    expect(sessionPageProperties({ ...running, ended: true, status: 'completed' })).toMatchObject({
      'Status': { status: { name: 'Completed' } },
      'End Time': { date: { start: '2024-01-15T10:05:00.000Z' } },
    });
    expect(sessionPageProperties({ ...running, status: 'idle' })).toMatchObject({
      'Status': { status: { name: 'Idle Alert' } },
    });
  });
});

describe('SessionPublisher', () => {
  let store: SnapshotStore;
  let fetchMock: Mock<typeof fetch>;
  let pages: NotionDocumentStore;

  function publisher(endedOnly = false): SessionPublisher {
    return new SessionPublisher({
      databaseId: 'db-1',
      pages,
      store,
      lookbackMinutes: 60,
      endedOnly,
      sessionQuery: { liveWindowMs: 2 * MIN },
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    store = SnapshotStore.open(':memory:');
    fetchMock = vi.fn<typeof fetch>();
    pages = new NotionDocumentStore({ token: 'test-secret', apiBaseUrl: 'https://notion.test/v1', fetch: fetchMock });

    for (const [i, utilizationPct] of [10, 20, 30].entries()) {
      const timestamp = T0 + i * MIN;
      store.append(
        [
          { timestamp, deviceId: 0, name: 'NVIDIA A100', utilizationPct, memoryUsedMb: 0, memoryTotalMb: 40960, temperatureC: 40 },
          { timestamp, deviceId: 1, name: 'NVIDIA A100', utilizationPct: 0, memoryUsedMb: 0, memoryTotalMb: 40960, temperatureC: 40 },
        ],
        [{ timestamp, deviceId: 0, pid: 111, owner: 'alice', memoryUsedMb: 1000 + i * 500 }],
      );
    }
    store.append([], [{ timestamp: T0 + 2 * MIN, deviceId: 1, pid: 222, owner: 'bob', memoryUsedMb: 500 }]);
  });

  afterEach(() => {
    store.close();
  });

  it('posts one database page per session', async () => {
    fetchMock.mockResolvedValueOnce(json({ id: 'page-1' })).mockResolvedValueOnce(json({ id: 'page-2' }));

    const result = await publisher().publishRecent(NOW);

    expect(result).toEqual({ published: 2, skipped: 0, failed: 0, errors: [] });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://notion.test/v1/pages');
    expect(init?.method).toBe('POST');
    expect(sentBody(init)).toEqual({
      parent: { database_id: 'db-1' },
      properties: {
        'Process': { title: [{ text: { content: 'GPU 0 - alice - PID 111' } }] },
        'GPU ID': { select: { name: 'GPU 0' } },
        'Username': { select: { name: 'alice' } },
        'PID': { number: 111 },
        'Start Time': { date: { start: '2024-01-15T10:00:00.000Z' } },
        'Avg Utilization': { number: 20 },
        'Peak Utilization': { number: 30 },
        'Avg Memory': { number: 1500 },
        'Peak Memory': { number: 2000 },
        'Status': { status: { name: 'Completed' } },
        'End Time': { date: { start: '2024-01-15T10:02:00.000Z' } },
      },
    });
  });

  it('publishes each device and pid once, across publisher instances', async () => {
    fetchMock.mockResolvedValueOnce(json({ id: 'page-1' })).mockResolvedValueOnce(json({ id: 'page-2' }));
    await publisher().publishRecent(NOW);

    const again = await publisher().publishRecent(NOW + MIN);

    expect(again).toEqual({ published: 0, skipped: 2, failed: 0, errors: [] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(store.isSessionPublished(0, 111)).toBe(true);
    expect(store.isSessionPublished(1, 222)).toBe(true);
  });

  it('retries a session whose page could not be created', async () => {
    fetchMock
      .mockResolvedValueOnce(json({ message: 'Could not find database' }, 404, 'Not Found'))
      .mockResolvedValueOnce(json({ id: 'page-2' }))
      .mockResolvedValueOnce(json({ id: 'page-3' }));

    const first = await publisher().publishRecent(NOW);

    expect(first.published).toBe(1);
    expect(first.failed).toBe(1);
    expect(first.errors[0]).toMatchObject({ operation: 'create', status: 404 });
    expect(store.isSessionPublished(0, 111)).toBe(false);

    const second = await publisher().publishRecent(NOW);

    expect(second).toEqual({ published: 1, skipped: 1, failed: 0, errors: [] });
    expect(store.isSessionPublished(0, 111)).toBe(true);
  });

  it('holds back sessions that are still running when only ended ones are wanted', async () => {
    store.append([], [{ timestamp: NOW - MIN, deviceId: 0, pid: 333, owner: 'carol', memoryUsedMb: 800 }]);
    fetchMock.mockResolvedValueOnce(json({ id: 'page-1' })).mockResolvedValueOnce(json({ id: 'page-2' }));

    const result = await publisher(true).publishRecent(NOW);

    expect(result).toEqual({ published: 2, skipped: 1, failed: 0, errors: [] });
    expect(store.isSessionPublished(0, 333)).toBe(false);
  });

  it('looks back only as far as configured', async () => {
    const result = await publisher().publishRecent(NOW + 2 * 60 * MIN);

    expect(result).toEqual({ published: 0, skipped: 0, failed: 0, errors: [] });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
