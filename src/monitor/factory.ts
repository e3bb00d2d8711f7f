import { ConfigError } from '../core/errors.js';
import type { MonitorConfig } from '../core/types.js';
import { getLogger, type Logger } from '../core/logger.js';
import { DashboardReconciler } from '../dashboard/reconciler.js';
import { NotionDocumentStore } from '../dashboard/notion-store.js';
import { SessionPublisher } from '../dashboard/session-publisher.js';
import type { DatabasePageWriter, RemoteDocumentStore } from '../dashboard/types.js';
import { IdleDetector } from '../idle/idle-detector.js';
import { createNotifier } from '../notify/index.js';
import type { Notifier } from '../notify/types.js';
import { SnapshotStore } from '../store/snapshot-store.js';
import type { SessionQuery } from '../store/types.js';
import { NvidiaSmiSource } from '../telemetry/nvidia-smi.js';
import type { TelemetrySource } from '../telemetry/types.js';
import { Monitor, type SleepFn } from './monitor.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MonitorRuntime {
  monitor: Monitor;
  store: SnapshotStore;
  source: TelemetrySource;
  close(): void;
}

/** Seams for tests; anything omitted is built from config */
export interface MonitorOverrides {
  source?: TelemetrySource;
  store?: SnapshotStore;
  documentStore?: RemoteDocumentStore;
  pageWriter?: DatabasePageWriter;
  notifier?: Notifier | null;
  now?: () => number;
  sleep?: SleepFn;
  logger?: Logger;
}

/**
 * Wire the poll loop from a validated config.
 */
export function createMonitor(config: MonitorConfig, overrides: MonitorOverrides = {}): MonitorRuntime {
  const logger = overrides.logger ?? getLogger();

  const source =
    overrides.source ??
    new NvidiaSmiSource({
      command: config.telemetry.command,
      timeoutMs: config.telemetry.timeoutMs,
      logger: logger.child({ component: 'telemetry' }),
    });

  const dbPath = config.database.path ?? ':memory:';
  const store = overrides.store ?? SnapshotStore.open(dbPath, { now: overrides.now });

  const notifier = overrides.notifier === null ? undefined : (overrides.notifier ?? createNotifier(config.notifier));

  const detector = new IdleDetector({
    store,
    thresholds: config.idle,
    notifier,
    pollIntervalSeconds: config.pollIntervalSeconds,
    logger: logger.child({ component: 'idle-detector' }),
  });

  const { dashboard } = config;

  let reconciler: DashboardReconciler | undefined;
  if (dashboard.enabled && dashboard.documentId) {
    const documentStore = overrides.documentStore ?? createNotionStore(config);
    reconciler = new DashboardReconciler({
      documentId: dashboard.documentId,
      store: documentStore,
      protectedTypes: dashboard.protectedBlockTypes,
      logger: logger.child({ component: 'reconciler' }),
    });
  }

  let publisher: SessionPublisher | undefined;
  if (dashboard.enabled && dashboard.processHistoryDatabaseId) {
    publisher = createSessionPublisher(config, store, overrides.pageWriter ?? createNotionStore(config), {
      endedOnly: true,
      logger: logger.child({ component: 'session-publisher' }),
    });
  }

  const monitor = new Monitor({
    source,
    store,
    detector,
    reconciler,
    publisher,
    pollIntervalSeconds: config.pollIntervalSeconds,
    retentionMs: config.retention.days * DAY_MS,
    dashboardTitle: dashboard.title,
    now: overrides.now,
    sleep: overrides.sleep,
    logger: logger.child({ component: 'monitor' }),
  });

  return {
    monitor,
    store,
    source,
    close: () => store.close(),
  };
}

export function createNotionStore(config: MonitorConfig): NotionDocumentStore {
  const { dashboard } = config;
  return new NotionDocumentStore({
    token: dashboard.token ?? '',
    apiBaseUrl: dashboard.apiBaseUrl,
    apiVersion: dashboard.apiVersion,
    timeoutMs: dashboard.requestTimeoutMs,
  });
}

/**
 * Publisher for `dashboard.processHistoryDatabaseId`, using the configured
 * idle thresholds to label sessions.
 */
export function createSessionPublisher(
  config: MonitorConfig,
  store: SnapshotStore,
  pages: DatabasePageWriter,
  options: { endedOnly?: boolean; logger?: Logger } = {},
): SessionPublisher {
  const { dashboard } = config;
  if (!dashboard.processHistoryDatabaseId) {
    throw new ConfigError('dashboard.processHistoryDatabaseId is required to publish process history');
  }
  return new SessionPublisher({
    databaseId: dashboard.processHistoryDatabaseId,
    pages,
    store,
    lookbackMinutes: dashboard.processHistoryLookbackMinutes,
    endedOnly: options.endedOnly,
    sessionQuery: sessionQueryDefaults(config),
    logger: options.logger,
  });
}

/** Live window and idle labels shared by every session listing */
export function sessionQueryDefaults(config: MonitorConfig): Omit<SessionQuery, 'since' | 'now'> {
  return {
    liveWindowMs: config.pollIntervalSeconds * 2000,
    idleUtilizationPct: config.idle.utilizationPercent,
    idleMinutes: config.idle.thresholdMinutes,
  };
}
