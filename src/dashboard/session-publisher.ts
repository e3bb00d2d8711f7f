/**
 * SessionPublisher — writes process sessions as rows of a Notion database
 *
 * Each (device, pid) is published at most once; the ledger remembers it
 * across restarts. A failed write is not recorded, so the session is tried
 * again on the next pass.
 */

import { ReconcileError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';
import type { ProcessSession, SessionLedger, SessionQuery, SessionStatus } from '../store/types.js';
import type { DatabasePageWriter, PublishResult } from './types.js';

const STATUS_NAMES: Record<SessionStatus, string> = {
  running: 'Running',
  completed: 'Completed',
  idle: 'Idle Alert',
};

export interface SessionSource {
  listProcessSessions(query: SessionQuery): ProcessSession[];
}

export interface SessionPublisherOptions {
  databaseId: string;
  pages: DatabasePageWriter;
  store: SessionLedger & SessionSource;
  /** How far back publishRecent() looks */
  lookbackMinutes?: number;
  /** Hold sessions back until they have ended, so rows carry final figures */
  endedOnly?: boolean;
  /** Passed through to listProcessSessions() */
  sessionQuery?: Omit<SessionQuery, 'since' | 'now'>;
  logger?: Logger;
}

export class SessionPublisher {
  private readonly databaseId: string;
  private readonly pages: DatabasePageWriter;
  private readonly store: SessionLedger & SessionSource;
  private readonly lookbackMs: number;
  private readonly endedOnly: boolean;
  private readonly sessionQuery: Omit<SessionQuery, 'since' | 'now'>;
  private readonly logger: Logger;

  constructor(options: SessionPublisherOptions) {
    this.databaseId = options.databaseId;
    this.pages = options.pages;
    this.store = options.store;
    this.lookbackMs = (options.lookbackMinutes ?? 60) * 60_000;
    this.endedOnly = options.endedOnly ?? false;
    this.sessionQuery = options.sessionQuery ?? {};
    this.logger = options.logger ?? getLogger().child({ component: 'session-publisher' });
  }

  /** Publish every session seen within the lookback window before `now` */
  async publishRecent(now: number): Promise<PublishResult> {
    const sessions = this.store.listProcessSessions({ ...this.sessionQuery, since: now - this.lookbackMs, now });
    return this.publish(sessions, now);
  }

  async publish(sessions: ProcessSession[], now: number): Promise<PublishResult> {
    const result: PublishResult = { published: 0, skipped: 0, failed: 0, errors: [] };

    for (const session of sessions) {
      if ((this.endedOnly && !session.ended) || this.store.isSessionPublished(session.deviceId, session.pid)) {
        result.skipped++;
        continue;
      }

      let pageId: string;
      try {
        pageId = await this.pages.createDatabasePage(this.databaseId, sessionPageProperties(session));
      } catch (err) {
        const error =
          err instanceof ReconcileError
            ? err
            : new ReconcileError(`create failed: ${toError(err).message}`, 'create', undefined, undefined, toError(err));
        this.logger.warn({ deviceId: session.deviceId, pid: session.pid, error: error.message }, 'Could not publish session');
        result.failed++;
        result.errors.push(error);
        continue;
      }

      this.store.markSessionPublished(session.deviceId, session.pid, pageId, now);
      result.published++;
      this.logger.debug({ deviceId: session.deviceId, pid: session.pid, pageId }, 'Session published');
    }

    return result;
  }
}

/**
 * Database row properties for one session. Missing utilization reads as 0.
 */
export function sessionPageProperties(session: ProcessSession): Record<string, unknown> {
  const properties: Record<string, unknown> = {
    'Process': { title: [{ text: { content: `GPU ${session.deviceId} - ${session.owner} - PID ${session.pid}` } }] },
    'GPU ID': { select: { name: `GPU ${session.deviceId}` } },
    'Username': { select: { name: session.owner } },
    'PID': { number: session.pid },
    'Start Time': { date: { start: new Date(session.firstSeen).toISOString() } },
    'Avg Utilization': { number: oneDecimal(session.avgUtilizationPct ?? 0) },
    'Peak Utilization': { number: oneDecimal(session.peakUtilizationPct ?? 0) },
    'Avg Memory': { number: Math.round(session.avgMemoryMb) },
    'Peak Memory': { number: Math.round(session.peakMemoryMb) },
    'Status': { status: { name: STATUS_NAMES[session.status] } },
  };
  if (session.ended) {
    properties['End Time'] = { date: { start: new Date(session.lastSeen).toISOString() } };
  }
  return properties;
}

function oneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}
