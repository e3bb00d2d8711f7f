/**
 * Snapshot Store Types
 *
 * Rows are immutable once written. Timestamps are epoch milliseconds.
 */

export interface DeviceSnapshot {
  timestamp: number;
  deviceId: number;
  name: string;
  utilizationPct: number;
  memoryUsedMb: number;
  memoryTotalMb: number;
  temperatureC: number;
}

export interface ProcessSnapshot {
  timestamp: number;
  deviceId: number;
  pid: number;
  owner: string;
  memoryUsedMb: number;
}

/** Device columns that can be averaged over a window */
export type DeviceMetric = 'utilization' | 'memoryUsed' | 'temperature';

export interface AlertRecord {
  id: string;
  timestamp: number;
  deviceId: number;
  pid: number;
  owner: string;
  avgUtilizationPct: number;
  sampleCount: number;
  reason: string;
  delivered: boolean;
}

export interface EvictionResult {
  cutoff: number;
  deviceRows: number;
  processRows: number;
}

export type SessionStatus = 'running' | 'idle' | 'completed';

export interface ProcessSession {
  deviceId: number;
  pid: number;
  owner: string;
  firstSeen: number;
  lastSeen: number;
  durationMinutes: number;
  sampleCount: number;
  avgMemoryMb: number;
  peakMemoryMb: number;
  /** Device-level utilization over the session span; absent when no device rows overlap */
  avgUtilizationPct: number | undefined;
  peakUtilizationPct: number | undefined;
  ended: boolean;
  status: SessionStatus;
}

export interface SessionQuery {
  since: number;
  now?: number;
  /** A session with no row inside this window before `now` is considered ended */
  liveWindowMs?: number;
  idleUtilizationPct?: number;
  idleMinutes?: number;
}

/** The read side the idle detector depends on */
export interface WindowReader {
  windowAverage(deviceId: number, metric: DeviceMetric, since: number): number | undefined;
  windowCount(deviceId: number, pid: number, since: number): number;
}

export interface AlertLog {
  recordAlert(record: Omit<AlertRecord, 'id'>): AlertRecord;
}

/** Remembers which process sessions were already published, by (device, pid) */
export interface SessionLedger {
  isSessionPublished(deviceId: number, pid: number): boolean;
  markSessionPublished(deviceId: number, pid: number, pageId: string, publishedAt: number): void;
}
