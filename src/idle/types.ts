/** Per-process debounce state. Absent from the map means Unseen. */
export type AlertState = 'tracking' | 'alerted';

export interface IdleThresholds {
  /** Length of the lookback window */
  thresholdMinutes: number;
  /** Alert when the device's mean utilization over the window is below this */
  utilizationPercent: number;
  /** Process rows required inside the window before alerting */
  minSamples: number;
}

export interface IdleAlert {
  deviceId: number;
  pid: number;
  owner: string;
  avgUtilizationPct: number;
  sampleCount: number;
  timestamp: number;
  delivered: boolean;
  /** Audit record id, absent when the audit write failed */
  recordId?: string;
}

export interface AlertMessage {
  subject: string;
  body: string;
}
