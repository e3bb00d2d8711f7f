/**
 * IdleDetector — flags processes that hold device memory while the device idles
 *
 * State per (device, pid): Unseen -> Tracking -> Alerted. A key alerts at most
 * once; it leaves the map only when the process disappears from the active
 * list, after which a reappearing pid starts a fresh cycle. The map lives in
 * memory and is empty after a restart.
 *
 * Utilization is the device aggregate: the claim is "this device was mostly
 * idle while this process held memory on it", not per-process attribution.
 */

import { DeliveryError, StorageError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';
import type { AlertLog, WindowReader } from '../store/types.js';
import type { ProcessFact } from '../telemetry/types.js';
import type { Notifier } from '../notify/types.js';
import { formatIdleAlert } from './alert-message.js';
import type { AlertState, IdleAlert, IdleThresholds } from './types.js';

const DEFAULT_THRESHOLDS: IdleThresholds = {
  thresholdMinutes: 10,
  utilizationPercent: 5,
  minSamples: 3,
};

export interface IdleDetectorOptions {
  store: WindowReader & AlertLog;
  thresholds?: Partial<IdleThresholds>;
  /** Without a notifier alerts are still detected, logged and audited */
  notifier?: Notifier;
  pollIntervalSeconds?: number;
  logger?: Logger;
}

/**
 * Alert iff the window has data, its mean is below the threshold and the
 * process has enough corroborating samples.
 */
export function shouldAlert(
  avgUtilization: number | undefined,
  sampleCount: number,
  thresholds: Pick<IdleThresholds, 'utilizationPercent' | 'minSamples'>,
): boolean {
  return (
    avgUtilization !== undefined &&
    avgUtilization < thresholds.utilizationPercent &&
    sampleCount >= thresholds.minSamples
  );
}

export function processKey(deviceId: number, pid: number): string {
  return `${deviceId}:${pid}`;
}

export class IdleDetector {
  private readonly store: WindowReader & AlertLog;
  private readonly thresholds: IdleThresholds;
  private readonly notifier?: Notifier;
  private readonly pollIntervalSeconds?: number;
  private readonly logger: Logger;

  private states: Map<string, AlertState> = new Map();

  constructor(options: IdleDetectorOptions) {
    this.store = options.store;
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.notifier = options.notifier;
    this.pollIntervalSeconds = options.pollIntervalSeconds;
    this.logger = options.logger ?? getLogger().child({ component: 'idle-detector' });
  }

  /**
   * Run one detection pass over the current active process list.
   * Returns the alerts fired on this pass.
   */
  async evaluate(processes: ProcessFact[], now: number): Promise<IdleAlert[]> {
    const active = new Set(processes.map((p) => processKey(p.deviceId, p.pid)));
    for (const key of [...this.states.keys()]) {
      if (!active.has(key)) {
        this.states.delete(key);
      }
    }

    const since = now - this.thresholds.thresholdMinutes * 60_000;
    const fired: IdleAlert[] = [];

    for (const proc of processes) {
      const key = processKey(proc.deviceId, proc.pid);
      const state = this.states.get(key);
      if (state === 'alerted') continue;
      if (!state) {
        this.states.set(key, 'tracking');
      }

      let avgUtilization: number | undefined;
      let sampleCount: number;
      try {
        avgUtilization = this.store.windowAverage(proc.deviceId, 'utilization', since);
        sampleCount = this.store.windowCount(proc.deviceId, proc.pid, since);
      } catch (err) {
        if (!(err instanceof StorageError)) throw err;
        this.logger.warn({ deviceId: proc.deviceId, pid: proc.pid, error: err.message }, 'Window query failed');
        continue;
      }

      if (avgUtilization === undefined || !shouldAlert(avgUtilization, sampleCount, this.thresholds)) {
        continue;
      }

      // Alerted before delivery; a failing channel never re-fires
      this.states.set(key, 'alerted');
      fired.push(await this.fire(proc, avgUtilization, sampleCount, now));
    }

    return fired;
  }

  getState(deviceId: number, pid: number): AlertState | 'unseen' {
    return this.states.get(processKey(deviceId, pid)) ?? 'unseen';
  }

  get trackedCount(): number {
    return this.states.size;
  }

  /** Drop all debounce memory, as a restart would */
  reset(): void {
    this.states.clear();
  }

  private async fire(proc: ProcessFact, avgUtilization: number, sampleCount: number, now: number): Promise<IdleAlert> {
    const alert: IdleAlert = {
      deviceId: proc.deviceId,
      pid: proc.pid,
      owner: proc.owner,
      avgUtilizationPct: avgUtilization,
      sampleCount,
      timestamp: now,
      delivered: false,
    };

    if (this.notifier) {
      const message = formatIdleAlert(
        { ...proc, avgUtilizationPct: avgUtilization, pollIntervalSeconds: this.pollIntervalSeconds },
        this.thresholds,
      );
      try {
        await this.notifier.send(proc.owner, message.subject, message.body);
        alert.delivered = true;
      } catch (err) {
        if (!(err instanceof DeliveryError)) throw err;
        this.logger.warn(
          { deviceId: proc.deviceId, pid: proc.pid, channel: err.channel, error: err.message },
          'Idle alert delivery failed',
        );
      }
    }

    try {
      const record = this.store.recordAlert({
        timestamp: now,
        deviceId: proc.deviceId,
        pid: proc.pid,
        owner: proc.owner,
        avgUtilizationPct: avgUtilization,
        sampleCount,
        reason: `Low utilization: ${avgUtilization.toFixed(1)}%`,
        delivered: alert.delivered,
      });
      alert.recordId = record.id;
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this.logger.warn({ deviceId: proc.deviceId, pid: proc.pid, error: err.message }, 'Alert audit write failed');
    }

    this.logger.info(
      {
        deviceId: proc.deviceId,
        pid: proc.pid,
        owner: proc.owner,
        avgUtilization: Number(avgUtilization.toFixed(1)),
        sampleCount,
        delivered: alert.delivered,
      },
      'Idle process alert',
    );

    return alert;
  }
}
