import type { AlertMessage, IdleThresholds } from './types.js';

export interface AlertMessageInput {
  deviceId: number;
  pid: number;
  owner: string;
  avgUtilizationPct: number;
  pollIntervalSeconds?: number;
}

export function formatIdleAlert(input: AlertMessageInput, thresholds: IdleThresholds): AlertMessage {
  const subject = `GPU Monitor: Idle Process Alert - GPU ${input.deviceId}`;

  const lines = [
    `Hi ${input.owner},`,
    '',
    `Your process (PID ${input.pid}) on GPU ${input.deviceId} has been holding GPU memory while the device ` +
      `showed low utilization (<${thresholds.utilizationPercent}%) for the past ${thresholds.thresholdMinutes} minutes.`,
    '',
    `Average utilization: ${input.avgUtilizationPct.toFixed(1)}%`,
    '',
    'You may want to check whether:',
    "- the job finished but didn't exit cleanly",
    '- the process is stuck or waiting for input',
    "- you're between training runs",
    '',
    'If the process is holding memory on purpose, no action is needed.',
    '',
    'To free the GPU for others:',
    `  kill ${input.pid}`,
    '',
    '---',
    'Utilization is measured for the whole device, not per process.',
  ];

  if (input.pollIntervalSeconds !== undefined) {
    lines.push(`The monitor polls every ${input.pollIntervalSeconds} seconds.`);
  }

  return { subject, body: lines.join('\n') };
}
