/**
 * Dashboard Model — pure derivation of the desired status document from one
 * poll. Same inputs give the same output apart from the embedded timestamp.
 */

import type { DeviceFact, ProcessFact } from '../telemetry/types.js';
import type { DashboardDocument, DashboardSection } from './types.js';

export const DEFAULT_TITLE = 'GPU Monitor Status';

export const NO_PROCESSES_LINE = '  No active processes';

const RULE = '─'.repeat(41);

export function sectionMarker(deviceId: number): string {
  return `GPU ${deviceId}:`;
}

/** Local wall-clock time as YYYY-MM-DD HH:mm:ss */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Fixed leading text of the header block, before the timestamp */
export function headerPrefix(title: string): string {
  return `${title} - Updated:`;
}

export function formatHeader(title: string, timestamp: string): string {
  return `${headerPrefix(title)} ${timestamp}`;
}

export function formatSection(device: DeviceFact, processes: ProcessFact[], timestamp: string): string {
  const memoryPct = device.memoryTotalMb > 0 ? (device.memoryUsedMb / device.memoryTotalMb) * 100 : 0;

  const lines = [
    `${sectionMarker(device.id)} ${device.name} | Last Updated: ${timestamp}`,
    RULE,
    `Utilization: ${device.utilizationPct.toFixed(1)}%`,
    `Memory: ${Math.round(device.memoryUsedMb)} MB / ${Math.round(device.memoryTotalMb)} MB (${memoryPct.toFixed(1)}%)`,
    `Temperature: ${Math.round(device.temperatureC)}°C`,
    '',
    'Running Processes:',
  ];

  const owned = processes
    .filter((p) => p.deviceId === device.id)
    .sort((a, b) => a.pid - b.pid);

  if (owned.length === 0) {
    lines.push(NO_PROCESSES_LINE);
  } else {
    for (const proc of owned) {
      lines.push(`  • PID ${proc.pid} - ${proc.owner} - ${Math.round(proc.memoryUsedMb)} MB`);
    }
  }

  return lines.join('\n');
}

export function buildSections(
  devices: DeviceFact[],
  processes: ProcessFact[],
  timestamp: Date,
): DashboardSection[] {
  const stamp = formatTimestamp(timestamp);
  return [...devices]
    .sort((a, b) => a.id - b.id)
    .map((device) => ({
      deviceId: device.id,
      marker: sectionMarker(device.id),
      content: formatSection(device, processes, stamp),
    }));
}

export function buildDashboard(
  devices: DeviceFact[],
  processes: ProcessFact[],
  timestamp: Date,
  title: string = DEFAULT_TITLE,
): DashboardDocument {
  const generatedAt = formatTimestamp(timestamp);
  return {
    title,
    header: formatHeader(title, generatedAt),
    generatedAt,
    sections: buildSections(devices, processes, timestamp),
  };
}
