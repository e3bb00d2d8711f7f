import { z } from 'zod';
import type { DeviceFact, ProcessFact } from '../telemetry/types.js';
import type { EvictionResult } from '../store/types.js';
import type { IdleAlert } from '../idle/types.js';
import type { PublishResult, ReconcileResult } from '../dashboard/types.js';

// ===== Configuration =====

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const MonitorConfigSchema = z.object({
  pollIntervalSeconds: z.number().int().min(1).default(60),
  database: z.object({
    path: z.string().optional(),
  }).default({}),
  retention: z.object({
    days: z.number().positive().default(7),
  }).default({}),
  idle: z.object({
    thresholdMinutes: z.number().positive().default(10),
    utilizationPercent: z.number().min(0).max(100).default(5),
    minSamples: z.number().int().min(1).default(3),
  }).default({}),
  telemetry: z.object({
    command: z.string().default('nvidia-smi'),
    /** 0 disables the subprocess timeout */
    timeoutMs: z.number().int().min(0).default(0),
  }).default({}),
  dashboard: z.object({
    enabled: z.boolean().default(false),
    token: z.string().optional(),
    documentId: z.string().optional(),
    title: z.string().min(1).default('GPU Monitor Status'),
    apiBaseUrl: z.string().url().default('https://api.notion.com/v1'),
    apiVersion: z.string().default('2022-06-28'),
    requestTimeoutMs: z.number().int().min(1000).max(30_000).default(15_000),
    protectedBlockTypes: z.array(z.string()).default(['child_page', 'child_database']),
    /** Notion database that receives one row per ended process session */
    processHistoryDatabaseId: z.string().optional(),
    processHistoryLookbackMinutes: z.number().positive().default(60),
  }).default({}),
  notifier: z.object({
    channel: z.enum(['none', 'smtp', 'webhook']).default('none'),
    smtp: z.object({
      host: z.string().optional(),
      port: z.number().int().default(587),
      secure: z.boolean().default(false),
      user: z.string().optional(),
      password: z.string().optional(),
      from: z.string().optional(),
      recipientDomain: z.string().optional(),
    }).default({}),
    webhook: z.object({
      url: z.string().url().optional(),
    }).default({}),
  }).default({}),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

// ===== Events =====

export type TickSkipReason = 'collection-error' | 'no-telemetry';

export interface TickReport {
  tick: number;
  timestamp: number;
  devices: number;
  processes: number;
  snapshotsWritten: number;
  alerts: IdleAlert[];
  reconcile?: ReconcileResult;
  published?: PublishResult;
  eviction?: EvictionResult;
  durationMs: number;
  skipped?: TickSkipReason;
}

export interface MonitorEvents {
  'tick:completed': TickReport;
  'tick:skipped': TickReport;
  'alert:fired': IdleAlert;
  'retention:swept': EvictionResult;
  'telemetry:collected': { devices: DeviceFact[]; processes: ProcessFact[]; timestamp: number };
}
