import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { MonitorConfigSchema, type MonitorConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U> ? U[] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface ConfigManagerOptions {
  /** Explicit config file; when set it must exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export class ConfigManager {
  private config: MonitorConfig | null = null;
  private readonly globalDir: string;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath?: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = join(options.homeDir ?? homedir(), '.gpuwatch');
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.configPath = options.configPath;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- config file <- env vars <- overrides
   */
  load(overrides?: DeepPartial<MonitorConfig>): MonitorConfig {
    let raw: Record<string, unknown> = {};

    // 1. Config file
    const filePath = this.resolveConfigPath();
    if (filePath) {
      raw = this.readFile(filePath);
    }

    // 2. Environment variables
    raw = this.applyEnvVars(raw);

    // 3. Overrides
    if (overrides) {
      raw = deepMerge(raw, { ...overrides });
    }

    // 4. Validate with Zod
    const parsed = MonitorConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    const config = this.withDefaults(parsed.data);
    validateConfig(config);
    this.config = config;
    return config;
  }

  get(): MonitorConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  /**
   * The file that load() reads, if any: --config, ./gpuwatch.yaml, ~/.gpuwatch/config.yaml
   */
  resolveConfigPath(): string | undefined {
    if (this.configPath) {
      const explicit = resolve(this.cwd, this.configPath);
      if (!existsSync(explicit)) {
        throw new ConfigError(`Config file not found: ${explicit}`);
      }
      return explicit;
    }

    const candidates = [join(this.cwd, 'gpuwatch.yaml'), join(this.globalDir, 'config.yaml')];
    return candidates.find((candidate) => existsSync(candidate));
  }

  private readFile(filePath: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse config at ${filePath}`, toError(err));
    }
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config at ${filePath} must be a mapping`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const env = this.env;
    const fromEnv: Record<string, unknown> = {};

    const dashboard: Record<string, unknown> = {};
    if (env.GPUWATCH_DASHBOARD_TOKEN) dashboard.token = env.GPUWATCH_DASHBOARD_TOKEN;
    if (env.GPUWATCH_DOCUMENT_ID) dashboard.documentId = env.GPUWATCH_DOCUMENT_ID;
    if (env.GPUWATCH_HISTORY_DATABASE_ID) dashboard.processHistoryDatabaseId = env.GPUWATCH_HISTORY_DATABASE_ID;
    if (Object.keys(dashboard).length > 0) fromEnv.dashboard = dashboard;

    const notifier: Record<string, unknown> = {};
    if (env.GPUWATCH_SMTP_PASSWORD) notifier.smtp = { password: env.GPUWATCH_SMTP_PASSWORD };
    if (env.GPUWATCH_WEBHOOK_URL) notifier.webhook = { url: env.GPUWATCH_WEBHOOK_URL };
    if (Object.keys(notifier).length > 0) fromEnv.notifier = notifier;

    if (env.GPUWATCH_DB_PATH) fromEnv.database = { path: env.GPUWATCH_DB_PATH };
    if (env.GPUWATCH_LOG_LEVEL) fromEnv.logging = { level: env.GPUWATCH_LOG_LEVEL };

    return deepMerge(raw, fromEnv);
  }

  private withDefaults(config: MonitorConfig): MonitorConfig {
    return {
      ...config,
      database: { path: config.database.path ?? join(this.globalDir, 'gpuwatch.db') },
    };
  }
}

/**
 * Cross-field checks zod's per-field defaults cannot express.
 */
export function validateConfig(config: MonitorConfig): void {
  const problems: string[] = [];

  if (config.dashboard.enabled) {
    if (!config.dashboard.token) problems.push('dashboard.token is required when the dashboard is enabled');
    if (!config.dashboard.documentId) problems.push('dashboard.documentId is required when the dashboard is enabled');
  }

  if (config.dashboard.processHistoryDatabaseId && !config.dashboard.token) {
    problems.push('dashboard.token is required when dashboard.processHistoryDatabaseId is set');
  }

  if (config.notifier.channel === 'smtp') {
    const smtp = config.notifier.smtp;
    if (!smtp.host) problems.push('notifier.smtp.host is required for the smtp channel');
    if (!smtp.from) problems.push('notifier.smtp.from is required for the smtp channel');
    if (!smtp.recipientDomain) problems.push('notifier.smtp.recipientDomain is required for the smtp channel');
  }

  if (config.notifier.channel === 'webhook' && !config.notifier.webhook.url) {
    problems.push('notifier.webhook.url is required for the webhook channel');
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const current = target[key];
    if (next === undefined) continue;
    if (isRecord(next) && isRecord(current)) {
      result[key] = deepMerge(current, next);
    } else {
      result[key] = next;
    }
  }
  return result;
}
