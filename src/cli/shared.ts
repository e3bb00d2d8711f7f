import { ConfigManager, type DeepPartial } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import { createLogger, setLogger, type Logger } from '../core/logger.js';
import { LogLevelSchema, type MonitorConfig } from '../core/types.js';

/** Options registered on the root program, visible to every command */
export interface GlobalOptions {
  config?: string;
  logLevel?: string;
  verbose?: boolean;
  pretty?: boolean;
}

export function loadConfig(globals: GlobalOptions, overrides: DeepPartial<MonitorConfig> = {}): MonitorConfig {
  const logging: DeepPartial<MonitorConfig['logging']> = {};
  if (globals.logLevel !== undefined) {
    const level = LogLevelSchema.safeParse(globals.logLevel);
    if (!level.success) {
      throw new ConfigError(`Unknown log level "${globals.logLevel}"; expected one of ${LogLevelSchema.options.join(', ')}`);
    }
    logging.level = level.data;
  }
  if (globals.verbose && globals.logLevel === undefined) logging.level = 'debug';
  if (globals.pretty) logging.pretty = true;

  const manager = new ConfigManager({ configPath: globals.config });
  return manager.load({ ...overrides, logging });
}

export function configureLogging(config: MonitorConfig): Logger {
  const logger = createLogger('gpuwatch', config.logging);
  setLogger(logger);
  return logger;
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Expected a whole number, got "${value}"`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Expected a number, got "${value}"`);
  }
  return parsed;
}

export function formatTime(ms: number): string {
  return new Date(ms).toISOString().replace('T', ' ').slice(0, 19);
}
