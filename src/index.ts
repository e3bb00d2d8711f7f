/**
 * gpuwatch — GPU telemetry poller with idle-process alerts and a live dashboard
 * Public exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createMonitor } from 'gpuwatch';
 *
 * const config = new ConfigManager().load({ pollIntervalSeconds: 30 });
 * const { monitor, source } = createMonitor(config);
 * await source.probe();
 * monitor.events.on('alert:fired', (alert) => console.log(alert.pid));
 * await monitor.run();
 * ```
 */

// Core
export { ConfigManager, validateConfig, type ConfigManagerOptions, type DeepPartial } from './core/config.js';
export { EventBus } from './core/events.js';
export { createLogger, getLogger, setLogger, type Logger } from './core/logger.js';
export {
  GpuWatchError,
  CollectionError,
  StorageError,
  ReconcileError,
  DeliveryError,
  FatalConfigurationError,
  ConfigError,
  type RemoteOperation,
} from './core/errors.js';
export {
  MonitorConfigSchema,
  LogLevelSchema,
  type LogLevel,
  type MonitorConfig,
  type MonitorEvents,
  type TickReport,
  type TickSkipReason,
} from './core/types.js';

// Components
export * from './telemetry/index.js';
export * from './store/index.js';
export * from './dashboard/index.js';
export * from './idle/index.js';
export * from './notify/index.js';
export * from './monitor/index.js';

// CLI
export { createCLI, main } from './cli/index.js';
export { NAME, VERSION } from './version.js';
