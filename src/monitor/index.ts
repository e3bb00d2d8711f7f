export { Monitor, type MonitorOptions, type SleepFn } from './monitor.js';
export {
  createMonitor,
  createNotionStore,
  createSessionPublisher,
  sessionQueryDefaults,
  type MonitorRuntime,
  type MonitorOverrides,
} from './factory.js';
