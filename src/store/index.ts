export { SnapshotStore, type SnapshotStoreOptions } from './snapshot-store.js';
export type {
  AlertLog,
  AlertRecord,
  DeviceMetric,
  DeviceSnapshot,
  EvictionResult,
  ProcessSession,
  ProcessSnapshot,
  SessionLedger,
  SessionQuery,
  SessionStatus,
  WindowReader,
} from './types.js';
