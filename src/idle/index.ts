export { IdleDetector, shouldAlert, processKey, type IdleDetectorOptions } from './idle-detector.js';
export { formatIdleAlert, type AlertMessageInput } from './alert-message.js';
export type { AlertState, AlertMessage, IdleAlert, IdleThresholds } from './types.js';
