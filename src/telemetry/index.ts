export { NvidiaSmiSource, execFileRunner, parseCsv, type NvidiaSmiOptions } from './nvidia-smi.js';
export {
  UNKNOWN_OWNER,
  type DeviceFact,
  type ProcessFact,
  type TelemetrySource,
  type CommandRunner,
  type CommandResult,
} from './types.js';
