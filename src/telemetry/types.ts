/**
 * Telemetry Types
 *
 * Facts reported by a Telemetry Source on one poll. Memory figures are in MB,
 * utilization in percent, temperature in degrees Celsius.
 */

export interface DeviceFact {
  id: number;
  name: string;
  utilizationPct: number;
  memoryUsedMb: number;
  memoryTotalMb: number;
  temperatureC: number;
}

export interface ProcessFact {
  deviceId: number;
  pid: number;
  /** Owning user, or {@link UNKNOWN_OWNER} when it could not be resolved */
  owner: string;
  memoryUsedMb: number;
}

export const UNKNOWN_OWNER = 'unknown';

export interface TelemetrySource {
  /**
   * Verify the underlying tooling is usable. Throws FatalConfigurationError
   * when it is missing entirely.
   */
  probe(): Promise<void>;
  /** Throws CollectionError when the tool is absent or exits non-zero. */
  listDevices(): Promise<DeviceFact[]>;
  /** Same failure contract as listDevices. */
  listProcesses(): Promise<ProcessFact[]>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an executable with arguments and resolves with its output. */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;
