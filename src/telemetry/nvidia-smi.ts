/**
 * NvidiaSmiSource — Telemetry Source backed by the nvidia-smi CLI
 *
 * Uses child_process.execFile for every query; owners are resolved with `ps`.
 * All CSV output is requested with `noheader,nounits`.
 */

import { execFile } from 'node:child_process';
import { getLogger, type Logger } from '../core/logger.js';
import { CollectionError, FatalConfigurationError, toError } from '../core/errors.js';
import {
  UNKNOWN_OWNER,
  type CommandRunner,
  type DeviceFact,
  type ProcessFact,
  type TelemetrySource,
} from './types.js';

const DEVICE_QUERY = [
  '--query-gpu=index,name,utilization.gpu,memory.used,memory.total,temperature.gpu,pci.bus_id',
  '--format=csv,noheader,nounits',
];

const PROCESS_QUERY = [
  '--query-compute-apps=gpu_bus_id,pid,used_memory',
  '--format=csv,noheader,nounits',
];

/** Fields in a device row after the name: utilization, used, total, temperature, bus id */
const DEVICE_TRAILING_FIELDS = 5;

export interface NvidiaSmiOptions {
  command?: string;
  /** Subprocess timeout; 0 disables it */
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export function execFileRunner(timeoutMs = 0): CommandRunner {
  return (command, args) =>
    new Promise((resolve, reject) => {
      execFile(command, args, { timeout: timeoutMs, maxBuffer: 4 * 1024 * 1024 }, (err, stdout, stderr) => {
        if (err) {
          reject(err);
        } else {
          resolve({ stdout, stderr });
        }
      });
    });
}

interface DeviceListing {
  devices: DeviceFact[];
  /** Normalized PCI bus id -> device index */
  busMap: Map<string, number>;
}

export class NvidiaSmiSource implements TelemetrySource {
  private readonly command: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  /** From the latest device query; process rows carry only a bus id */
  private busMap: Map<string, number> | null = null;

  constructor(options: NvidiaSmiOptions = {}) {
    this.command = options.command ?? 'nvidia-smi';
    this.runner = options.runner ?? execFileRunner(options.timeoutMs ?? 0);
    this.logger = options.logger ?? getLogger().child({ component: 'telemetry' });
  }

  async probe(): Promise<void> {
    try {
      await this.runner(this.command, ['-L']);
    } catch (err) {
      if (isMissingBinary(err)) {
        throw new FatalConfigurationError(
          `"${this.command}" not found in PATH; install the NVIDIA driver tools or set telemetry.command`,
          toError(err),
        );
      }
      throw new CollectionError(`${this.command} -L failed: ${describe(err)}`, this.command, toError(err));
    }
  }

  async listDevices(): Promise<DeviceFact[]> {
    const listing = await this.readDevices();
    this.busMap = listing.busMap;
    return listing.devices;
  }

  async listProcesses(): Promise<ProcessFact[]> {
    const busMap = this.busMap ?? (await this.readDevices()).busMap;
    const rows = parseCsv(await this.run(PROCESS_QUERY));
    const processes: ProcessFact[] = [];

    for (const fields of rows) {
      if (fields.length !== 3) {
        throw new CollectionError(`Unexpected process row: "${fields.join(', ')}"`, this.command);
      }
      const [busId, rawPid, rawMemory] = fields;
      const deviceId = busMap.get(normalizeBusId(busId));
      if (deviceId === undefined) {
        this.logger.debug({ busId, pid: rawPid }, 'Dropping process on unknown bus');
        continue;
      }

      const pid = parseIndex(rawPid, this.command);
      processes.push({
        deviceId,
        pid,
        owner: await this.resolveOwner(pid),
        memoryUsedMb: toNumber(rawMemory),
      });
    }

    return processes;
  }

  // ─── Internal ─────────────────────────────────────────────

  private async readDevices(): Promise<DeviceListing> {
    const rows = parseCsv(await this.run(DEVICE_QUERY));
    const busMap = new Map<string, number>();

    const devices = rows.map((fields) => {
      if (fields.length < 2 + DEVICE_TRAILING_FIELDS) {
        throw new CollectionError(`Unexpected device row: "${fields.join(', ')}"`, this.command);
      }
      const tail = fields.slice(-DEVICE_TRAILING_FIELDS);
      const id = parseIndex(fields[0], this.command);
      busMap.set(normalizeBusId(tail[4]), id);
      return {
        id,
        // GPU names may themselves contain commas
        name: fields.slice(1, fields.length - DEVICE_TRAILING_FIELDS).join(', '),
        utilizationPct: toNumber(tail[0]),
        memoryUsedMb: toNumber(tail[1]),
        memoryTotalMb: toNumber(tail[2]),
        temperatureC: toNumber(tail[3]),
      };
    });

    return { devices, busMap };
  }

  private async resolveOwner(pid: number): Promise<string> {
    try {
      const { stdout } = await this.runner('ps', ['-o', 'user=', '-p', String(pid)]);
      return stdout.trim() || UNKNOWN_OWNER;
    } catch (err) {
      this.logger.debug({ pid, error: describe(err) }, 'Owner lookup failed');
      return UNKNOWN_OWNER;
    }
  }

  private async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await this.runner(this.command, args);
      return stdout;
    } catch (err) {
      throw new CollectionError(
        `${this.command} ${args[0]} failed: ${describe(err)}`,
        this.command,
        toError(err),
      );
    }
  }
}

// ─── Helpers ──────────────────────────────────────────────────

export function parseCsv(stdout: string): string[][] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.split(',').map((field) => field.trim()));
}

/** nvidia-smi reports unsupported readings as "[N/A]" or "[Not Supported]" */
function toNumber(raw: string): number {
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? value : 0;
}

function parseIndex(raw: string, command: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value)) {
    throw new CollectionError(`Expected an integer, got "${raw}"`, command);
  }
  return value;
}

function normalizeBusId(busId: string): string {
  return busId.trim().toUpperCase();
}

function isMissingBinary(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown): string {
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
    return err.stderr.trim();
  }
  return toError(err).message;
}
