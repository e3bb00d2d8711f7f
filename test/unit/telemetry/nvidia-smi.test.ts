import { describe, it, expect, vi } from 'vitest';
import { NvidiaSmiSource, parseCsv } from '../../../src/telemetry/nvidia-smi.js';
import type { CommandRunner } from '../../../src/telemetry/types.js';
import { CollectionError, FatalConfigurationError } from '../../../src/core/errors.js';
import { silentLogger } from '../../helpers/fakes.js';

const DEVICE_QUERY = '--query-gpu=index,name,utilization.gpu,memory.used,memory.total,temperature.gpu,pci.bus_id';
const PROCESS_QUERY = '--query-compute-apps=gpu_bus_id,pid,used_memory';

type Outputs = Record<string, string | Error>;

/** Answers nvidia-smi by its first argument and `ps` by pid */
function fakeRunner(outputs: Outputs): CommandRunner {
  return async (command, args) => {
    const key = command === 'ps' ? `ps:${args[3]}` : args[0];
    const output = outputs[key];
    if (output instanceof Error) throw output;
    if (output === undefined) throw new Error(`unexpected call: ${command} ${args.join(' ')}`);
    return { stdout: output, stderr: '' };
  };
}

function source(outputs: Outputs): NvidiaSmiSource {
  return new NvidiaSmiSource({ runner: fakeRunner(outputs), logger: silentLogger });
}

describe('parseCsv', () => {
  it('splits lines and trims fields, skipping blanks', () => {
    expect(parseCsv(' 0, A100 , 5\n\n1,B,6\n')).toEqual([
      ['0', 'A100', '5'],
      ['1', 'B', '6'],
    ]);
  });
});

describe('NvidiaSmiSource', () => {
  describe('probe', () => {
    it('passes when the tool lists devices', async () => {
      await expect(source({ '-L': 'GPU 0: NVIDIA A100 (UUID: GPU-x)\n' }).probe()).resolves.toBeUndefined();
    });

    it('is fatal when the binary is missing', async () => {
      const missing = Object.assign(new Error('spawn nvidia-smi ENOENT'), { code: 'ENOENT' });
      await expect(source({ '-L': missing }).probe()).rejects.toBeInstanceOf(FatalConfigurationError);
    });

    it('reports other failures as collection errors with stderr', async () => {
      const failed = Object.assign(new Error('Command failed'), { stderr: 'driver not loaded\n' });
      const err = await source({ '-L': failed }).probe().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CollectionError);
      expect(err).toMatchObject({ message: 'nvidia-smi -L failed: driver not loaded', command: 'nvidia-smi' });
    });
  });

  describe('listDevices', () => {
    it('parses devices, rejoining names that contain commas', async () => {
      const devices = await source({
        [DEVICE_QUERY]:
          '0, NVIDIA A100-SXM4-40GB, 80, 2000, 40960, 45, 00000000:07:00.0\n' +
          '1, NVIDIA GeForce RTX 3090, Ti, [N/A], 10, 24576, 38, 00000000:0A:00.0\n',
      }).listDevices();

      expect(devices).toEqual([
        { id: 0, name: 'NVIDIA A100-SXM4-40GB', utilizationPct: 80, memoryUsedMb: 2000, memoryTotalMb: 40960, temperatureC: 45 },
        { id: 1, name: 'NVIDIA GeForce RTX 3090, Ti', utilizationPct: 0, memoryUsedMb: 10, memoryTotalMb: 24576, temperatureC: 38 },
      ]);
    });

    it('returns an empty list when no devices are present', async () => {
      expect(await source({ [DEVICE_QUERY]: '\n' }).listDevices()).toEqual([]);
    });

    it('rejects malformed rows', async () => {
      await expect(source({ [DEVICE_QUERY]: '0, A100\n' }).listDevices()).rejects.toBeInstanceOf(CollectionError);
    });

    it('wraps command failures', async () => {
      await expect(source({ [DEVICE_QUERY]: new Error('exit 9') }).listDevices()).rejects.toMatchObject({
        name: 'CollectionError',
        message: `nvidia-smi ${DEVICE_QUERY} failed: exit 9`,
      });
    });
  });

  describe('listProcesses', () => {
    const outputs: Outputs = {
      [DEVICE_QUERY]: '0, A100, 80, 2000, 40960, 45, 00000000:07:00.0\n1, A100, 0, 1500, 40960, 40, 00000000:0A:00.0\n',
      [PROCESS_QUERY]: '00000000:07:00.0, 111, 2000\n00000000:0a:00.0, 222, 1500\n00000000:FF:00.0, 333, 10\n',
      'ps:111': 'alice\n',
      'ps:222': new Error('ps exited 1'),
    };

    it('maps bus ids to device indexes and resolves owners', async () => {
      expect(await source(outputs).listProcesses()).toEqual([
        { deviceId: 0, pid: 111, owner: 'alice', memoryUsedMb: 2000 },
        { deviceId: 1, pid: 222, owner: 'unknown', memoryUsedMb: 1500 },
      ]);
    });

    it('reuses the bus ids from the preceding device listing', async () => {
      const runner = vi.fn(fakeRunner(outputs));
      const smi = new NvidiaSmiSource({ runner, logger: silentLogger });

      await smi.listDevices();
      const processes = await smi.listProcesses();

      expect(processes.map((p) => p.deviceId)).toEqual([0, 1]);
      const deviceQueries = runner.mock.calls.filter(([, args]) => args[0] === DEVICE_QUERY);
      expect(deviceQueries).toHaveLength(1);
      expect(runner).toHaveBeenCalledTimes(4);
    });

    it('fails the whole listing when the process query fails', async () => {
      await expect(
        source({ ...outputs, [PROCESS_QUERY]: new Error('exit 6') }).listProcesses(),
      ).rejects.toBeInstanceOf(CollectionError);
    });
  });
});
