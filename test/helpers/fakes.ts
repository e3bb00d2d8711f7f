/**
 * In-process stand-ins for the external collaborators: the GPU driver,
 * the remote document service and the notification channel.
 */

import { createLogger } from '../../src/core/logger.js';
import { CollectionError, DeliveryError, ReconcileError } from '../../src/core/errors.js';
import type { BlockContent, RemoteBlock, RemoteDocumentStore } from '../../src/dashboard/types.js';
import type { Notifier } from '../../src/notify/types.js';
import type { DeviceFact, ProcessFact, TelemetrySource } from '../../src/telemetry/types.js';

export const silentLogger = createLogger('test', { level: 'silent' });

export function device(id: number, overrides: Partial<DeviceFact> = {}): DeviceFact {
  return {
    id,
    name: 'NVIDIA A100',
    utilizationPct: 0,
    memoryUsedMb: 0,
    memoryTotalMb: 40960,
    temperatureC: 40,
    ...overrides,
  };
}

export function proc(deviceId: number, pid: number, owner = 'alice', memoryUsedMb = 1000): ProcessFact {
  return { deviceId, pid, owner, memoryUsedMb };
}

// ── Document service ─────────────────────────────────────────

export type StoreCall =
  | { op: 'list' }
  | { op: 'patch'; id: string; text: string }
  | { op: 'delete'; id: string }
  | { op: 'append'; types: string[] };

export class FakeDocumentStore implements RemoteDocumentStore {
  blocks: RemoteBlock[] = [];
  calls: StoreCall[] = [];
  /** Number of upcoming list calls that fail */
  failLists = 0;
  failAppend = false;
  failPatch = new Set<string>();
  failDelete = new Set<string>();

  private nextId = 1;

  seed(blocks: Array<{ type: string; text: string; id?: string }>): this {
    for (const b of blocks) {
      this.blocks.push({ id: b.id ?? this.allocateId(), type: b.type, text: b.text });
    }
    return this;
  }

  callsOf<T extends StoreCall['op']>(op: T): Array<Extract<StoreCall, { op: T }>> {
    return this.calls.filter((c): c is Extract<StoreCall, { op: T }> => c.op === op);
  }

  textOf(id: string): string | undefined {
    return this.blocks.find((b) => b.id === id)?.text;
  }

  async listChildBlocks(_documentId: string): Promise<RemoteBlock[]> {
    this.calls.push({ op: 'list' });
    if (this.failLists > 0) {
      this.failLists--;
      throw new ReconcileError('list failed: HTTP 502', 'list', undefined, 502);
    }
    return this.blocks.map((b) => ({ ...b }));
  }

  async patchBlock(blockId: string, content: BlockContent): Promise<void> {
    this.calls.push({ op: 'patch', id: blockId, text: content.text });
    if (this.failPatch.has(blockId)) {
      throw new ReconcileError('patch failed: HTTP 500', 'patch', blockId, 500);
    }
    const block = this.blocks.find((b) => b.id === blockId);
    if (!block) {
      throw new ReconcileError(`patch failed: ${blockId} not found`, 'patch', blockId, 404);
    }
    block.text = content.text;
  }

  async deleteBlock(blockId: string): Promise<void> {
    this.calls.push({ op: 'delete', id: blockId });
    if (this.failDelete.has(blockId)) {
      throw new ReconcileError('delete failed: HTTP 500', 'delete', blockId, 500);
    }
    this.blocks = this.blocks.filter((b) => b.id !== blockId);
  }

  async appendChildBlocks(_documentId: string, blocks: BlockContent[]): Promise<RemoteBlock[]> {
    this.calls.push({ op: 'append', types: blocks.map((b) => b.type) });
    if (this.failAppend) {
      throw new ReconcileError('append failed: HTTP 500', 'append', undefined, 500);
    }
    const created = blocks.map((b) => ({ id: this.allocateId(), type: b.type, text: b.text }));
    this.blocks.push(...created);
    return created.map((b) => ({ ...b }));
  }

  private allocateId(): string {
    return `blk-${this.nextId++}`;
  }
}

// ── Telemetry ────────────────────────────────────────────────

export class FakeTelemetrySource implements TelemetrySource {
  devices: DeviceFact[] = [];
  processes: ProcessFact[] = [];
  /** Thrown by the next listDevices call, then cleared */
  nextError: Error | null = null;
  probes = 0;

  async probe(): Promise<void> {
    this.probes++;
  }

  async listDevices(): Promise<DeviceFact[]> {
    if (this.nextError) {
      const error = this.nextError;
      this.nextError = null;
      throw error;
    }
    return this.devices.map((d) => ({ ...d }));
  }

  async listProcesses(): Promise<ProcessFact[]> {
    return this.processes.map((p) => ({ ...p }));
  }

  failNextWith(message = 'nvidia-smi exited with status 9'): void {
    this.nextError = new CollectionError(message, 'nvidia-smi');
  }
}

// ── Notification channel ─────────────────────────────────────

export interface SentMessage {
  recipient: string;
  subject: string;
  body: string;
}

export class RecordingNotifier implements Notifier {
  readonly channel = 'test';
  sent: SentMessage[] = [];
  fail = false;

  async send(recipient: string, subject: string, body: string): Promise<void> {
    if (this.fail) {
      throw new DeliveryError('connection refused', this.channel);
    }
    this.sent.push({ recipient, subject, body });
  }
}
