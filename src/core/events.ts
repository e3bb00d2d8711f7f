import { EventEmitter } from 'eventemitter3';
import type { MonitorEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof MonitorEvents>(event: K, listener: (data: MonitorEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof MonitorEvents>(event: K, listener: (data: MonitorEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof MonitorEvents>(event: K, listener: (data: MonitorEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof MonitorEvents>(event: K, data: MonitorEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
