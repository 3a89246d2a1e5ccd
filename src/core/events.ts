import { EventEmitter } from 'eventemitter3';
import type { SearchEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof SearchEvents>(event: K, listener: (data: SearchEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof SearchEvents>(event: K, listener: (data: SearchEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof SearchEvents>(event: K, listener: (data: SearchEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof SearchEvents>(event: K, data: SearchEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
