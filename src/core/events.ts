import { EventEmitter } from 'eventemitter3';
import { getLogger } from './logger.js';
import { toError } from './errors.js';
import type { CapflowEvents } from './types.js';

const logger = getLogger();

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof CapflowEvents>(event: K, listener: (data: CapflowEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof CapflowEvents>(event: K, listener: (data: CapflowEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof CapflowEvents>(event: K, listener: (data: CapflowEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  /**
   * Notify subscribers. A throwing listener is logged and never reaches the
   * emitting component; listeners after it miss that one event.
   */
  emit<K extends keyof CapflowEvents>(event: K, data: CapflowEvents[K]): void {
    try {
      this.emitter.emit(event, data);
    } catch (err) {
      logger.warn({ event, error: toError(err).message }, 'Event listener threw');
    }
  }
}
