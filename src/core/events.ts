import { EventEmitter } from 'eventemitter3';
import type { LatsEvent, LatsEventCallback, LatsEventType } from '../reasoning/lats/types.js';
import { getLogger } from './logger.js';

const ANY_EVENT = '*';

/**
 * Best-effort observability hook for the search lifecycle.
 *
 * Listeners run synchronously, each isolated: a throwing listener is logged
 * and the remaining listeners still run. Nothing here can fail the search.
 */
export class SearchEventEmitter {
  private emitter = new EventEmitter();
  private logger = getLogger();

  constructor(callback?: LatsEventCallback) {
    if (callback) this.onAny(callback);
  }

  on(type: LatsEventType, listener: LatsEventCallback): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  onAny(listener: LatsEventCallback): () => void {
    this.emitter.on(ANY_EVENT, listener);
    return () => this.emitter.off(ANY_EVENT, listener);
  }

  emit(type: LatsEventType, iteration: number, message: string, extra: Pick<LatsEvent, 'nodeId' | 'metadata'> = {}): LatsEvent {
    const event: LatsEvent = { type, iteration, message, timestamp: Date.now(), ...extra };

    const listeners = [...this.emitter.listeners(type), ...this.emitter.listeners(ANY_EVENT)];
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        this.logger.error({ eventType: type, iteration, error }, 'Event callback failed');
      }
    }

    return event;
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
