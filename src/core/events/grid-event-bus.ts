import { EventEmitter } from 'events';
import { GridBotEventMap, GridBotEventName } from '../../types';
import { createLogger } from '../../utils';

export type GridEventListener<K extends GridBotEventName> = (payload: GridBotEventMap[K]) => void;

/**
 * Typed notifications for state changes. Each listener runs on its own: a
 * failure is logged and reaches neither the other listeners nor the
 * invocation that emitted the event.
 */
export class GridEventBus {
  private readonly emitter = new EventEmitter();
  private logger = createLogger('grid-events');

  on<K extends GridBotEventName>(event: K, listener: GridEventListener<K>): () => void {
    const guarded = (payload: GridBotEventMap[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        this.logger.error(`Listener for ${event} threw`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };
    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  emit<K extends GridBotEventName>(event: K, payload: GridBotEventMap[K]): void {
    this.emitter.emit(event, payload);
  }
}
