import type { EventHandler } from '../types';
import { ScanLogger, scanLogger } from '../utils/ScanLogger';

type HandlerRegistry<TEvents> = { [E in keyof TEvents]?: Set<EventHandler<TEvents[E]>> };

// Type-safe event emitter; handlers run synchronously in registration order
export class TypedEventEmitter<TEvents> {
  private handlers: HandlerRegistry<TEvents> = {};

  constructor(protected readonly logger: ScanLogger = scanLogger) {}

  // Register event handler
  on<E extends keyof TEvents>(event: E, handler: EventHandler<TEvents[E]>): void {
    let handlers = this.handlers[event];
    if (!handlers) {
      handlers = new Set<EventHandler<TEvents[E]>>();
      this.handlers[event] = handlers;
    }
    handlers.add(handler);
  }

  // Remove event handler
  off<E extends keyof TEvents>(event: E, handler: EventHandler<TEvents[E]>): void {
    const handlers = this.handlers[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.handlers[event];
      }
    }
  }

  // Register one-time event handler
  once<E extends keyof TEvents>(event: E, handler: EventHandler<TEvents[E]>): void {
    const wrappedHandler: EventHandler<TEvents[E]> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    this.on(event, wrappedHandler);
  }

  // Emit event with payload
  emit<E extends keyof TEvents>(event: E, payload: TEvents[E]): void {
    const handlers = this.handlers[event];
    if (handlers) {
      // Snapshot so handlers removing themselves don't skip siblings
      [...handlers].forEach(handler => {
        try {
          handler(payload);
        } catch (error) {
          this.logger.error(`Error in event handler for ${String(event)}`, error, 'EVENTS');
        }
      });
    }
  }

  // Remove all handlers
  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  // Get listener count
  listenerCount(event: keyof TEvents): number {
    return this.handlers[event]?.size ?? 0;
  }
}
