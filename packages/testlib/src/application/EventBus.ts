import type { EventType, EventPayload, HarnessEvent } from '../domain/events/HarnessEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: HarnessEvent) => void;

/** Receives errors thrown by subscribers. */
export type HandlerErrorListener = (error: unknown, event: HarnessEvent) => void;

function isEventOf<T extends EventType>(event: HarnessEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

function warnHandlerError(error: unknown, event: HarnessEvent): void {
  const detail = error instanceof Error ? error.message : String(error);
  process.emitWarning(`Subscriber for '${event.type}' threw: ${detail}`, 'HarnessEventWarning');
}

/** Typed event bus for harness events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Typed handlers are wrapped so one map can hold every event type; the
  // original handler stays the key so `off()` can find its wrapper.
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly onHandlerError: HandlerErrorListener;

  constructor(onHandlerError: HandlerErrorListener = warnHandlerError) {
    this.onHandlerError = onHandlerError;
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit an event to all registered handlers. A throwing handler does not
   * prevent others from executing; its error goes to `onHandlerError`.
   */
  emit(event: HarnessEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        this.dispatch(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.dispatch(handler, event);
    }
  }

  private dispatch(handler: WildcardHandler, event: HarnessEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.onHandlerError(error, event);
    }
  }
}
