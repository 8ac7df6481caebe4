import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType, R> = (event: EventPayload<T, R>) => void;

type AnyHandler<R> = (event: DomainEvent<R>) => void;

/** Typed event bus for load events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus<R = unknown> {
  // Keyed by the subscriber's own handler so `off()` can find its wrapper.
  private readonly handlers = new Map<EventType, Map<unknown, AnyHandler<R>>>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T, R>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, AnyHandler<R>>();
    existing.set(handler, (event) => {
      if (isEventOfType(event, type)) {
        handler(event);
      }
    });
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T, R>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Emit an event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent<R>): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        try {
          handler(event);
        } catch {
          // Handler failures never reach the loader or the other subscribers.
        }
      }
    }
  }
}

function isEventOfType<T extends EventType, R>(event: DomainEvent<R>, type: T): event is EventPayload<T, R> {
  return event.type === type;
}
