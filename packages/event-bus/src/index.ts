import type { DomainEvents, DomainEventName } from "./events";

type Handler<E extends DomainEventName> = (payload: DomainEvents[E]) => void | Promise<void>;

export interface Subscription {
  unsubscribe: () => void;
}

export class EventBus {
  private handlers: { [E in DomainEventName]?: Set<Handler<E>> } = {};

  subscribe<E extends DomainEventName>(name: E, handler: Handler<E>): Subscription {
    const existing: Set<Handler<E>> = this.handlers[name] ?? new Set();
    existing.add(handler);
    this.handlers[name] = existing;

    return {
      unsubscribe: () => {
        existing.delete(handler);
      }
    };
  }

  async publish<E extends DomainEventName>(name: E, payload: DomainEvents[E]): Promise<void> {
    const listeners: Set<Handler<E>> = new Set(this.handlers[name]);
    for (const handler of listeners) {
      try {
        await handler(payload);
      } catch (err) {
        console.error(`[event-bus] handler for ${name} failed`, err);
      }
    }
  }

  listenerCount(name: DomainEventName): number {
    return this.handlers[name]?.size ?? 0;
  }

  clear(): void {
    this.handlers = {};
  }
}

export const defaultEventBus = new EventBus();

export * from "./events";
