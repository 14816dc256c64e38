import type { Logger } from '../types/logger.js';

/**
 * Event handler for a single event kind.
 */
export type EventHandler<T> = (payload: T) => void;

type HandlerTable<TEvents extends object> = {
  [K in keyof TEvents]?: Map<string, EventHandler<TEvents[K]>>;
};

/**
 * EventBus - typed pub/sub keyed by event kind.
 *
 * `TEvents` maps each event kind to its payload type. Delivery is synchronous
 * and happens once per subscriber. A throwing handler is logged and does not
 * stop delivery to the others.
 */
export class EventBus<TEvents extends object> {
  private readonly handlers: HandlerTable<TEvents> = {};
  private readonly kindById = new Map<string, keyof TEvents>();
  private nextId = 1;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'event-bus' });
  }

  /**
   * Subscribe to one event kind.
   *
   * @returns Subscription ID for unsubscribing
   */
  subscribe<K extends keyof TEvents>(kind: K, handler: EventHandler<TEvents[K]>): string {
    const id = `sub_${String(this.nextId++)}`;
    const table = this.handlers[kind] ?? new Map<string, EventHandler<TEvents[K]>>();
    table.set(id, handler);
    this.handlers[kind] = table;
    this.kindById.set(id, kind);

    this.logger.debug({ subscriptionId: id, kind: String(kind) }, 'Subscription added');
    return id;
  }

  /**
   * Unsubscribe by subscription ID.
   */
  unsubscribe(subscriptionId: string): boolean {
    const kind = this.kindById.get(subscriptionId);
    if (kind === undefined) {
      return false;
    }
    this.kindById.delete(subscriptionId);
    this.handlers[kind]?.delete(subscriptionId);
    this.logger.debug({ subscriptionId }, 'Subscription removed');
    return true;
  }

  /**
   * Publish an event to every subscriber of its kind.
   *
   * @returns Number of handlers that received the event
   */
  publish<K extends keyof TEvents>(kind: K, payload: TEvents[K]): number {
    const table = this.handlers[kind];
    if (!table || table.size === 0) {
      return 0;
    }

    // Snapshot so handlers may unsubscribe while being notified
    const entries = [...table.entries()];
    for (const [id, handler] of entries) {
      try {
        handler(payload);
      } catch (error) {
        this.logger.error(
          {
            subscriptionId: id,
            kind: String(kind),
            error: error instanceof Error ? error.message : String(error),
          },
          'Event handler failed'
        );
      }
    }

    return entries.length;
  }

  /**
   * Get count of active subscriptions.
   */
  subscriptionCount(): number {
    return this.kindById.size;
  }

  /**
   * Clear all subscriptions.
   */
  clear(): void {
    for (const kind of new Set(this.kindById.values())) {
      this.handlers[kind]?.clear();
    }
    this.kindById.clear();
  }
}

/**
 * Create an event bus.
 */
export function createEventBus<TEvents extends object>(logger: Logger): EventBus<TEvents> {
  return new EventBus<TEvents>(logger);
}
