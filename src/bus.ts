// bus.ts — fan-out of received lines to subscribed handlers

export interface LineEvent {
  network: string;
  message: string;
}

export type EventHandler = (event: LineEvent) => void;

export type HandlerErrorCallback = (err: unknown, event: LineEvent) => void;

export class SubscriptionBus {
  private readonly handlers = new Set<EventHandler>();

  constructor(private readonly onHandlerError: HandlerErrorCallback) {}

  subscribe(handler: EventHandler): void {
    this.handlers.add(handler);
  }

  /** Removing a handler that is not subscribed is a no-op. */
  unsubscribe(handler: EventHandler): void {
    this.handlers.delete(handler);
  }

  has(handler: EventHandler): boolean {
    return this.handlers.has(handler);
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Delivers to a snapshot, so handlers may unsubscribe while being called.
   * A throwing handler is reported and the rest still run.
   */
  publish(event: LineEvent): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(event);
      } catch (err) {
        this.onHandlerError(err, event);
      }
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
