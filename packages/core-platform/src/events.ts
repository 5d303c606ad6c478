export type EventMap = Record<string, unknown>;

type Handler<Payload> = (payload: Payload) => void;

type HandlerSets<Events extends EventMap> = {
  [EventKey in keyof Events]?: Set<Handler<Events[EventKey]>>;
};

export interface EventBusOptions {
  /**
   * Called when a handler throws. Without it the error propagates to the
   * emitter and the remaining handlers are skipped.
   */
  onHandlerError?: (event: string, error: unknown) => void;
}

export class EventBus<Events extends EventMap> {
  private readonly listeners: HandlerSets<Events> = {};
  private readonly onHandlerError?: (event: string, error: unknown) => void;

  constructor(options: EventBusOptions = {}) {
    this.onHandlerError = options.onHandlerError;
  }

  emit<EventKey extends keyof Events>(event: EventKey, payload: Events[EventKey]) {
    const handlers = this.listeners[event];
    if (!handlers) return;
    // Snapshot so handlers may unsubscribe while being notified.
    for (const handler of [...handlers]) {
      if (!this.onHandlerError) {
        handler(payload);
        continue;
      }
      try {
        handler(payload);
      } catch (error) {
        this.onHandlerError(String(event), error);
      }
    }
  }

  on<EventKey extends keyof Events>(event: EventKey, handler: Handler<Events[EventKey]>): () => void {
    const handlers = this.listeners[event] ?? new Set<Handler<Events[EventKey]>>();
    handlers.add(handler);
    this.listeners[event] = handlers;
    return () => this.off(event, handler);
  }

  off<EventKey extends keyof Events>(event: EventKey, handler: Handler<Events[EventKey]>) {
    const handlers = this.listeners[event];
    if (!handlers) return;
    handlers.delete(handler);
    if (handlers.size === 0) {
      delete this.listeners[event];
    }
  }
}
