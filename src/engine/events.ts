type Handler<T> = (payload: T) => void;

type HandlerMap<Events> = { [K in keyof Events]?: Set<Handler<Events[K]>> };

export class EventEmitter<Events extends Record<string, unknown>> {
  private events: HandlerMap<Events> = {};

  on<K extends keyof Events>(event: K, handler: Handler<Events[K]>): void {
    let handlers = this.events[event];
    if (!handlers) {
      handlers = new Set<Handler<Events[K]>>();
      this.events[event] = handlers;
    }
    handlers.add(handler);
  }

  off<K extends keyof Events>(event: K, handler: Handler<Events[K]>): void {
    this.events[event]?.delete(handler);
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    this.events[event]?.forEach(handler => {
      try {
        handler(payload);
      } catch (error) {
        console.error(`Error in event handler for ${String(event)}:`, error);
      }
    });
  }

  removeAllListeners(event?: keyof Events): void {
    if (event) {
      delete this.events[event];
    } else {
      this.events = {};
    }
  }
}
