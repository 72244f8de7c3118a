type Listener<T> = (payload: T) => void;

/**
 * Small typed event emitter, usable outside Node
 */
export class SimpleEventEmitter<Events extends Record<string, unknown>> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, callback: Listener<Events[K]>): void {
    let callbacks = this.listeners[event];
    if (!callbacks) {
      callbacks = new Set();
      this.listeners[event] = callbacks;
    }
    callbacks.add(callback);
  }

  off<K extends keyof Events>(event: K, callback: Listener<Events[K]>): void {
    this.listeners[event]?.delete(callback);
  }

  protected emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    this.listeners[event]?.forEach((cb) => cb(payload));
  }

  removeAllListeners(): void {
    this.listeners = {};
  }
}
