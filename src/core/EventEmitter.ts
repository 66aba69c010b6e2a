/**
 * EventEmitter.ts
 *
 * Typed event emitter shared by PlayerItem and PlaybackController.
 * Listener failures are contained here so an observer can never break the
 * engine's own bookkeeping.
 */

type Listener<T> = (data: T) => void;

type ListenerTable<Events> = { [K in keyof Events]?: Set<Listener<Events[K]>> };

/**
 * @example
 * ```typescript
 * interface ItemEvents {
 *   playedToEnd: { locator: string };
 * }
 *
 * class Item extends TypedEventEmitter<ItemEvents> {
 *   finish() {
 *     this.emit("playedToEnd", { locator: "https://cdn.example.com/a.m3u8" });
 *   }
 * }
 *
 * const unsub = new Item().on("playedToEnd", ({ locator }) => console.log(locator));
 * unsub();
 * ```
 */
export class TypedEventEmitter<Events extends object> {
  private listeners: ListenerTable<Events> = {};

  /**
   * Subscribe to an event.
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    let set = this.listeners[event];
    if (!set) {
      set = new Set<Listener<Events[K]>>();
      this.listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  /**
   * Subscribe for the next emission only.
   */
  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const onceListener = (data: Events[K]) => {
      this.off(event, onceListener);
      listener(data);
    };
    return this.on(event, onceListener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    this.listeners[event]?.delete(listener);
  }

  protected emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    // Snapshot so a listener may unsubscribe itself mid-dispatch
    for (const listener of [...set]) {
      try {
        listener(data);
      } catch (e) {
        console.error(`[EventEmitter] Error in ${String(event)} listener:`, e);
      }
    }
  }

  removeAllListeners(): void {
    this.listeners = {};
  }

  hasListeners<K extends keyof Events>(event: K): boolean {
    return (this.listeners[event]?.size ?? 0) > 0;
  }
}

export default TypedEventEmitter;
