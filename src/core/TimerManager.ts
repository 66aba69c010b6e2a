/**
 * TimerManager - labelled timeouts with bulk cleanup
 *
 * The controller paces segment playback with a single "advance" timeout that
 * is rescheduled, cancelled on pause/stop and dropped on destroy. Keying
 * timers by label makes rescheduling replace the pending timer instead of
 * stacking a second one.
 *
 * ```ts
 * const timers = new TimerManager();
 * timers.schedule("advance", () => next(), 4000);
 * timers.schedule("advance", () => next(), 0); // replaces the 4s timer
 * timers.cancelAll();
 * ```
 */

export class TimerManager {
  private timers = new Map<string, ReturnType<typeof setTimeout>>();
  private debug: boolean;

  constructor(options?: { debug?: boolean }) {
    this.debug = options?.debug ?? false;
  }

  /**
   * Schedule callback after delayMs, replacing any pending timer with the
   * same label.
   */
  schedule(label: string, callback: () => void, delayMs: number): void {
    this.cancel(label);

    const delay = Math.max(0, delayMs);
    const id = setTimeout(() => {
      // Only clear our own entry; the callback may have rescheduled the label
      if (this.timers.get(label) === id) {
        this.timers.delete(label);
      }
      try {
        callback();
      } catch (e) {
        console.error(`[TimerManager] Callback error (${label}):`, e);
      }
    }, delay);

    this.timers.set(label, id);

    if (this.debug) {
      console.debug(`[TimerManager] Scheduled ${label} in ${delay}ms`);
    }
  }

  cancel(label: string): boolean {
    const id = this.timers.get(label);
    if (id === undefined) return false;

    clearTimeout(id);
    this.timers.delete(label);

    if (this.debug) {
      console.debug(`[TimerManager] Cancelled ${label}`);
    }
    return true;
  }

  cancelAll(): void {
    for (const id of this.timers.values()) {
      clearTimeout(id);
    }
    this.timers.clear();
  }
}

export default TimerManager;
