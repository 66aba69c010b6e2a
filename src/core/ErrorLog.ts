import type { ErrorLogEvent } from "../types";

/**
 * Append-only, time-ordered failure record for one item.
 *
 * Timestamps never go backwards: if the wall clock steps back between two
 * appends, the later event reuses the previous timestamp.
 */
export class ErrorLog {
  private events: ErrorLogEvent[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  append(message: string): ErrorLogEvent {
    const previous = this.last();
    const stamp = this.now();
    const event: ErrorLogEvent = Object.freeze({
      timestamp: previous && stamp < previous.timestamp ? previous.timestamp : stamp,
      message,
    });
    this.events.push(event);
    return event;
  }

  all(): readonly ErrorLogEvent[] {
    return [...this.events];
  }

  last(): ErrorLogEvent | undefined {
    return this.events[this.events.length - 1];
  }

  get size(): number {
    return this.events.length;
  }
}

export default ErrorLog;
