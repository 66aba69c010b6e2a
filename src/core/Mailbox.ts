/**
 * Mailbox - the single serialized entry point for callback-origin mutations
 *
 * Fetch and decode completions arrive from promise callbacks in any order.
 * Instead of touching player state directly they post a message here; the
 * mailbox hands messages to one handler, one at a time, in arrival order. A
 * message posted while another is being handled waits its turn rather than
 * running re-entrantly.
 */

export type MessageHandler<M> = (message: M) => void;

export class Mailbox<M extends { type: string }> {
  private queue: M[] = [];
  private draining = false;
  private closed = false;
  private handler: MessageHandler<M>;
  private debug: boolean;

  constructor(handler: MessageHandler<M>, options: { debug?: boolean } = {}) {
    this.handler = handler;
    this.debug = options.debug ?? false;
  }

  post(message: M): void {
    if (this.closed) {
      this.log(`Dropped ${message.type} after close`);
      return;
    }
    this.queue.push(message);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        this.dispatch(next);
        next = this.closed ? undefined : this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  /**
   * Stop accepting messages and drop anything queued.
   */
  close(): void {
    this.closed = true;
    this.queue = [];
  }

  get pending(): number {
    return this.queue.length;
  }

  private dispatch(message: M): void {
    try {
      this.handler(message);
    } catch (e) {
      console.error(`[Mailbox] Error handling ${message.type}:`, e);
    }
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[Mailbox] ${message}`);
    }
  }
}

export default Mailbox;
