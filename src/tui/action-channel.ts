import type { Action } from './action.js';

export interface ActionSender {
  send(action: Action): void;
}

/**
 * Unbounded FIFO between every component (producers) and the app loop (the only consumer).
 *
 * Sending after close is ignored; it only happens while the app shuts down.
 */
export class ActionChannel implements ActionSender {
  private readonly queue: Action[] = [];
  private closed = false;

  send(action: Action): void {
    if (this.closed) return;
    this.queue.push(action);
  }

  /** Removes and returns everything queued right now; later sends wait for the next call. */
  drain(): Action[] {
    return this.queue.splice(0, this.queue.length);
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
    this.queue.length = 0;
  }
}
