// ─── Channel ────────────────────────────────────────────────────────────────
// Multi-item, non-blocking queue between background tasks (or UI handlers)
// and the frame loop. Unlike Deferred it may carry any number of values.

import { ChannelClosedError } from "./errors";
import { logWarn } from "./logging";

export class Channel<T> {
  private queue: T[] = [];
  private closed = false;

  constructor(readonly label = "channel") {}

  /** Enqueue a value. A send after close is logged and dropped. */
  send(value: T): boolean {
    if (this.closed) {
      logWarn(
        "channel",
        "send after receiver closed, dropping",
        { label: this.label },
        new ChannelClosedError(this.label),
      );
      return false;
    }
    this.queue.push(value);
    return true;
  }

  /** Dequeue the oldest value, or undefined when empty. */
  tryRecv(): T | undefined {
    return this.queue.shift();
  }

  /** Take every queued value in order. */
  drain(): T[] {
    const values = this.queue;
    this.queue = [];
    return values;
  }

  close(): void {
    this.closed = true;
    this.queue = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }
}
