// ─── Deferred ───────────────────────────────────────────────────────────────
// Single-assignment result cell. A background task holds the producer and
// sends exactly once; the frame loop holds the consumer and polls it with
// tryAdvance() once per tick. There is no cancellation: closing the consumer
// only makes a late send a logged no-op.

import { ChannelClosedError } from "./errors";
import { describeError, logWarn } from "./logging";
import { execTask } from "./task";

export type DeferredState<T, E> =
  | { kind: "pending"; error: E | null }
  | { kind: "ready"; value: T };

interface Slot<T, E> {
  label: string;
  // Boxed so that `undefined` and `null` are valid payloads
  delivered: { value: T } | null;
  error: E | null;
  sent: boolean;
  closed: boolean;
}

/** Sending half of a Deferred. Move it into the background task. */
export class DeferredProducer<T, E = string> {
  constructor(private readonly slot: Slot<T, E>) {}

  /**
   * Deliver the value. Returns false (and logs) when a value was already
   * sent or the consumer is closed.
   */
  send(value: T): boolean {
    if (this.slot.sent) {
      logWarn("deferred", "value already sent, dropping", {
        label: this.slot.label,
      });
      return false;
    }
    this.slot.sent = true;

    if (this.slot.closed) {
      logWarn(
        "deferred",
        "result no longer wanted",
        { label: this.slot.label },
        new ChannelClosedError(this.slot.label),
      );
      return false;
    }

    this.slot.delivered = { value };
    return true;
  }

  /** Record a failure. The consumer stays pending and exposes the error. */
  fail(error: E): void {
    if (this.slot.sent || this.slot.closed) return;
    this.slot.error = error;
  }

  get isClosed(): boolean {
    return this.slot.closed;
  }
}

export class Deferred<T, E = string> {
  private state: DeferredState<T, E>;

  private constructor(
    private readonly slot: Slot<T, E>,
    error: E | null,
  ) {
    this.state = { kind: "pending", error };
  }

  static pending<T, E = string>(
    label = "deferred",
  ): { producer: DeferredProducer<T, E>; consumer: Deferred<T, E> } {
    const slot: Slot<T, E> = {
      label,
      delivered: null,
      error: null,
      sent: false,
      closed: false,
    };
    return { producer: new DeferredProducer(slot), consumer: new Deferred(slot, null) };
  }

  /** A pending cell carrying the error of a previous attempt. */
  static failed<T, E = string>(error: E, label = "deferred"): Deferred<T, E> {
    const { consumer } = Deferred.pending<T, E>(label);
    consumer.slot.error = error;
    consumer.state = { kind: "pending", error };
    return consumer;
  }

  static ready<T, E = string>(value: T, label = "deferred"): Deferred<T, E> {
    const { consumer } = Deferred.pending<T, E>(label);
    consumer.state = { kind: "ready", value };
    return consumer;
  }

  /**
   * Run `task` in the background and deliver its result. A rejection is
   * recorded with `fail` as its message.
   */
  static spawn<T>(task: () => Promise<T>, label = "deferred"): Deferred<T, string> {
    const { producer, consumer } = Deferred.pending<T, string>(label);
    execTask(async () => {
      try {
        producer.send(await task());
      } catch (err) {
        logWarn("deferred", `task failed: ${describeError(err)}`, { label });
        producer.fail(describeError(err));
      }
    }, label);
    return consumer;
  }

  /**
   * Non-blocking poll. Transitions to ready when a value has arrived and
   * returns it; returns undefined while pending. Idempotent once ready.
   */
  tryAdvance(): T | undefined {
    if (this.state.kind === "ready") return this.state.value;

    const delivered = this.slot.delivered;
    if (delivered) {
      this.slot.delivered = null;
      this.state = { kind: "ready", value: delivered.value };
      return delivered.value;
    }

    if (this.slot.error !== this.state.error) {
      this.state = { kind: "pending", error: this.slot.error };
    }
    return undefined;
  }

  /** Stop wanting the result. The background task keeps running. */
  close(): void {
    this.slot.closed = true;
  }

  get current(): DeferredState<T, E> {
    return this.state;
  }

  get isReady(): boolean {
    return this.state.kind === "ready";
  }

  get error(): E | null {
    return this.state.kind === "pending" ? this.state.error : null;
  }
}
