// ─── Shared Handle ──────────────────────────────────────────────────────────
// Reference-counted handle to a resource used from both the frame loop and
// background download tasks (the viewer and its device/queue). Access goes
// through use(), a synchronous critical section; holding the value across an
// await is not possible, so two writers never interleave.

import { logInfo } from "./logging";

interface Inner<T> {
  value: T;
  refs: number;
  busy: boolean;
  dispose?: (value: T) => void;
  label: string;
}

export class SharedHandle<T> {
  private released = false;

  private constructor(private readonly inner: Inner<T>) {}

  static create<T>(
    value: T,
    options: { label?: string; dispose?: (value: T) => void } = {},
  ): SharedHandle<T> {
    return new SharedHandle({
      value,
      refs: 1,
      busy: false,
      dispose: options.dispose,
      label: options.label ?? "shared",
    });
  }

  /** Another reference to the same resource. */
  clone(): SharedHandle<T> {
    this.assertLive();
    this.inner.refs += 1;
    return new SharedHandle(this.inner);
  }

  /** Drop this reference. The resource is disposed with the last one. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.inner.refs -= 1;
    if (this.inner.refs === 0) {
      logInfo("shared", "last reference released", { label: this.inner.label });
      this.inner.dispose?.(this.inner.value);
    }
  }

  use<R>(fn: (value: T) => R): R {
    this.assertLive();
    if (this.inner.busy) {
      throw new Error(`${this.inner.label} is already in use`);
    }
    this.inner.busy = true;
    try {
      return fn(this.inner.value);
    } finally {
      this.inner.busy = false;
    }
  }

  get refCount(): number {
    return this.inner.refs;
  }

  private assertLive(): void {
    if (this.released) {
      throw new Error(`${this.inner.label} handle used after release`);
    }
  }
}
