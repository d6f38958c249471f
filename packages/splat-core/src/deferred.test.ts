import { describe, it, expect, vi, afterEach } from "vitest";
import { Deferred } from "./deferred";

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Deferred", () => {
  it("stays pending until a value is sent", () => {
    const { consumer } = Deferred.pending<number>("test");

    expect(consumer.tryAdvance()).toBeUndefined();
    expect(consumer.current).toEqual({ kind: "pending", error: null });
    expect(consumer.isReady).toBe(false);
  });

  it("becomes ready on the first poll after a send and stays there", () => {
    const { producer, consumer } = Deferred.pending<{ n: number }>("test");
    const value = { n: 1 };

    expect(producer.send(value)).toBe(true);
    expect(consumer.isReady).toBe(false);

    expect(consumer.tryAdvance()).toBe(value);
    expect(consumer.isReady).toBe(true);
    expect(consumer.tryAdvance()).toBe(value);
    expect(consumer.tryAdvance()).toBe(value);
    expect(consumer.current).toEqual({ kind: "ready", value });
  });

  it("delivers null as a value", () => {
    const { producer, consumer } = Deferred.pending<null>("test");
    producer.send(null);
    expect(consumer.tryAdvance()).toBeNull();
    expect(consumer.isReady).toBe(true);
  });

  it("drops a second send with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { producer, consumer } = Deferred.pending<number>("twice");

    expect(producer.send(1)).toBe(true);
    expect(producer.send(2)).toBe(false);
    expect(consumer.tryAdvance()).toBe(1);
    expect(warn).toHaveBeenCalledWith("[deferred] value already sent, dropping (label=twice)");
  });

  it("logs instead of failing when the consumer is gone", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { producer, consumer } = Deferred.pending<number>("late");

    consumer.close();
    expect(producer.isClosed).toBe(true);
    expect(producer.send(5)).toBe(false);
    expect(consumer.tryAdvance()).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("[deferred] result no longer wanted (label=late)");
  });

  it("exposes a failure while staying pending", () => {
    const { producer, consumer } = Deferred.pending<number>("test");
    producer.fail("disk full");

    expect(consumer.tryAdvance()).toBeUndefined();
    expect(consumer.error).toBe("disk full");
    expect(consumer.current).toEqual({ kind: "pending", error: "disk full" });
  });

  it("builds ready and failed cells directly", () => {
    expect(Deferred.ready(3).tryAdvance()).toBe(3);

    const failed = Deferred.failed<number>("no device");
    expect(failed.tryAdvance()).toBeUndefined();
    expect(failed.error).toBe("no device");
  });

  it("delivers the result of a spawned task", async () => {
    const cell = Deferred.spawn(async () => "done", "spawned");

    expect(cell.tryAdvance()).toBeUndefined();
    await flush();
    expect(cell.tryAdvance()).toBe("done");
  });

  it("records the message of a rejected task", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const cell = Deferred.spawn<number>(async () => {
      throw new Error("download failed");
    }, "spawned");

    await flush();
    expect(cell.tryAdvance()).toBeUndefined();
    expect(cell.error).toBe("download failed");
  });
});
