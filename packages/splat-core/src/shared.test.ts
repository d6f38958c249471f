import { describe, it, expect, vi, afterEach } from "vitest";
import { SharedHandle } from "./shared";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("SharedHandle", () => {
  it("disposes with the last reference", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dispose = vi.fn();
    const handle = SharedHandle.create({ id: 1 }, { label: "viewer", dispose });
    const other = handle.clone();
    expect(handle.refCount).toBe(2);

    handle.release();
    expect(dispose).not.toHaveBeenCalled();
    handle.release();
    expect(other.refCount).toBe(1);

    other.release();
    expect(dispose).toHaveBeenCalledWith({ id: 1 });
  });

  it("runs a synchronous section and returns its result", () => {
    const handle = SharedHandle.create([1, 2, 3]);
    expect(handle.use((values) => values.length)).toBe(3);
  });

  it("refuses re-entrant use", () => {
    const handle = SharedHandle.create(0, { label: "device" });
    const other = handle.clone();

    expect(() => handle.use(() => other.use(() => 1))).toThrow("device is already in use");
    // The section was left; the handle is usable again
    expect(other.use(() => 2)).toBe(2);
  });

  it("refuses use after release", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const handle = SharedHandle.create(0, { label: "device" });
    handle.release();
    expect(() => handle.use(() => 1)).toThrow("device handle used after release");
    expect(() => handle.clone()).toThrow("device handle used after release");
  });
});
