import { describe, it, expect, vi, afterEach } from "vitest";
import { ExportError, MaskParseError } from "./errors";
import { describeError, logError, logInfo, logWarn } from "./logging";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logging", () => {
  it("prefixes the scope and appends defined context values", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    logInfo("export", "saved", { file: "a.ply", bytes: 12, skipped: undefined });
    expect(log).toHaveBeenCalledWith("[export] saved (file=a.ply, bytes=12)");
  });

  it("passes error detail through as a second argument", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const detail = new Error("boom");

    logError("task", "failed", undefined, detail);
    logWarn("task", "slow", {});

    expect(error).toHaveBeenCalledWith("[task] failed", detail);
    expect(warn).toHaveBeenCalledWith("[task] slow");
  });
});

describe("describeError", () => {
  it("uses the message of errors and stringifies anything else", () => {
    expect(describeError(new ExportError("no space"))).toBe("no space");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });

  it("keeps the offset of parse errors", () => {
    const err = new MaskParseError("unexpected character '$'", 2);
    expect(err.offset).toBe(2);
    expect(err.name).toBe("MaskParseError");
  });
});
