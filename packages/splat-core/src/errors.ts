// ─── Error Types ────────────────────────────────────────────────────────────
// None of these are fatal. Parse and validation failures end up as an
// editor-visible string; IO and channel failures are logged.

/** Malformed mask expression text. */
export class MaskParseError extends Error {
  /** 0-based character offset into the original input. */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`Failed to parse mask operation: ${message} at offset ${offset}`);
    this.name = "MaskParseError";
    this.offset = offset;
  }
}

/** A background export step (download, serialization, write) failed. */
export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
  }
}

/** The other half of a Deferred or Channel is gone. */
export class ChannelClosedError extends Error {
  constructor(what: string) {
    super(`${what}: receiver is closed`);
    this.name = "ChannelClosedError";
  }
}
