// ─── Logging ────────────────────────────────────────────────────────────────
// Console logging with a bracketed scope prefix, e.g.
//   [export] download failed (model=garden.ply, buffer=mask)

export type LogContext = Record<string, string | number | boolean | undefined>;

function formatContext(context?: LogContext): string {
  if (!context) return "";

  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    parts.push(`${key}=${value}`);
  }

  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

function withScope(scope: string, message: string, context?: LogContext) {
  return `[${scope}] ${message}${formatContext(context)}`;
}

export function logInfo(
  scope: string,
  message: string,
  context?: LogContext,
): void {
  console.log(withScope(scope, message, context));
}

export function logWarn(
  scope: string,
  message: string,
  context?: LogContext,
  detail?: unknown,
): void {
  const text = withScope(scope, message, context);
  if (detail !== undefined) {
    console.warn(text, detail);
    return;
  }
  console.warn(text);
}

export function logError(
  scope: string,
  message: string,
  context?: LogContext,
  detail?: unknown,
): void {
  const text = withScope(scope, message, context);
  if (detail !== undefined) {
    console.error(text, detail);
    return;
  }
  console.error(text);
}

/** Render an unknown thrown value as a single line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
