// ─── Persisted Settings ─────────────────────────────────────────────────────
// User preferences kept across sessions as one JSON value. Anything missing
// or malformed falls back to the default for that field.

import {
  DEFAULT_COMPRESSIONS,
  isCov3dCompression,
  isShCompression,
  logWarn,
  describeError,
  type Compressions,
  type HitMethod,
  type SelectionMethod,
} from "@splat-studio/core";

export const SETTINGS_KEY = "splat-studio.settings";

export interface Settings {
  compressions: Compressions;
  hitMethod: HitMethod;
  selectionMethod: SelectionMethod;
}

/** The subset of the Web Storage API used here. */
export interface SettingsStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export function defaultSettings(): Settings {
  return {
    compressions: { ...DEFAULT_COMPRESSIONS },
    hitMethod: "most-alpha",
    selectionMethod: "rect",
  };
}

export function loadSettings(storage: SettingsStorage): Settings {
  const defaults = defaultSettings();

  let raw: string | null;
  try {
    raw = storage.getItem(SETTINGS_KEY);
  } catch (err) {
    logWarn("settings", `read failed: ${describeError(err)}`);
    return defaults;
  }
  if (raw === null) return defaults;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    logWarn("settings", `malformed settings, using defaults: ${describeError(err)}`);
    return defaults;
  }
  if (!isRecord(parsed)) {
    logWarn("settings", "settings are not an object, using defaults");
    return defaults;
  }

  const compressions: Record<string, unknown> = isRecord(parsed.compressions)
    ? parsed.compressions
    : {};
  const settings: Settings = {
    compressions: {
      sh: isShCompression(compressions.sh) ? compressions.sh : defaults.compressions.sh,
      cov3d: isCov3dCompression(compressions.cov3d)
        ? compressions.cov3d
        : defaults.compressions.cov3d,
    },
    hitMethod:
      parsed.hitMethod === "most-alpha" || parsed.hitMethod === "closest"
        ? parsed.hitMethod
        : defaults.hitMethod,
    selectionMethod:
      parsed.selectionMethod === "rect" || parsed.selectionMethod === "brush"
        ? parsed.selectionMethod
        : defaults.selectionMethod,
  };

  if (JSON.stringify(settings) !== JSON.stringify(normalizeOrder(parsed))) {
    logWarn("settings", "some settings were invalid and have been reset");
  }
  return settings;
}

export function saveSettings(storage: SettingsStorage, settings: Settings): boolean {
  try {
    storage.setItem(SETTINGS_KEY, JSON.stringify(settings));
    return true;
  } catch (err) {
    logWarn("settings", `write failed: ${describeError(err)}`);
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Same key order as Settings, so a valid stored value compares equal.
function normalizeOrder(value: Record<string, unknown>): unknown {
  const compressions: Record<string, unknown> = isRecord(value.compressions)
    ? value.compressions
    : {};
  return {
    compressions: { sh: compressions.sh, cov3d: compressions.cov3d },
    hitMethod: value.hitMethod,
    selectionMethod: value.selectionMethod,
  };
}
