import { DEFAULT_ALPHA_THRESHOLD } from "@splat-studio/core";

// ─── Scene Configuration ────────────────────────────────────────────────────

export interface SceneConfig {
  /** Window below the strongest contribution for "most-alpha" hits */
  alphaThreshold: number;
  brushRadiusMin: number;
  brushRadiusMax: number;
  defaultBrushRadius: number;
}

export const DEFAULT_SCENE_CONFIG: Readonly<SceneConfig> = Object.freeze({
  alphaThreshold: DEFAULT_ALPHA_THRESHOLD,
  brushRadiusMin: 1,
  brushRadiusMax: 200,
  defaultBrushRadius: 40,
});

export function resolveSceneConfig(
  overrides: Partial<SceneConfig> = {},
): SceneConfig {
  const config: SceneConfig = { ...DEFAULT_SCENE_CONFIG, ...overrides };

  if (
    !Number.isFinite(config.alphaThreshold) ||
    config.alphaThreshold < 0 ||
    config.alphaThreshold > 1
  ) {
    throw new RangeError(
      `alphaThreshold must be within [0, 1], got ${config.alphaThreshold}`,
    );
  }
  if (
    !Number.isFinite(config.brushRadiusMin) ||
    !Number.isFinite(config.brushRadiusMax) ||
    config.brushRadiusMin <= 0 ||
    config.brushRadiusMin > config.brushRadiusMax
  ) {
    throw new RangeError(
      `Invalid brush radius bounds [${config.brushRadiusMin}, ${config.brushRadiusMax}]`,
    );
  }
  if (
    config.defaultBrushRadius < config.brushRadiusMin ||
    config.defaultBrushRadius > config.brushRadiusMax
  ) {
    throw new RangeError(
      `defaultBrushRadius ${config.defaultBrushRadius} is outside [${config.brushRadiusMin}, ${config.brushRadiusMax}]`,
    );
  }

  return config;
}
