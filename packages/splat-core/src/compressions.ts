// ─── Point Layout Compressions ──────────────────────────────────────────────
// Two independent choices select the GPU layout of a point. Each choice maps
// to a byte size through a small table; the layout is resolved once when a
// model is loaded.

export type ShCompression = "single" | "half" | "norm8" | "remove";
export type Cov3dCompression = "single" | "half";

export interface Compressions {
  sh: ShCompression;
  cov3d: Cov3dCompression;
}

export const DEFAULT_COMPRESSIONS: Compressions = { sh: "norm8", cov3d: "half" };

/** 15 coefficients × RGB, padded to 4-byte alignment. */
const SH_BYTES: Record<ShCompression, number> = {
  single: 180,
  half: 92,
  norm8: 48,
  remove: 0,
};

/** Upper triangle of the 3×3 covariance. */
const COV3D_BYTES: Record<Cov3dCompression, number> = {
  single: 24,
  half: 12,
};

/** Position (3 × f32) plus packed RGBA. */
const BASE_BYTES = 16;

export interface PointLayout {
  compressions: Compressions;
  shBytes: number;
  cov3dBytes: number;
  stride: number;
}

export function pointLayout(compressions: Compressions): PointLayout {
  const shBytes = SH_BYTES[compressions.sh];
  const cov3dBytes = COV3D_BYTES[compressions.cov3d];
  return {
    compressions: { ...compressions },
    shBytes,
    cov3dBytes,
    stride: BASE_BYTES + shBytes + cov3dBytes,
  };
}

export function compressedSize(compressions: Compressions, pointCount: number): number {
  return pointLayout(compressions).stride * pointCount;
}

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"];

/** e.g. 1536 → "1.50 KB" */
export function humanReadableSize(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return `${size.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

export function isShCompression(value: unknown): value is ShCompression {
  return typeof value === "string" && Object.hasOwn(SH_BYTES, value);
}

export function isCov3dCompression(value: unknown): value is Cov3dCompression {
  return typeof value === "string" && Object.hasOwn(COV3D_BYTES, value);
}
