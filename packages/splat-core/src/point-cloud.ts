/** Decoded point data of one model. */
export interface PointCloud {
  count: number;
  /** xyz per point */
  positions: Float32Array;
  /** rgba per point, 0-255 */
  colors: Uint8Array;
}

export function createPointCloud(
  positions: Float32Array,
  colors?: Uint8Array,
): PointCloud {
  const count = Math.floor(positions.length / 3);
  if (colors && colors.length < count * 4) {
    throw new Error(
      `Expected ${count * 4} color bytes for ${count} points, got ${colors.length}`,
    );
  }
  return {
    count,
    positions,
    colors: colors ?? new Uint8Array(count * 4).fill(255),
  };
}
