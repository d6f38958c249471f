import { Vector3, type Matrix4 } from "three";
import { containsPoint } from "./shape";
import type { MaskOpTree } from "./types";

/** Set membership of a single point. */
export function evaluateMaskTree(tree: MaskOpTree, point: Vector3): boolean {
  switch (tree.type) {
    case "shape":
      return containsPoint(tree.shape, point);
    case "complement":
      return !evaluateMaskTree(tree.operand, point);
    case "union":
      return evaluateMaskTree(tree.left, point) || evaluateMaskTree(tree.right, point);
    case "intersection":
      return evaluateMaskTree(tree.left, point) && evaluateMaskTree(tree.right, point);
    case "difference":
      return evaluateMaskTree(tree.left, point) && !evaluateMaskTree(tree.right, point);
    case "symmetric-difference":
      return evaluateMaskTree(tree.left, point) !== evaluateMaskTree(tree.right, point);
  }
}

/**
 * CPU mask evaluation into the mask buffer layout: one bit per point,
 * 32 points per word, bit set = inside. A null tree selects every point.
 * Shapes live in world space; `modelMatrix` places the model's points there.
 */
export function evaluateMaskBits(
  tree: MaskOpTree | null,
  positions: Float32Array,
  modelMatrix?: Matrix4,
): Uint32Array {
  const count = Math.floor(positions.length / 3);
  const words = new Uint32Array(Math.ceil(count / 32));
  const point = new Vector3();

  for (let i = 0; i < count; i++) {
    point.set(positions[i * 3], positions[i * 3 + 1], positions[i * 3 + 2]);
    if (modelMatrix) point.applyMatrix4(modelMatrix);
    if (tree === null || evaluateMaskTree(tree, point)) {
      words[i >>> 5] |= 1 << (i & 31);
    }
  }

  return words;
}

export function isMaskBitSet(words: Uint32Array, index: number): boolean {
  return ((words[index >>> 5] >>> (index & 31)) & 1) === 1;
}
