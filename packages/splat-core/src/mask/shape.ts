import { Euler, MathUtils, Quaternion, Vector3 } from "three";
import type { MaskShapeKind, MaskShapePod, Vec4Tuple } from "./types";

/** Editable mask shape. Rotation is kept as Euler degrees for the editor. */
export interface MaskShape {
  kind: MaskShapeKind;
  color: Vec4Tuple;
  pos: Vector3;
  rot: Vector3;
  scale: Vector3;
  visible: boolean;
}

export const DEFAULT_SHAPE_COLOR: Vec4Tuple = [1, 1, 1, 0.5];

export function createMaskShape(kind: MaskShapeKind = "box"): MaskShape {
  return {
    kind,
    color: [...DEFAULT_SHAPE_COLOR],
    pos: new Vector3(0, 0, 0),
    rot: new Vector3(0, 0, 0),
    scale: new Vector3(1, 1, 1),
    visible: true,
  };
}

/** Quaternion for the shape's Euler angles (degrees, ZYX order). */
export function shapeRotation(shape: MaskShape): Quaternion {
  const euler = new Euler(
    MathUtils.degToRad(shape.rot.x),
    MathUtils.degToRad(shape.rot.y),
    MathUtils.degToRad(shape.rot.z),
    "ZYX",
  );
  return new Quaternion().setFromEuler(euler);
}

export function toMaskShapePod(shape: MaskShape): MaskShapePod {
  const q = shapeRotation(shape);
  return {
    kind: shape.kind,
    color: [...shape.color],
    pos: [shape.pos.x, shape.pos.y, shape.pos.z],
    rotation: [q.x, q.y, q.z, q.w],
    scale: [shape.scale.x, shape.scale.y, shape.scale.z],
  };
}

/**
 * Whether a world-space point lies inside the shape. Box shapes span
 * [-0.5, 0.5] on each local axis before scaling; ellipsoids have radius 0.5.
 */
export function containsPoint(pod: MaskShapePod, point: Vector3): boolean {
  const inverse = new Quaternion(...pod.rotation).invert();
  const local = point
    .clone()
    .sub(new Vector3(...pod.pos))
    .applyQuaternion(inverse)
    .divide(new Vector3(...pod.scale));

  if (pod.kind === "box") {
    return (
      Math.abs(local.x) <= 0.5 &&
      Math.abs(local.y) <= 0.5 &&
      Math.abs(local.z) <= 0.5
    );
  }
  return local.lengthSq() <= 0.25;
}
