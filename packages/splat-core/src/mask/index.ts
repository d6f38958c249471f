export { parseMaskOp } from "./parser";
export {
  validateShapes,
  toEvaluationTree,
  collectShapeIndices,
  formatMaskOp,
} from "./tree";
export {
  createMaskShape,
  shapeRotation,
  toMaskShapePod,
  containsPoint,
  DEFAULT_SHAPE_COLOR,
} from "./shape";
export { evaluateMaskTree, evaluateMaskBits, isMaskBitSet } from "./evaluate";
export {
  shapeRef,
  union,
  intersection,
  difference,
  symmetricDifference,
  complement,
} from "./types";
export type { MaskShape } from "./shape";
export type {
  MaskOp,
  MaskOpTree,
  MaskExpr,
  MaskBinary,
  MaskComplement,
  MaskShapeRef,
  MaskShapeLeaf,
  MaskShapeKind,
  MaskShapePod,
  BinaryMaskType,
  Vec3Tuple,
  Vec4Tuple,
} from "./types";
