// ─── Mask Expression Types ──────────────────────────────────────────────────
// The same boolean-algebra skeleton is used twice: once with positional
// shape indices (the parsed AST) and once with the shape pods themselves
// (the tree handed to the mask evaluator).

export type BinaryMaskType =
  | "union"
  | "intersection"
  | "difference"
  | "symmetric-difference";

export interface MaskBinary<Leaf> {
  type: BinaryMaskType;
  left: MaskExpr<Leaf>;
  right: MaskExpr<Leaf>;
}

export interface MaskComplement<Leaf> {
  type: "complement";
  operand: MaskExpr<Leaf>;
}

export type MaskExpr<Leaf> = MaskBinary<Leaf> | MaskComplement<Leaf> | Leaf;

// --- Shapes ---

export type MaskShapeKind = "box" | "ellipsoid";

export type Vec3Tuple = [number, number, number];
export type Vec4Tuple = [number, number, number, number];

/** GPU-facing shape record. Rotation is a quaternion (x, y, z, w). */
export interface MaskShapePod {
  kind: MaskShapeKind;
  color: Vec4Tuple;
  pos: Vec3Tuple;
  rotation: Vec4Tuple;
  scale: Vec3Tuple;
}

// --- AST ---

export interface MaskShapeRef {
  type: "shape";
  index: number;
}

/** Parsed mask expression; leaves are positions in the shape list. */
export type MaskOp = MaskExpr<MaskShapeRef>;

// --- Evaluation tree ---

export interface MaskShapeLeaf {
  type: "shape";
  shape: MaskShapePod;
}

/** Evaluation tree; leaves reference entries of the shape pod array. */
export type MaskOpTree = MaskExpr<MaskShapeLeaf>;

// --- Constructors ---

export function shapeRef(index: number): MaskOp {
  return { type: "shape", index };
}

export function union(left: MaskOp, right: MaskOp): MaskOp {
  return { type: "union", left, right };
}

export function intersection(left: MaskOp, right: MaskOp): MaskOp {
  return { type: "intersection", left, right };
}

export function difference(left: MaskOp, right: MaskOp): MaskOp {
  return { type: "difference", left, right };
}

export function symmetricDifference(left: MaskOp, right: MaskOp): MaskOp {
  return { type: "symmetric-difference", left, right };
}

export function complement(operand: MaskOp): MaskOp {
  return { type: "complement", operand };
}
