import type { MaskOp, MaskOpTree, MaskShapePod } from "./types";

/**
 * Check every shape reference against the shape count. Walks depth-first,
 * left before right, and returns the first out-of-range index, or null when
 * all references are valid.
 */
export function validateShapes(op: MaskOp, shapeCount: number): number | null {
  switch (op.type) {
    case "shape":
      return op.index >= shapeCount ? op.index : null;
    case "complement":
      return validateShapes(op.operand, shapeCount);
    default:
      return (
        validateShapes(op.left, shapeCount) ??
        validateShapes(op.right, shapeCount)
      );
  }
}

/**
 * Restructure the AST into the evaluator's tree. Leaves point at the pods in
 * `shapes` (same objects, nothing copied). Indices must have been validated.
 */
export function toEvaluationTree(
  op: MaskOp,
  shapes: readonly MaskShapePod[],
): MaskOpTree {
  switch (op.type) {
    case "shape": {
      const shape = shapes[op.index];
      if (!shape) {
        throw new RangeError(`Invalid shape index: ${op.index}`);
      }
      return { type: "shape", shape };
    }
    case "complement":
      return { type: "complement", operand: toEvaluationTree(op.operand, shapes) };
    default:
      return {
        type: op.type,
        left: toEvaluationTree(op.left, shapes),
        right: toEvaluationTree(op.right, shapes),
      };
  }
}

/** All shape indices referenced by the expression, in visiting order. */
export function collectShapeIndices(op: MaskOp, out: number[] = []): number[] {
  switch (op.type) {
    case "shape":
      out.push(op.index);
      break;
    case "complement":
      collectShapeIndices(op.operand, out);
      break;
    default:
      collectShapeIndices(op.left, out);
      collectShapeIndices(op.right, out);
  }
  return out;
}

// ─── Formatting ─────────────────────────────────────────────────────────────

const OPERATOR = {
  union: "|",
  intersection: "&",
  difference: "-",
  "symmetric-difference": "^",
} as const;

const PRECEDENCE: Record<MaskOp["type"], number> = {
  union: 1,
  intersection: 2,
  difference: 3,
  "symmetric-difference": 4,
  complement: 5,
  shape: 6,
};

/** Render an expression as text that parses back to the same tree. */
export function formatMaskOp(op: MaskOp): string {
  switch (op.type) {
    case "shape":
      return String(op.index);
    case "complement":
      return `!${wrap(op.operand, PRECEDENCE.complement)}`;
    default: {
      const prec = PRECEDENCE[op.type];
      // Left-associative: a right operand of equal precedence needs parens
      return `${wrap(op.left, prec)} ${OPERATOR[op.type]} ${wrap(op.right, prec + 1)}`;
    }
  }
}

function wrap(op: MaskOp, minPrecedence: number): string {
  const text = formatMaskOp(op);
  return PRECEDENCE[op.type] < minPrecedence ? `(${text})` : text;
}
