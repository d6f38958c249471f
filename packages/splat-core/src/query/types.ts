import type { Vector2, Vector3 } from "three";
import type { Channel } from "../channel";
import type { Deferred } from "../deferred";

export type HitMethod = "most-alpha" | "closest";

export type SelectionMethod = "rect" | "brush";
export type SelectionTool = "rect" | "brush";
export type SelectionOp = "set" | "add" | "remove";

/**
 * What the selection tool does this tick. `null` on a Query means the
 * pointer is up and only the cursor moves.
 */
export type QuerySelectionAction =
  | { kind: "start"; tool: SelectionTool }
  | { kind: "continue" }
  | { kind: "end" };

/** The interactive probe for one frame. */
export type Query =
  | { kind: "none" }
  | {
      kind: "locate-hit";
      /** Viewport-relative pixel */
      pixel: Vector2;
      method: HitMethod;
      /** Receives the located world position */
      channel: Channel<Vector3>;
    }
  | {
      kind: "selection";
      action: QuerySelectionAction | null;
      op: SelectionOp;
      immediate: boolean;
      brushRadius: number;
      /** Viewport-relative cursor */
      pos: Vector2;
    };

/** Retrieval of a GPU readback triggered by an earlier Query. */
export type QueryResult =
  | { kind: "downloading"; receiver: Deferred<QueryResult | null> }
  | { kind: "locate-hit-ready" };

/** Plain descriptor handed to the GPU query pipeline. */
export type QueryDescriptor =
  | { type: "none" }
  | { type: "hit"; coords: [number, number] }
  | {
      type: "rect";
      op: SelectionOp;
      min: [number, number];
      max: [number, number];
      commit: boolean;
    }
  | {
      type: "brush";
      op: SelectionOp;
      radius: number;
      from: [number, number];
      to: [number, number];
      commit: boolean;
    };

/** Where the viewer draws the selection cursor, viewport-relative. */
export interface QueryCursor {
  pos: [number, number];
  /** Brush outline radius, or null for the rectangle crosshair */
  radius: number | null;
}

export const NONE_QUERY: Query = { kind: "none" };

export function isSelectionInProgress(query: Query): boolean {
  return (
    query.kind === "selection" &&
    (query.action?.kind === "start" || query.action?.kind === "continue")
  );
}
