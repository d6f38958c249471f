// ─── Scene Input ────────────────────────────────────────────────────────────
// Turns one frame of pointer / keyboard input into the tick's Query. The
// previous tick's Query and modifier snapshot are the only history kept.

import { Vector2 } from "three";
import {
  NONE_QUERY,
  isSelectionInProgress,
  type Query,
  type QuerySelectionAction,
  type SelectionOp,
} from "@splat-studio/core";
import type { SceneConfig } from "./config";
import type { EditorStore } from "./store";

export interface Modifiers {
  shift: boolean;
  /** Cmd on macOS, Ctrl elsewhere */
  command: boolean;
}

export interface PointerInput {
  /** Cursor position, or null when the pointer is outside the window */
  hover: Vector2 | null;
  /** Is down (includes the frame it went down) */
  down: boolean;
  /** Went up this frame */
  released: boolean;
  clicked: boolean;
}

export interface ViewportRect {
  min: Vector2;
  max: Vector2;
}

export interface FrameInput {
  pointer: PointerInput;
  modifiers: Modifiers;
  scrollDelta: number;
  viewport: ViewportRect;
}

const NO_MODIFIERS: Modifiers = { shift: false, command: false };

export function desiredOperation(modifiers: Modifiers): SelectionOp {
  if (modifiers.shift && !modifiers.command) return "add";
  if (modifiers.command && !modifiers.shift) return "remove";
  return "set";
}

/** Viewport-relative position, clamped to the viewport's edges. */
function clampToViewport(viewport: ViewportRect, pos: Vector2): Vector2 {
  return pos.clone().clamp(viewport.min, viewport.max).sub(viewport.min);
}

function inViewport(viewport: ViewportRect, pos: Vector2): boolean {
  return (
    pos.x >= viewport.min.x &&
    pos.y >= viewport.min.y &&
    pos.x <= viewport.max.x &&
    pos.y <= viewport.max.y
  );
}

export class SceneInput {
  private prevModifiers: Modifiers = NO_MODIFIERS;

  constructor(
    private readonly store: EditorStore,
    private readonly config: SceneConfig,
  ) {}

  handle(input: FrameInput, prev: Query): Query {
    const modifiersChanged =
      input.modifiers.shift !== this.prevModifiers.shift ||
      input.modifiers.command !== this.prevModifiers.command;
    this.prevModifiers = { ...input.modifiers };

    const state = this.store.getState();
    const action = state.action;
    if (!action) return NONE_QUERY;

    if (action.kind === "locate-hit") {
      const located = action.channel.tryRecv();
      if (located) {
        state.setMeasurementHit(action.hitPairIndex, action.hitIndex, located);
        state.clearAction();
        state.commands.send({
          kind: "update-measurement-hit",
          hitPairIndex: action.hitPairIndex,
        });
        return NONE_QUERY;
      }

      const hover = input.pointer.hover;
      if (!input.pointer.clicked || !hover || !inViewport(input.viewport, hover)) {
        return NONE_QUERY;
      }
      return {
        kind: "locate-hit",
        pixel: hover.clone().sub(input.viewport.min),
        method: state.measurement.hitMethod,
        channel: action.channel,
      };
    }

    // Edge-triggered so a held modifier does not override the operation
    // picked in the UI on every frame.
    if (modifiersChanged) {
      const operation = desiredOperation(input.modifiers);
      if (operation !== state.selection.operation) {
        state.setSelectionOperation(operation);
      }
    }

    const hover = input.pointer.hover;
    if (!hover || !inViewport(input.viewport, hover)) {
      // A stroke dragged out of the viewport follows the pointer along the
      // edge and still ends on release.
      if (prev.kind !== "selection" || !isSelectionInProgress(prev)) return NONE_QUERY;
      const ending = input.pointer.released || !input.pointer.down;
      return this.selectionQuery(
        ending ? { kind: "end" } : { kind: "continue" },
        hover ? clampToViewport(input.viewport, hover) : prev.pos.clone(),
      );
    }

    if (state.selection.method === "brush" && input.scrollDelta !== 0) {
      const radius = Math.min(
        this.config.brushRadiusMax,
        Math.max(
          this.config.brushRadiusMin,
          state.selection.brushRadius + Math.sign(input.scrollDelta),
        ),
      );
      state.setBrushRadius(radius);
    }

    let selectionAction: QuerySelectionAction | null;
    if (input.pointer.released) {
      selectionAction = { kind: "end" };
    } else if (!input.pointer.down) {
      selectionAction = null;
    } else if (isSelectionInProgress(prev)) {
      selectionAction = { kind: "continue" };
    } else {
      selectionAction = { kind: "start", tool: state.selection.method };
    }

    return this.selectionQuery(selectionAction, hover.clone().sub(input.viewport.min));
  }

  private selectionQuery(action: QuerySelectionAction | null, pos: Vector2): Query {
    const selection = this.store.getState().selection;
    return {
      kind: "selection",
      action,
      op: selection.operation,
      immediate: selection.immediate,
      brushRadius: selection.brushRadius,
      pos,
    };
  }
}
