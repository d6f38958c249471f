import { Vector2 } from "three";
import type { QueryCursor, QueryDescriptor, SelectionOp, SelectionTool } from "./types";

interface Stroke {
  tool: SelectionTool;
  op: SelectionOp;
  start: Vector2;
  prev: Vector2;
  pos: Vector2;
  ended: boolean;
}

/**
 * Turns start / move / end selection gestures into query descriptors.
 *
 * In texture mode (not immediate) the gesture is accumulated and applied
 * once, on the descriptor that follows end(). In immediate mode every
 * descriptor commits.
 */
export class QueryToolset {
  private stroke: Stroke | null = null;
  private useTexture = true;
  private radius = 40;
  private cursorPos: Vector2 | null = null;
  private cursorTool: SelectionTool = "rect";

  setUseTexture(useTexture: boolean): void {
    this.useTexture = useTexture;
  }

  updateBrushRadius(radius: number): void {
    this.radius = radius;
  }

  get brushRadius(): number {
    return this.radius;
  }

  get active(): boolean {
    return this.stroke !== null && !this.stroke.ended;
  }

  /** Pointer up: only the cursor follows the pointer. */
  hover(pos: Vector2, tool: SelectionTool): void {
    this.cursorTool = tool;
    this.moveCursor(pos);
  }

  /** Pointer left the viewport. */
  hideCursor(): void {
    this.cursorPos = null;
  }

  get cursor(): QueryCursor | null {
    const pos = this.cursorPos;
    if (!pos) return null;
    return {
      pos: [pos.x, pos.y],
      radius: this.cursorTool === "brush" ? this.radius : null,
    };
  }

  start(tool: SelectionTool, op: SelectionOp, pos: Vector2): void {
    this.cursorTool = tool;
    this.moveCursor(pos);
    this.stroke = {
      tool,
      op,
      start: pos.clone(),
      prev: pos.clone(),
      pos: pos.clone(),
      ended: false,
    };
  }

  updatePos(pos: Vector2): void {
    this.moveCursor(pos);
    if (!this.stroke || this.stroke.ended) return;
    this.stroke.prev.copy(this.stroke.pos);
    this.stroke.pos.copy(pos);
  }

  /** Modifier keys may change the operation mid-stroke. */
  updateOp(op: SelectionOp): void {
    if (this.stroke && !this.stroke.ended) this.stroke.op = op;
  }

  end(): void {
    if (this.stroke) this.stroke.ended = true;
  }

  /** Drop the stroke without applying it. */
  cancel(): void {
    this.stroke = null;
  }

  private moveCursor(pos: Vector2): void {
    if (this.cursorPos) this.cursorPos.copy(pos);
    else this.cursorPos = pos.clone();
  }

  /** Descriptor for this tick. A finished stroke is reported once. */
  query(): QueryDescriptor {
    const stroke = this.stroke;
    if (!stroke) return { type: "none" };

    const commit = stroke.ended || !this.useTexture;
    if (stroke.ended) this.stroke = null;

    if (stroke.tool === "rect") {
      return {
        type: "rect",
        op: stroke.op,
        min: [
          Math.min(stroke.start.x, stroke.pos.x),
          Math.min(stroke.start.y, stroke.pos.y),
        ],
        max: [
          Math.max(stroke.start.x, stroke.pos.x),
          Math.max(stroke.start.y, stroke.pos.y),
        ],
        commit,
      };
    }

    return {
      type: "brush",
      op: stroke.op,
      radius: this.radius,
      from: [stroke.prev.x, stroke.prev.y],
      to: [stroke.pos.x, stroke.pos.y],
      commit,
    };
  }
}
