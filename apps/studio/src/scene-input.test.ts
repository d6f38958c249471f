import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Vector2, Vector3 } from "three";
import { NONE_QUERY, type Query, type SelectionOp } from "@splat-studio/core";
import { SceneInput, desiredOperation, type FrameInput, type Modifiers } from "./scene-input";
import { createEditorStore, type EditorStore } from "./store";

const viewport = { min: new Vector2(100, 50), max: new Vector2(500, 350) };

function frame(patch: {
  hover?: Vector2 | null;
  down?: boolean;
  released?: boolean;
  clicked?: boolean;
  modifiers?: Partial<Modifiers>;
  scrollDelta?: number;
} = {}): FrameInput {
  const down = patch.down ?? false;
  return {
    pointer: {
      hover: patch.hover === undefined ? new Vector2(110, 60) : patch.hover,
      down,
      released: patch.released ?? false,
      clicked: patch.clicked ?? false,
    },
    modifiers: { shift: false, command: false, ...patch.modifiers },
    scrollDelta: patch.scrollDelta ?? 0,
    viewport,
  };
}

function selectionStore(): EditorStore {
  const store = createEditorStore();
  store.getState().startSelection();
  return store;
}

function inputFor(store: EditorStore): SceneInput {
  return new SceneInput(store, store.getState().config);
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("desiredOperation", () => {
  it("maps modifier combinations", () => {
    expect(desiredOperation({ shift: false, command: false })).toBe("set");
    expect(desiredOperation({ shift: true, command: false })).toBe("add");
    expect(desiredOperation({ shift: false, command: true })).toBe("remove");
    expect(desiredOperation({ shift: true, command: true })).toBe("set");
  });
});

describe("SceneInput", () => {
  it("emits none without a pending action", () => {
    const store = createEditorStore();
    expect(inputFor(store).handle(frame({ clicked: true }), NONE_QUERY)).toEqual(NONE_QUERY);
  });

  it("switches the operation only on ticks where the modifiers change", () => {
    const store = selectionStore();
    const input = inputFor(store);
    const ops: SelectionOp[] = [];
    const actions: (string | undefined)[] = [];

    let query: Query = NONE_QUERY;
    for (const shift of [false, true, false]) {
      query = input.handle(frame({ down: true, modifiers: { shift } }), query);
      if (query.kind !== "selection") throw new Error("expected a selection query");
      ops.push(query.op);
      actions.push(query.action?.kind);
    }

    expect(ops).toEqual(["set", "add", "set"]);
    expect(actions).toEqual(["start", "continue", "continue"]);
  });

  it("does not override the operation while a modifier is held", () => {
    const store = selectionStore();
    const input = inputFor(store);

    input.handle(frame({ modifiers: { shift: true } }), NONE_QUERY);
    expect(store.getState().selection.operation).toBe("add");

    store.getState().setSelectionOperation("remove");
    const query = input.handle(frame({ modifiers: { shift: true } }), NONE_QUERY);
    expect(query).toMatchObject({ kind: "selection", op: "remove" });
  });

  it("ends the stroke on release and hovers otherwise", () => {
    const store = selectionStore();
    const input = inputFor(store);

    const released = input.handle(frame({ released: true }), NONE_QUERY);
    expect(released).toMatchObject({ kind: "selection", action: { kind: "end" } });

    const hover = input.handle(frame({ hover: new Vector2(300, 200) }), released);
    expect(hover).toMatchObject({ kind: "selection", action: null });
    if (hover.kind !== "selection") throw new Error("expected a selection query");
    expect(hover.pos.toArray()).toEqual([200, 150]);
  });

  it("starts the configured tool", () => {
    const store = selectionStore();
    store.getState().setSelectionMethod("brush");
    const query = inputFor(store).handle(frame({ down: true }), NONE_QUERY);
    expect(query).toMatchObject({ action: { kind: "start", tool: "brush" } });
  });

  it("ignores the pointer outside the viewport", () => {
    const store = selectionStore();
    const input = inputFor(store);
    expect(input.handle(frame({ hover: new Vector2(20, 20), down: true }), NONE_QUERY)).toEqual(
      NONE_QUERY,
    );
    expect(input.handle(frame({ hover: null }), NONE_QUERY)).toEqual(NONE_QUERY);
  });

  it("ends a stroke released outside the viewport at the nearest edge", () => {
    const store = selectionStore();
    const input = inputFor(store);

    const started = input.handle(frame({ down: true }), NONE_QUERY);
    const dragged = input.handle(frame({ down: true, hover: new Vector2(700, 400) }), started);
    expect(dragged).toMatchObject({ kind: "selection", action: { kind: "continue" } });

    const released = input.handle(frame({ released: true, hover: null }), dragged);
    if (released.kind !== "selection") throw new Error("expected a selection query");
    expect(released.action).toEqual({ kind: "end" });
    expect(released.pos.toArray()).toEqual([400, 300]);

    expect(input.handle(frame({ hover: new Vector2(20, 20) }), released)).toEqual(NONE_QUERY);
  });

  it("steps the brush radius by the scroll direction within bounds", () => {
    const store = selectionStore();
    store.getState().setSelectionMethod("brush");
    const input = inputFor(store);

    input.handle(frame({ scrollDelta: 3.5 }), NONE_QUERY);
    expect(store.getState().selection.brushRadius).toBe(41);

    store.getState().setBrushRadius(200);
    const query = input.handle(frame({ scrollDelta: 1 }), NONE_QUERY);
    expect(query).toMatchObject({ brushRadius: 200 });

    store.getState().setBrushRadius(1);
    input.handle(frame({ scrollDelta: -2 }), NONE_QUERY);
    expect(store.getState().selection.brushRadius).toBe(1);
  });

  it("leaves the brush radius alone for rectangles", () => {
    const store = selectionStore();
    inputFor(store).handle(frame({ scrollDelta: 1 }), NONE_QUERY);
    expect(store.getState().selection.brushRadius).toBe(40);
  });

  describe("locate hit", () => {
    function locateStore(): EditorStore {
      const store = createEditorStore();
      store.getState().addHitPair();
      store.getState().startLocateHit(0, 1);
      return store;
    }

    it("probes the clicked viewport pixel", () => {
      const store = locateStore();
      const query = inputFor(store).handle(frame({ clicked: true }), NONE_QUERY);

      if (query.kind !== "locate-hit") throw new Error("expected a locate-hit query");
      expect(query.pixel.toArray()).toEqual([10, 10]);
      expect(query.method).toBe("most-alpha");
      const action = store.getState().action;
      expect(action?.kind === "locate-hit" && action.channel).toBe(query.channel);
    });

    it("keeps waiting after a click outside the viewport", () => {
      const store = locateStore();
      const input = inputFor(store);

      expect(input.handle(frame({ clicked: true, hover: new Vector2(0, 0) }), NONE_QUERY)).toEqual(
        NONE_QUERY,
      );
      expect(input.handle(frame(), NONE_QUERY)).toEqual(NONE_QUERY);
      expect(store.getState().action?.kind).toBe("locate-hit");
    });

    it("stores a delivered hit and completes the action", () => {
      const store = locateStore();
      const action = store.getState().action;
      if (action?.kind !== "locate-hit") throw new Error("expected a locate-hit action");
      action.channel.send(new Vector3(1, 2, 3));

      expect(inputFor(store).handle(frame({ clicked: true }), NONE_QUERY)).toEqual(NONE_QUERY);
      expect(store.getState().action).toBeNull();
      expect(store.getState().measurement.hitPairs[0].hits[1].toArray()).toEqual([1, 2, 3]);
      expect(store.getState().commands.drain()).toEqual([
        { kind: "update-measurement-hit", hitPairIndex: 0 },
      ]);
    });
  });
});
