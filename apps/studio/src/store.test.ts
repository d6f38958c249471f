import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Vector3 } from "three";
import {
  EditFlag,
  createPointCloud,
  shapeRef,
  union,
  type SaveDialog,
} from "@splat-studio/core";
import type { SettingsStorage } from "./settings";
import {
  createEditorStore,
  defaultSelectionEdit,
  hitPairDistance,
  persistSettings,
  toPointEditPod,
  type EditorStore,
} from "./store";

const cloud = () => createPointCloud(new Float32Array([0, 0, 0, 5, 0, 0]));

function storeWithModel(): EditorStore {
  const store = createEditorStore();
  store.getState().addModel("garden.ply", cloud());
  return store;
}

const maskOf = (store: EditorStore) => store.getState().masks["garden.ply"];

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("models", () => {
  it("selects the first model and keeps keys unique", () => {
    const store = createEditorStore();
    const first = store.getState().addModel("scan.ply", cloud());
    const second = store.getState().addModel("scan.ply", cloud());

    expect([first, second]).toEqual(["scan.ply", "scan.ply (1)"]);
    expect(store.getState().selectedModel).toBe("scan.ply");
    expect(store.getState().models[1].compressions).toEqual({ sh: "norm8", cov3d: "half" });
  });

  it("moves the selection when the selected model is removed", () => {
    const store = createEditorStore();
    store.getState().addModel("a.ply", cloud());
    store.getState().addModel("b.ply", cloud());

    store.getState().removeModel("a.ply");
    expect(store.getState().selectedModel).toBe("b.ply");
    expect(store.getState().masks["a.ply"]).toBeUndefined();

    store.getState().removeModel("b.ply");
    expect(store.getState().selectedModel).toBeNull();
  });

  it("re-evaluates the mask when the model moves", () => {
    const store = storeWithModel();
    store.getState().commands.drain();

    store.getState().setModelTransform("garden.ply", { scale: new Vector3(2, 2, 2) });

    expect(store.getState().models[0].transform.scale.toArray()).toEqual([2, 2, 2]);
    expect(store.getState().commands.drain()).toEqual([
      { kind: "evaluate-mask", modelKey: "garden.ply", op: null },
    ]);
  });

  it("ignores unknown keys", () => {
    const store = storeWithModel();
    store.getState().selectModel("missing.ply");
    expect(store.getState().selectedModel).toBe("garden.ply");
  });
});

describe("mask editing", () => {
  it("reports an out-of-range index until enough shapes exist", () => {
    const store = storeWithModel();
    const { commands } = store.getState();

    store.getState().setOpCode("0 | 1");
    expect(maskOf(store).opCodeError).toBe("Invalid shape index: 0");

    store.getState().addShape();
    expect(maskOf(store).opCodeError).toBe("Invalid shape index: 1");
    expect(commands.size).toBe(0);

    store.getState().addShape("ellipsoid");
    expect(maskOf(store).opCodeError).toBeNull();
    expect(maskOf(store).op).toEqual(union(shapeRef(0), shapeRef(1)));
    expect(commands.drain()).toEqual([
      { kind: "evaluate-mask", modelKey: "garden.ply", op: union(shapeRef(0), shapeRef(1)) },
    ]);
  });

  it("keeps the last valid expression on a parse error", () => {
    const store = storeWithModel();
    store.getState().addShape();
    store.getState().setOpCode("!0");
    store.getState().commands.drain();

    store.getState().setOpCode("!0 $");
    expect(maskOf(store).opCodeError).toBe(
      "Failed to parse mask operation: unexpected character '$' at offset 3",
    );
    expect(maskOf(store).opCode).toBe("!0 $");
    expect(maskOf(store).op).toEqual({ type: "complement", operand: shapeRef(0) });
    expect(store.getState().commands.size).toBe(0);
  });

  it("clears the mask for an empty expression", () => {
    const store = storeWithModel();
    store.getState().setOpCode("   ");
    expect(maskOf(store).opCodeError).toBeNull();
    expect(store.getState().commands.drain()).toEqual([
      { kind: "evaluate-mask", modelKey: "garden.ply", op: null },
    ]);
  });

  it("rebuilds shape pods on every shape edit", () => {
    const store = storeWithModel();
    store.getState().addShape();
    store.getState().updateShape(0, { pos: new Vector3(1, 2, 3), kind: "ellipsoid" });

    const [pod] = maskOf(store).shapePods;
    expect(pod.pos).toEqual([1, 2, 3]);
    expect(pod.kind).toBe("ellipsoid");
    expect(pod.rotation).toEqual([0, 0, 0, 1]);
  });

  it("warns that removing a shape shifts the indices after it", () => {
    const store = storeWithModel();
    store.getState().addShape();
    store.getState().addShape();
    store.getState().setOpCode("0 | 1");

    store.getState().removeShape(0);

    expect(console.warn).toHaveBeenCalledWith(
      "[mask] shape indices shifted; the mask expression was not rewritten (removed=0)",
    );
    expect(maskOf(store).shapes).toHaveLength(1);
    expect(maskOf(store).opCodeError).toBe("Invalid shape index: 1");
  });

  it("needs a selected model", () => {
    const store = createEditorStore();
    store.getState().addShape();
    expect(store.getState().masks).toEqual({});
    expect(console.warn).toHaveBeenCalledWith("[mask] no model selected");
  });
});

describe("selection", () => {
  it("clamps the brush radius to the configured bounds", () => {
    const store = createEditorStore({ config: { brushRadiusMax: 100 } });
    expect(store.getState().selection.brushRadius).toBe(40);

    store.getState().setBrushRadius(500);
    expect(store.getState().selection.brushRadius).toBe(100);
    store.getState().setBrushRadius(-3);
    expect(store.getState().selection.brushRadius).toBe(1);
  });

  it("encodes the edit as a point edit record", () => {
    const hidden = toPointEditPod({ ...defaultSelectionEdit(), hidden: true });
    expect(hidden.flags).toBe(EditFlag.ENABLED | EditFlag.HIDDEN);
    expect(hidden.color).toEqual([0, 1, 1]);

    const override = toPointEditPod({
      ...defaultSelectionEdit(),
      colorMode: "override",
      overrideColor: [1, 0, 0],
      alpha: 0.5,
    });
    expect(override).toEqual({
      flags: EditFlag.ENABLED | EditFlag.OVERRIDE_COLOR,
      color: [1, 0, 0],
      contrast: 0,
      exposure: 0,
      gamma: 1,
      alpha: 0.5,
    });
  });

  it("starts an edit from the defaults and clears it", () => {
    const store = createEditorStore();
    expect(store.getState().selection.edit).toBeNull();

    store.getState().updateSelectionEdit({ alpha: 0.25 });
    expect(store.getState().selection.edit).toEqual({ ...defaultSelectionEdit(), alpha: 0.25 });

    store.getState().clearSelectionEdit();
    expect(store.getState().selection.edit).toBeNull();
  });

  it("stops only a selection action", () => {
    const store = createEditorStore();
    store.getState().startSelection();
    expect(store.getState().action).toEqual({ kind: "selection" });

    store.getState().stopSelection();
    expect(store.getState().action).toBeNull();
  });
});

describe("measurement", () => {
  it("starts a locate action for an existing hit pair", () => {
    const store = createEditorStore();
    store.getState().startLocateHit(0, 0);
    expect(store.getState().action).toBeNull();

    const index = store.getState().addHitPair();
    store.getState().startLocateHit(index, 1);
    const action = store.getState().action;
    expect(action).toMatchObject({ kind: "locate-hit", hitPairIndex: 0, hitIndex: 1 });

    // Replacing the action closes the old result channel
    store.getState().startSelection();
    expect(action?.kind === "locate-hit" && action.channel.isClosed).toBe(true);
  });

  it("stores located hits and measures the pair", () => {
    const store = createEditorStore();
    store.getState().addHitPair();
    store.getState().setMeasurementHit(0, 1, new Vector3(3, 4, 0));

    const pair = store.getState().measurement.hitPairs[0];
    expect(pair.label).toBe("Hit pair 1");
    expect(hitPairDistance(pair)).toBe(5);
  });
});

describe("export modal", () => {
  it("opens with one settings row per model and closes on removal", () => {
    const store = createEditorStore();
    store.getState().openExport();
    expect(store.getState().exportModal).toBeNull();

    store.getState().addModel("a.ply", cloud());
    store.getState().addModel("b.ply", cloud());
    store.getState().openExport();
    expect(store.getState().exportModal?.coordinator.modelKeys).toEqual(["a.ply", "b.ply"]);
    expect(store.getState().exportModal?.coordinator.settings).toHaveLength(2);

    store.getState().removeModel("b.ply");
    expect(store.getState().exportModal).toBeNull();
  });

  it("refuses to confirm while closed", () => {
    const store = storeWithModel();
    const dialog: SaveDialog = { saveFile: async () => null };
    expect(store.getState().confirmExport([], dialog)).toBe(false);
  });
});

describe("persistSettings", () => {
  it("saves when a persisted field changes", () => {
    const saved: string[] = [];
    const storage: SettingsStorage = {
      getItem: () => null,
      setItem: (_key, value) => {
        saved.push(value);
      },
    };
    const store = createEditorStore();
    const unsubscribe = persistSettings(store, storage);

    store.getState().startSelection();
    expect(saved).toHaveLength(0);

    store.getState().setHitMethod("closest");
    expect(JSON.parse(saved[0])).toEqual({
      compressions: { sh: "norm8", cov3d: "half" },
      hitMethod: "closest",
      selectionMethod: "rect",
    });

    unsubscribe();
    store.getState().setSelectionMethod("brush");
    expect(saved).toHaveLength(1);
  });

  it("starts from loaded settings", () => {
    const store = createEditorStore({
      settings: {
        compressions: { sh: "remove", cov3d: "single" },
        hitMethod: "closest",
        selectionMethod: "brush",
      },
    });
    expect(store.getState().selection.method).toBe("brush");
    expect(store.getState().measurement.hitMethod).toBe("closest");
    expect(store.getState().compressions).toEqual({ sh: "remove", cov3d: "single" });
  });
});
