// ─── Scene Frame Driver ─────────────────────────────────────────────────────
// One tick per rendered frame:
//
//   postprocess ─▶ input (unless a readback is pending) ─▶ preprocess ─▶
//   model load poll ─▶ scene commands ─▶ export poll
//
// The viewer (GPU device, query pipeline, mask evaluator) is shared with the
// readback tasks through a SharedHandle; every access is a use() section.

import {
  Deferred,
  NONE_QUERY,
  QueryToolset,
  locateHit,
  logInfo,
  logWarn,
  toEvaluationTree,
  validateShapes,
  type HitTester,
  type MaskOpTree,
  type PointEditPod,
  type Query,
  type QueryCursor,
  type QueryDescriptor,
  type QueryHitResult,
  type QueryResult,
  type SharedHandle,
  type Vec4Tuple,
} from "@splat-studio/core";
import type { Matrix4 } from "three";
import type { SceneConfig } from "./config";
import { SceneInput, type FrameInput } from "./scene-input";
import {
  modelMatrix,
  toPointEditPod,
  type EditorState,
  type EditorStore,
  type HitPair,
  type SceneCommand,
} from "./store";

export interface QueryPipeline {
  updateQuery(descriptor: QueryDescriptor): void;
  /** Null hides the selection cursor. */
  updateCursor(cursor: QueryCursor | null): void;
  /** Bounded wait for the previous submission's pass to complete. */
  postprocess(): void;
  /** Read back the samples under the last hit query. */
  downloadHits(): Promise<QueryHitResult[]>;
  hitTester: HitTester;
}

export interface MaskEvaluator {
  /** A null tree clears the model's mask. */
  evaluate(modelKey: string, tree: MaskOpTree | null): void;
}

/** Per-frame render inputs derived from the editor state. */
export interface ViewerFrame {
  /** Keys of the models to draw, in load order */
  visibleModels: string[];
  /** World matrix of the selected model */
  modelTransform: { key: string; matrix: Matrix4 } | null;
  /** Edit applied to selected points, or null for none */
  selectionEdit: PointEditPod | null;
  /** RGBA tint of selected points; all zero hides it */
  selectionHighlight: Vec4Tuple;
  showUnedited: boolean;
}

export interface Viewer {
  pipeline: QueryPipeline;
  maskEvaluator: MaskEvaluator;
  updateFrame(frame: ViewerFrame): void;
  updateMeasurementHit(hitPairIndex: number, pair: HitPair): void;
}

const NO_HIGHLIGHT: Vec4Tuple = [0, 0, 0, 0];

export function viewerFrame(state: EditorState): ViewerFrame {
  const selected = state.models.find((m) => m.key === state.selectedModel);
  const selecting = state.action?.kind === "selection";
  const edit = selecting ? state.selection.edit : null;

  return {
    visibleModels: state.models.filter((m) => m.visible).map((m) => m.key),
    modelTransform: selected
      ? { key: selected.key, matrix: modelMatrix(selected.transform) }
      : null,
    selectionEdit: edit ? toPointEditPod(edit) : null,
    selectionHighlight:
      selecting && !edit ? [...state.selection.highlightColor] : [...NO_HIGHLIGHT],
    // An edit in progress is always shown
    showUnedited: state.selection.showUnedited && !edit,
  };
}

type LocateHitQuery = Extract<Query, { kind: "locate-hit" }>;

export class Scene {
  private query: Query = NONE_QUERY;
  private result: QueryResult | null = null;
  private readonly input: SceneInput;
  readonly toolset = new QueryToolset();

  constructor(
    private readonly store: EditorStore,
    private readonly viewer: SharedHandle<Viewer>,
  ) {
    const { config } = store.getState();
    this.input = new SceneInput(store, config);
    this.toolset.updateBrushRadius(config.defaultBrushRadius);
  }

  private get config(): SceneConfig {
    return this.store.getState().config;
  }

  get currentQuery(): Query {
    return this.query;
  }

  get pendingResult(): QueryResult | null {
    return this.result;
  }

  tick(input: FrameInput): void {
    this.postprocess();
    if (!this.result) {
      this.query = this.input.handle(input, this.query);
    }
    this.preprocess();
    this.store.getState().pollModelLoad();
    this.runCommands();
    this.store.getState().pollExport();
  }

  /** Drop the viewer reference. Pending readbacks hold their own. */
  dispose(): void {
    this.viewer.release();
  }

  private postprocess(): void {
    this.viewer.use((viewer) => viewer.pipeline.postprocess());

    const result = this.result;
    if (!result) return;

    if (result.kind === "locate-hit-ready") {
      const query = this.query;
      if (query.kind !== "locate-hit") {
        this.result = null;
        return;
      }
      this.result = {
        kind: "downloading",
        receiver: Deferred.spawn(() => this.readHit(query), "locate-hit"),
      };
      return;
    }

    const receiver = result.receiver;
    const next = receiver.tryAdvance();
    if (receiver.isReady) {
      this.result = next ?? null;
    } else if (receiver.error !== null) {
      logWarn("scene", "hit readback failed", { error: receiver.error });
      this.result = null;
    }
  }

  private async readHit(query: LocateHitQuery): Promise<QueryResult | null> {
    const viewer = this.viewer.clone();
    try {
      const results = await viewer.use((v) => v.pipeline.downloadHits());
      const pos = viewer.use((v) =>
        locateHit(v.pipeline.hitTester, query.method, results, this.config.alphaThreshold),
      );
      if (query.channel.send(pos)) {
        logInfo("scene", "hit located", { x: pos.x, y: pos.y, z: pos.z });
      }
      return null;
    } finally {
      viewer.release();
    }
  }

  private preprocess(): void {
    const state = this.store.getState();
    let descriptor: QueryDescriptor = { type: "none" };

    if (!this.result) {
      const query = this.query;
      const toolset = this.toolset;
      if (query.kind !== "selection") {
        toolset.cancel();
        toolset.hideCursor();
      }

      switch (query.kind) {
        case "none":
          break;
        case "locate-hit":
          this.result = { kind: "locate-hit-ready" };
          descriptor = { type: "hit", coords: [query.pixel.x, query.pixel.y] };
          break;
        case "selection": {
          toolset.setUseTexture(!query.immediate);
          toolset.updateBrushRadius(query.brushRadius);
          toolset.updateOp(query.op);
          const action = query.action;
          if (action?.kind === "start") {
            toolset.start(action.tool, query.op, query.pos);
          } else if (action?.kind === "continue") {
            toolset.updatePos(query.pos);
          } else if (action?.kind === "end" || toolset.active) {
            // A stroke still open on a hover tick lost its release
            toolset.updatePos(query.pos);
            toolset.end();
          } else {
            toolset.hover(query.pos, state.selection.method);
          }
          descriptor = toolset.query();
          break;
        }
      }
    }

    const cursor = this.toolset.cursor;
    const frame = viewerFrame(state);
    this.viewer.use((viewer) => {
      viewer.updateFrame(frame);
      viewer.pipeline.updateCursor(cursor);
      viewer.pipeline.updateQuery(descriptor);
    });
  }

  private runCommands(): void {
    const state = this.store.getState();
    for (const command of state.commands.drain()) {
      this.runCommand(command);
    }
  }

  private runCommand(command: SceneCommand): void {
    const state = this.store.getState();
    switch (command.kind) {
      case "add-model": {
        const { fileName, cloud, compressions } = command.model;
        state.addModel(fileName, cloud, compressions);
        return;
      }
      case "evaluate-mask": {
        const editor = state.masks[command.modelKey];
        if (!editor) {
          logWarn("scene", "mask for unknown model", { model: command.modelKey });
          return;
        }
        const op = command.op;
        if (op && validateShapes(op, editor.shapePods.length) !== null) {
          // Stale: the shapes changed after this was queued
          return;
        }
        const tree = op ? toEvaluationTree(op, editor.shapePods) : null;
        this.viewer.use((viewer) => viewer.maskEvaluator.evaluate(command.modelKey, tree));
        return;
      }
      case "update-measurement-hit": {
        const pair = state.measurement.hitPairs[command.hitPairIndex];
        if (!pair) return;
        this.viewer.use((viewer) =>
          viewer.updateMeasurementHit(command.hitPairIndex, pair),
        );
        return;
      }
    }
  }
}
