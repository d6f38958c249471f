// ─── Editor State ───────────────────────────────────────────────────────────
// Everything the editor UI edits lives in one zustand vanilla store: loaded
// models, the mask editor of each model, selection and measurement tools, the
// pending user action and the export modal. The frame driver (scene.ts) reads
// it once per tick; React reads it through the hooks in hooks.ts.
//
// Work the GPU side has to do is queued on the scene command channel rather
// than done here, so store updates stay synchronous and cheap.

import { Euler, MathUtils, Matrix4, Quaternion, Vector3 } from "three";
import { createStore, type StoreApi } from "zustand/vanilla";
import {
  Channel,
  Deferred,
  EditFlag,
  ExportCoordinator,
  MaskParseError,
  createMaskShape,
  logInfo,
  logWarn,
  parseMaskOp,
  toMaskShapePod,
  validateShapes,
  collectShapeIndices,
  type Compressions,
  type ExportModelSource,
  type HitMethod,
  type MaskOp,
  type MaskShape,
  type MaskShapeKind,
  type MaskShapePod,
  type PointCloud,
  type PointEditPod,
  type SaveDialog,
  type SelectionMethod,
  type SelectionOp,
  type Vec3Tuple,
  type Vec4Tuple,
} from "@splat-studio/core";
import { resolveSceneConfig, type SceneConfig } from "./config";
import {
  defaultSettings,
  saveSettings,
  type Settings,
  type SettingsStorage,
} from "./settings";

// ─── Models ─────────────────────────────────────────────────────────────────

export interface ModelTransform {
  pos: Vector3;
  /** Euler degrees */
  rot: Vector3;
  scale: Vector3;
}

export interface Model {
  key: string;
  fileName: string;
  cloud: PointCloud;
  visible: boolean;
  transform: ModelTransform;
  /** Layout the model was loaded with */
  compressions: Compressions;
}

/** Model-to-world matrix; rotation is applied in ZYX order like mask shapes. */
export function modelMatrix(transform: ModelTransform): Matrix4 {
  const rotation = new Quaternion().setFromEuler(
    new Euler(
      MathUtils.degToRad(transform.rot.x),
      MathUtils.degToRad(transform.rot.y),
      MathUtils.degToRad(transform.rot.z),
      "ZYX",
    ),
  );
  return new Matrix4().compose(transform.pos, rotation, transform.scale);
}

// ─── Opening models ─────────────────────────────────────────────────────────

export interface OpenedFile {
  name: string;
  read(): Promise<Uint8Array>;
}

export interface OpenDialog {
  /** Resolves to null when the user dismisses the dialog. */
  openFile(options: { title: string }): Promise<OpenedFile | null>;
}

/** Decodes a model file. Throws on malformed input. */
export type ModelDecoder = (bytes: Uint8Array, compressions: Compressions) => PointCloud;

export interface OpenedModel {
  fileName: string;
  cloud: PointCloud;
  compressions: Compressions;
}

// ─── Mask editor ────────────────────────────────────────────────────────────

export interface MaskEditor {
  shapes: MaskShape[];
  /** GPU form of `shapes`, rebuilt on every shape change */
  shapePods: MaskShapePod[];
  opCode: string;
  /** Last expression that parsed and validated */
  op: MaskOp | null;
  opCodeError: string | null;
}

function emptyMaskEditor(): MaskEditor {
  return { shapes: [], shapePods: [], opCode: "", op: null, opCodeError: null };
}

// ─── Selection ──────────────────────────────────────────────────────────────

export interface SelectionEdit {
  hidden: boolean;
  colorMode: "hsl" | "override";
  /** Hue offset, saturation factor, lightness factor */
  hsl: Vec3Tuple;
  overrideColor: Vec3Tuple;
  contrast: number;
  exposure: number;
  gamma: number;
  alpha: number;
}

export function defaultSelectionEdit(): SelectionEdit {
  return {
    hidden: false,
    colorMode: "hsl",
    hsl: [0, 1, 1],
    overrideColor: [1, 1, 1],
    contrast: 0,
    exposure: 0,
    gamma: 1,
    alpha: 1,
  };
}

export function toPointEditPod(edit: SelectionEdit): PointEditPod {
  let flags: number = EditFlag.ENABLED;
  if (edit.hidden) flags |= EditFlag.HIDDEN;
  if (edit.colorMode === "override") flags |= EditFlag.OVERRIDE_COLOR;
  return {
    flags,
    color: edit.colorMode === "override" ? [...edit.overrideColor] : [...edit.hsl],
    contrast: edit.contrast,
    exposure: edit.exposure,
    gamma: edit.gamma,
    alpha: edit.alpha,
  };
}

export interface Selection {
  method: SelectionMethod;
  operation: SelectionOp;
  /** Apply every tick instead of once when the stroke ends */
  immediate: boolean;
  brushRadius: number;
  highlightColor: Vec4Tuple;
  /** Edit applied to the selected points; null shows the highlight instead */
  edit: SelectionEdit | null;
  /** Draw the models without any edits applied */
  showUnedited: boolean;
}

// ─── Measurement ────────────────────────────────────────────────────────────

export interface HitPair {
  label: string;
  visible: boolean;
  color: Vec4Tuple;
  lineWidth: number;
  hits: [Vector3, Vector3];
}

export function hitPairDistance(pair: HitPair): number {
  return pair.hits[0].distanceTo(pair.hits[1]);
}

export interface Measurement {
  hitPairs: HitPair[];
  hitMethod: HitMethod;
}

// ─── Actions & commands ─────────────────────────────────────────────────────

/** The outer user action waiting for viewport input. */
export type Action =
  | {
      kind: "locate-hit";
      hitPairIndex: number;
      hitIndex: 0 | 1;
      channel: Channel<Vector3>;
    }
  | { kind: "selection" };

/** Work for the frame driver, drained once per tick. */
export type SceneCommand =
  | { kind: "add-model"; model: OpenedModel }
  | { kind: "evaluate-mask"; modelKey: string; op: MaskOp | null }
  | { kind: "update-measurement-hit"; hitPairIndex: number };

export interface ExportModal {
  coordinator: ExportCoordinator;
}

// ─── State ──────────────────────────────────────────────────────────────────

export interface EditorState {
  config: SceneConfig;
  models: Model[];
  selectedModel: string | null;
  masks: Record<string, MaskEditor>;
  selection: Selection;
  measurement: Measurement;
  action: Action | null;
  compressions: Compressions;
  /** Open-model task; pending with an error after a failed attempt */
  modelLoad: Deferred<OpenedModel | null> | null;
  exportModal: ExportModal | null;
  /** Why the last export failed, until the next one is opened */
  exportError: string | null;
  commands: Channel<SceneCommand>;

  openModel: (dialog: OpenDialog, decode: ModelDecoder) => boolean;
  pollModelLoad: () => void;
  addModel: (fileName: string, cloud: PointCloud, compressions?: Compressions) => string;
  removeModel: (key: string) => void;
  selectModel: (key: string | null) => void;
  setModelVisible: (key: string, visible: boolean) => void;
  setModelTransform: (key: string, patch: Partial<ModelTransform>) => void;

  addShape: (kind?: MaskShapeKind) => void;
  updateShape: (index: number, patch: Partial<MaskShape>) => void;
  removeShape: (index: number) => void;
  setOpCode: (opCode: string) => void;

  startSelection: () => void;
  stopSelection: () => void;
  setSelectionMethod: (method: SelectionMethod) => void;
  setSelectionOperation: (operation: SelectionOp) => void;
  setSelectionImmediate: (immediate: boolean) => void;
  setBrushRadius: (radius: number) => void;
  setHighlightColor: (color: Vec4Tuple) => void;
  updateSelectionEdit: (patch: Partial<SelectionEdit>) => void;
  clearSelectionEdit: () => void;
  setShowUnedited: (showUnedited: boolean) => void;

  startLocateHit: (hitPairIndex: number, hitIndex: 0 | 1) => void;
  setMeasurementHit: (hitPairIndex: number, hitIndex: 0 | 1, pos: Vector3) => void;
  setHitMethod: (method: HitMethod) => void;
  addHitPair: () => number;
  clearAction: () => void;

  openExport: () => void;
  confirmExport: (sources: readonly ExportModelSource[], dialog: SaveDialog) => boolean;
  pollExport: () => void;
  closeExport: () => void;

  setCompressions: (compressions: Compressions) => void;
}

export interface EditorStoreOptions {
  config?: Partial<SceneConfig>;
  settings?: Settings;
}

export type EditorStore = StoreApi<EditorState>;

const HIT_PAIR_COLOR: Vec4Tuple = [1, 0, 0, 1];
const HIGHLIGHT_COLOR: Vec4Tuple = [1, 0, 1, 0.5];
const OPEN_TITLE = "Open a PLY file";

export function createEditorStore(options: EditorStoreOptions = {}): EditorStore {
  const config = resolveSceneConfig(options.config);
  const settings = options.settings ?? defaultSettings();

  return createStore<EditorState>()((set, get) => {
    // The in-flight open task; `modelLoad` shows it, or its failure
    let loading: Deferred<OpenedModel | null> | null = null;

    /** Run `fn` on the selected model's mask editor, then the mask update. */
    const editMask = (
      fn: (editor: MaskEditor) => Pick<MaskEditor, "shapes" | "opCode">,
    ) => {
      const key = get().selectedModel;
      if (key === null) {
        logWarn("mask", "no model selected");
        return;
      }
      const current = get().masks[key] ?? emptyMaskEditor();
      const { shapes, opCode } = fn(current);
      const editor = updateMask(current, shapes, opCode);
      set((s) => ({ masks: { ...s.masks, [key]: editor } }));
      if (editor.opCodeError === null) {
        get().commands.send({ kind: "evaluate-mask", modelKey: key, op: editor.op });
      }
    };

    const replaceAction = (action: Action | null) => {
      const previous = get().action;
      if (previous?.kind === "locate-hit") previous.channel.close();
      set({ action });
    };

    return {
      config,
      models: [],
      selectedModel: null,
      masks: {},
      selection: {
        method: settings.selectionMethod,
        operation: "set",
        immediate: false,
        brushRadius: config.defaultBrushRadius,
        highlightColor: [...HIGHLIGHT_COLOR],
        edit: null,
        showUnedited: false,
      },
      measurement: { hitPairs: [], hitMethod: settings.hitMethod },
      action: null,
      compressions: { ...settings.compressions },
      modelLoad: null,
      exportModal: null,
      exportError: null,
      commands: new Channel<SceneCommand>("scene-commands"),

      openModel: (dialog, decode) => {
        if (loading) {
          logWarn("models", "a model is already being opened");
          return false;
        }
        const compressions = { ...get().compressions };
        loading = Deferred.spawn(async (): Promise<OpenedModel | null> => {
          const file = await dialog.openFile({ title: OPEN_TITLE });
          if (!file) return null;
          const fileName = file.name.trim() || "Unnamed";
          const bytes = await file.read();
          return { fileName, cloud: decode(bytes, compressions), compressions };
        }, "open-model");
        set({ modelLoad: loading });
        return true;
      },

      pollModelLoad: () => {
        const load = loading;
        if (!load) return;

        const opened = load.tryAdvance();
        if (load.isReady) {
          loading = null;
          set({ modelLoad: null });
          if (opened) get().commands.send({ kind: "add-model", model: opened });
          return;
        }
        if (load.error !== null) {
          loading = null;
          logWarn("models", "open failed", { error: load.error });
          set({ modelLoad: Deferred.failed<OpenedModel | null>(load.error, "open-model") });
        }
      },

      addModel: (fileName, cloud, compressions = get().compressions) => {
        const key = uniqueKey(fileName, get().models);
        const model: Model = {
          key,
          fileName,
          cloud,
          visible: true,
          transform: {
            pos: new Vector3(0, 0, 0),
            rot: new Vector3(0, 0, 0),
            scale: new Vector3(1, 1, 1),
          },
          compressions: { ...compressions },
        };
        set((s) => ({
          models: [...s.models, model],
          masks: { ...s.masks, [key]: emptyMaskEditor() },
          selectedModel: s.selectedModel ?? key,
        }));
        logInfo("models", "model added", { key, points: cloud.count });
        return key;
      },

      removeModel: (key) => {
        const models = get().models.filter((m) => m.key !== key);
        if (models.length === get().models.length) {
          logWarn("models", "no such model", { key });
          return;
        }
        if (get().exportModal) get().closeExport();

        const masks = { ...get().masks };
        delete masks[key];
        set((s) => ({
          models,
          masks,
          selectedModel:
            s.selectedModel === key ? (models[0]?.key ?? null) : s.selectedModel,
        }));
      },

      selectModel: (key) => {
        if (key !== null && !get().models.some((m) => m.key === key)) {
          logWarn("models", "no such model", { key });
          return;
        }
        set({ selectedModel: key });
      },

      setModelVisible: (key, visible) =>
        set((s) => ({
          models: s.models.map((m) => (m.key === key ? { ...m, visible } : m)),
        })),

      setModelTransform: (key, patch) => {
        const model = get().models.find((m) => m.key === key);
        if (!model) {
          logWarn("models", "no such model", { key });
          return;
        }
        const transform = { ...model.transform, ...patch };
        set((s) => ({
          models: s.models.map((m) => (m.key === key ? { ...m, transform } : m)),
        }));
        // Shapes are in world space, so the mask moves with the model
        const editor = get().masks[key];
        if (editor) get().commands.send({ kind: "evaluate-mask", modelKey: key, op: editor.op });
      },

      addShape: (kind = "box") =>
        editMask((editor) => ({
          shapes: [...editor.shapes, createMaskShape(kind)],
          opCode: editor.opCode,
        })),

      updateShape: (index, patch) =>
        editMask((editor) => {
          if (!editor.shapes[index]) {
            logWarn("mask", "no such shape", { index });
            return editor;
          }
          const shapes = editor.shapes.slice();
          shapes[index] = { ...shapes[index], ...patch };
          return { shapes, opCode: editor.opCode };
        }),

      removeShape: (index) =>
        editMask((editor) => {
          if (!editor.shapes[index]) {
            logWarn("mask", "no such shape", { index });
            return editor;
          }
          // The expression keeps positional indices
          if (editor.op && collectShapeIndices(editor.op).some((i) => i > index)) {
            logWarn(
              "mask",
              "shape indices shifted; the mask expression was not rewritten",
              { removed: index },
            );
          }
          return {
            shapes: editor.shapes.filter((_, i) => i !== index),
            opCode: editor.opCode,
          };
        }),

      setOpCode: (opCode) => editMask((editor) => ({ shapes: editor.shapes, opCode })),

      startSelection: () => replaceAction({ kind: "selection" }),

      stopSelection: () => {
        if (get().action?.kind === "selection") replaceAction(null);
      },

      setSelectionMethod: (method) =>
        set((s) => ({ selection: { ...s.selection, method } })),

      setSelectionOperation: (operation) =>
        set((s) => ({ selection: { ...s.selection, operation } })),

      setSelectionImmediate: (immediate) =>
        set((s) => ({ selection: { ...s.selection, immediate } })),

      setBrushRadius: (radius) => {
        const brushRadius = Math.min(
          config.brushRadiusMax,
          Math.max(config.brushRadiusMin, radius),
        );
        set((s) => ({ selection: { ...s.selection, brushRadius } }));
      },

      setHighlightColor: (color) =>
        set((s) => ({ selection: { ...s.selection, highlightColor: [...color] } })),

      updateSelectionEdit: (patch) =>
        set((s) => ({
          selection: {
            ...s.selection,
            edit: { ...(s.selection.edit ?? defaultSelectionEdit()), ...patch },
          },
        })),

      clearSelectionEdit: () =>
        set((s) => ({ selection: { ...s.selection, edit: null } })),

      setShowUnedited: (showUnedited) =>
        set((s) => ({ selection: { ...s.selection, showUnedited } })),

      startLocateHit: (hitPairIndex, hitIndex) => {
        if (!get().measurement.hitPairs[hitPairIndex]) {
          logWarn("measurement", "no such hit pair", { hitPairIndex });
          return;
        }
        replaceAction({
          kind: "locate-hit",
          hitPairIndex,
          hitIndex,
          channel: new Channel<Vector3>("locate-hit"),
        });
      },

      setMeasurementHit: (hitPairIndex, hitIndex, pos) =>
        set((s) => ({
          measurement: {
            ...s.measurement,
            hitPairs: s.measurement.hitPairs.map((pair, i) => {
              if (i !== hitPairIndex) return pair;
              const hits: [Vector3, Vector3] = [pair.hits[0], pair.hits[1]];
              hits[hitIndex] = pos.clone();
              return { ...pair, hits };
            }),
          },
        })),

      setHitMethod: (hitMethod) =>
        set((s) => ({ measurement: { ...s.measurement, hitMethod } })),

      addHitPair: () => {
        const index = get().measurement.hitPairs.length;
        const pair: HitPair = {
          label: `Hit pair ${index + 1}`,
          visible: true,
          color: [...HIT_PAIR_COLOR],
          lineWidth: 2,
          hits: [new Vector3(0, 0, 0), new Vector3(0, 0, 0)],
        };
        set((s) => ({
          measurement: { ...s.measurement, hitPairs: [...s.measurement.hitPairs, pair] },
        }));
        return index;
      },

      clearAction: () => replaceAction(null),

      openExport: () => {
        if (get().exportModal) return;
        const models = get().models;
        if (models.length === 0) {
          logWarn("export", "no models to export");
          return;
        }
        set({
          exportModal: { coordinator: new ExportCoordinator(models.map((m) => m.key)) },
          exportError: null,
        });
      },

      confirmExport: (sources, dialog) => {
        const modal = get().exportModal;
        if (!modal) {
          logWarn("export", "export modal is not open");
          return false;
        }
        return modal.coordinator.confirm(sources, dialog);
      },

      pollExport: () => {
        const modal = get().exportModal;
        if (!modal) return;
        if (!modal.coordinator.poll()) {
          set({ exportModal: null, exportError: modal.coordinator.error });
        }
      },

      closeExport: () => {
        get().exportModal?.coordinator.cancel();
        set({ exportModal: null });
      },

      setCompressions: (compressions) => set({ compressions: { ...compressions } }),
    };
  });
}

/** Rebuild pods, then parse and validate the expression text. */
export function updateMask(
  editor: MaskEditor,
  shapes: MaskShape[],
  opCode: string,
): MaskEditor {
  const shapePods = shapes.map(toMaskShapePod);

  let op: MaskOp | null;
  try {
    op = parseMaskOp(opCode);
  } catch (err) {
    if (!(err instanceof MaskParseError)) throw err;
    return { ...editor, shapes, shapePods, opCode, opCodeError: err.message };
  }

  if (op) {
    const invalid = validateShapes(op, shapePods.length);
    if (invalid !== null) {
      return {
        ...editor,
        shapes,
        shapePods,
        opCode,
        opCodeError: `Invalid shape index: ${invalid}`,
      };
    }
  }

  return { shapes, shapePods, opCode, op, opCodeError: null };
}

function uniqueKey(fileName: string, models: readonly Model[]): string {
  const taken = new Set(models.map((m) => m.key));
  if (!taken.has(fileName)) return fileName;
  let n = 1;
  while (taken.has(`${fileName} (${n})`)) n++;
  return `${fileName} (${n})`;
}

// ─── Settings persistence ───────────────────────────────────────────────────

export function currentSettings(state: EditorState): Settings {
  return {
    compressions: { ...state.compressions },
    hitMethod: state.measurement.hitMethod,
    selectionMethod: state.selection.method,
  };
}

/** Save the settings whenever one of them changes. Returns the unsubscribe. */
export function persistSettings(
  store: EditorStore,
  storage: SettingsStorage,
): () => void {
  let last = JSON.stringify(currentSettings(store.getState()));
  return store.subscribe((state) => {
    const settings = currentSettings(state);
    const json = JSON.stringify(settings);
    if (json === last) return;
    last = json;
    saveSettings(storage, settings);
  });
}
