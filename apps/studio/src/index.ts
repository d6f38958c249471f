export { DEFAULT_SCENE_CONFIG, resolveSceneConfig } from "./config";
export type { SceneConfig } from "./config";
export {
  SETTINGS_KEY,
  defaultSettings,
  loadSettings,
  saveSettings,
} from "./settings";
export type { Settings, SettingsStorage } from "./settings";
export {
  createEditorStore,
  currentSettings,
  defaultSelectionEdit,
  hitPairDistance,
  modelMatrix,
  persistSettings,
  toPointEditPod,
  updateMask,
} from "./store";
export type {
  Action,
  EditorState,
  EditorStore,
  EditorStoreOptions,
  ExportModal,
  HitPair,
  MaskEditor,
  Measurement,
  Model,
  ModelDecoder,
  ModelTransform,
  OpenDialog,
  OpenedFile,
  OpenedModel,
  SceneCommand,
  Selection,
  SelectionEdit,
} from "./store";
export { SceneInput, desiredOperation } from "./scene-input";
export type { FrameInput, Modifiers, PointerInput, ViewportRect } from "./scene-input";
export { Scene, viewerFrame } from "./scene";
export type { MaskEvaluator, QueryPipeline, Viewer, ViewerFrame } from "./scene";
export { CpuMaskEvaluator } from "./mask-evaluator";
export * from "./hooks";
