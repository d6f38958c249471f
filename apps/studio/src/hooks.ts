// ─── React Hooks ────────────────────────────────────────────────────────────
// Selectors over the app-wide editor store. Each hook subscribes to one slice
// so panels only re-render when their slice changes.

import { useStore } from "zustand";
import { compressedSize, humanReadableSize } from "@splat-studio/core";
import { createEditorStore, type EditorState, type MaskEditor } from "./store";

export const editorStore = createEditorStore();

export function useEditor<T>(selector: (state: EditorState) => T): T {
  return useStore(editorStore, selector);
}

export const useModels = () => useEditor((s) => s.models);
export const useSelectedModel = () => useEditor((s) => s.selectedModel);
export const useSelectModel = () => useEditor((s) => s.selectModel);
export const useOpenModel = () => useEditor((s) => s.openModel);
export const useModelLoading = () =>
  useEditor((s) => s.modelLoad !== null && s.modelLoad.error === null);
export const useModelLoadError = () => useEditor((s) => s.modelLoad?.error ?? null);
export const useSetModelVisible = () => useEditor((s) => s.setModelVisible);
export const useSetModelTransform = () => useEditor((s) => s.setModelTransform);

export const useMaskEditor = (): MaskEditor | null =>
  useEditor((s) => (s.selectedModel === null ? null : (s.masks[s.selectedModel] ?? null)));
export const useOpCodeError = () =>
  useEditor((s) =>
    s.selectedModel === null ? null : (s.masks[s.selectedModel]?.opCodeError ?? null),
  );
export const useSetOpCode = () => useEditor((s) => s.setOpCode);
export const useAddShape = () => useEditor((s) => s.addShape);
export const useUpdateShape = () => useEditor((s) => s.updateShape);
export const useRemoveShape = () => useEditor((s) => s.removeShape);

export const useSelection = () => useEditor((s) => s.selection);
export const useSelectionActive = () => useEditor((s) => s.action?.kind === "selection");
export const useStartSelection = () => useEditor((s) => s.startSelection);
export const useStopSelection = () => useEditor((s) => s.stopSelection);
export const useUpdateSelectionEdit = () => useEditor((s) => s.updateSelectionEdit);
export const useClearSelectionEdit = () => useEditor((s) => s.clearSelectionEdit);
export const useSetShowUnedited = () => useEditor((s) => s.setShowUnedited);

export const useHitPairs = () => useEditor((s) => s.measurement.hitPairs);
export const useHitMethod = () => useEditor((s) => s.measurement.hitMethod);
export const useStartLocateHit = () => useEditor((s) => s.startLocateHit);

export const useExportModal = () => useEditor((s) => s.exportModal);
export const useExportError = () => useEditor((s) => s.exportError);
export const useCompressions = () => useEditor((s) => s.compressions);

/** GPU memory of a model under its load-time layout, e.g. "1.50 KB". */
export const useModelSize = (key: string): string | null =>
  useEditor((s) => {
    const model = s.models.find((m) => m.key === key);
    if (!model) return null;
    return humanReadableSize(compressedSize(model.compressions, model.cloud.count));
  });
