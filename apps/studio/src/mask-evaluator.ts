import {
  encodeMaskWords,
  evaluateMaskBits,
  logWarn,
  type DownloadableBuffer,
  type MaskOpTree,
} from "@splat-studio/core";
import type { MaskEvaluator } from "./scene";
import { modelMatrix, type EditorStore } from "./store";

/**
 * Mask evaluation on the CPU, for headless use and for viewers without a
 * compute pass. Keeps one mask buffer per model.
 */
export class CpuMaskEvaluator implements MaskEvaluator {
  private readonly masks = new Map<string, Uint32Array>();

  constructor(private readonly store: EditorStore) {}

  evaluate(modelKey: string, tree: MaskOpTree | null): void {
    const model = this.store.getState().models.find((m) => m.key === modelKey);
    if (!model) {
      logWarn("mask", "evaluate for unknown model", { model: modelKey });
      return;
    }
    this.masks.set(
      modelKey,
      evaluateMaskBits(tree, model.cloud.positions, modelMatrix(model.transform)),
    );
  }

  /** Current mask words; every point is selected until a mask is evaluated. */
  maskWords(modelKey: string): Uint32Array {
    const words = this.masks.get(modelKey);
    if (words) return words;

    const model = this.store.getState().models.find((m) => m.key === modelKey);
    return evaluateMaskBits(null, model?.cloud.positions ?? new Float32Array(0));
  }

  maskBuffer(modelKey: string): DownloadableBuffer {
    return {
      download: async () => encodeMaskWords(this.maskWords(modelKey)),
    };
  }
}
