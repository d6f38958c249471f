// ─── Edit / Mask Buffer Layouts ─────────────────────────────────────────────
// Byte layouts of the per-point GPU buffers that are downloaded for export.
//
// Edit record (32 bytes, little-endian):
//   u32 flags | f32 color[3] | f32 contrast | f32 exposure | f32 gamma | f32 alpha
//
// Mask buffer: u32 words, bit (i & 31) of word (i >> 5) set = point i inside.

import type { Vec3Tuple } from "../mask/types";

export const EditFlag = {
  ENABLED: 1,
  HIDDEN: 2,
  OVERRIDE_COLOR: 4,
} as const;

export const EDIT_POD_SIZE = 32;

export interface PointEditPod {
  flags: number;
  /** HSL adjustment (hue offset, saturation, lightness) or override RGB */
  color: Vec3Tuple;
  contrast: number;
  exposure: number;
  gamma: number;
  alpha: number;
}

export function encodeEditPods(pods: readonly PointEditPod[]): Uint8Array {
  const bytes = new Uint8Array(pods.length * EDIT_POD_SIZE);
  const view = new DataView(bytes.buffer);
  pods.forEach((pod, i) => writeEditPod(view, i * EDIT_POD_SIZE, pod));
  return bytes;
}

export function decodeEditPods(bytes: Uint8Array): PointEditPod[] {
  if (bytes.byteLength % EDIT_POD_SIZE !== 0) {
    throw new Error(
      `Edit buffer length ${bytes.byteLength} is not a multiple of ${EDIT_POD_SIZE}`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const pods: PointEditPod[] = [];
  for (let offset = 0; offset < bytes.byteLength; offset += EDIT_POD_SIZE) {
    pods.push({
      flags: view.getUint32(offset, true),
      color: [
        view.getFloat32(offset + 4, true),
        view.getFloat32(offset + 8, true),
        view.getFloat32(offset + 12, true),
      ],
      contrast: view.getFloat32(offset + 16, true),
      exposure: view.getFloat32(offset + 20, true),
      gamma: view.getFloat32(offset + 24, true),
      alpha: view.getFloat32(offset + 28, true),
    });
  }
  return pods;
}

export function decodeMaskWords(bytes: Uint8Array): Uint32Array {
  if (bytes.byteLength % 4 !== 0) {
    throw new Error(`Mask buffer length ${bytes.byteLength} is not word aligned`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const words = new Uint32Array(bytes.byteLength / 4);
  for (let i = 0; i < words.length; i++) {
    words[i] = view.getUint32(i * 4, true);
  }
  return words;
}

export function encodeMaskWords(words: Uint32Array): Uint8Array {
  const bytes = new Uint8Array(words.length * 4);
  const view = new DataView(bytes.buffer);
  words.forEach((word, i) => view.setUint32(i * 4, word, true));
  return bytes;
}

function writeEditPod(view: DataView, offset: number, pod: PointEditPod): void {
  view.setUint32(offset, pod.flags, true);
  view.setFloat32(offset + 4, pod.color[0], true);
  view.setFloat32(offset + 8, pod.color[1], true);
  view.setFloat32(offset + 12, pod.color[2], true);
  view.setFloat32(offset + 16, pod.contrast, true);
  view.setFloat32(offset + 20, pod.exposure, true);
  view.setFloat32(offset + 24, pod.gamma, true);
  view.setFloat32(offset + 28, pod.alpha, true);
}
