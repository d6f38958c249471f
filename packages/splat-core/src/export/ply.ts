import { Color } from "three";
import { ExportError } from "../errors";
import { isMaskBitSet } from "../mask/evaluate";
import type { PointCloud } from "../point-cloud";
import { EditFlag, type PointEditPod } from "./edit-pod";

export interface WritePlyOptions {
  /** Per-point edits to bake in, or null to write the unedited colors. */
  edits?: readonly PointEditPod[] | null;
  /** Mask words; points outside the mask are dropped. */
  mask?: Uint32Array | null;
}

const VERTEX_SIZE = 16;

/**
 * Serialize a point cloud as binary little-endian PLY with
 * `x y z` floats and `red green blue alpha` bytes.
 */
export function writePly(
  cloud: PointCloud,
  { edits = null, mask = null }: WritePlyOptions = {},
): Uint8Array {
  if (edits && edits.length < cloud.count) {
    throw new ExportError(
      `Edit buffer has ${edits.length} records for ${cloud.count} points`,
    );
  }
  if (mask && mask.length * 32 < cloud.count) {
    throw new ExportError(
      `Mask buffer has ${mask.length} words for ${cloud.count} points`,
    );
  }

  const rows: { index: number; rgba: [number, number, number, number] }[] = [];
  for (let i = 0; i < cloud.count; i++) {
    if (mask && !isMaskBitSet(mask, i)) continue;

    const base: [number, number, number, number] = [
      cloud.colors[i * 4] / 255,
      cloud.colors[i * 4 + 1] / 255,
      cloud.colors[i * 4 + 2] / 255,
      cloud.colors[i * 4 + 3] / 255,
    ];
    const rgba = edits ? applyEdit(base, edits[i]) : base;
    if (rgba) rows.push({ index: i, rgba });
  }

  const header = [
    "ply",
    "format binary_little_endian 1.0",
    `element vertex ${rows.length}`,
    "property float x",
    "property float y",
    "property float z",
    "property uchar red",
    "property uchar green",
    "property uchar blue",
    "property uchar alpha",
    "end_header",
    "",
  ].join("\n");
  const headerBytes = new TextEncoder().encode(header);

  const out = new Uint8Array(headerBytes.length + rows.length * VERTEX_SIZE);
  out.set(headerBytes, 0);
  const view = new DataView(out.buffer);

  rows.forEach(({ index, rgba }, row) => {
    const offset = headerBytes.length + row * VERTEX_SIZE;
    view.setFloat32(offset, cloud.positions[index * 3], true);
    view.setFloat32(offset + 4, cloud.positions[index * 3 + 1], true);
    view.setFloat32(offset + 8, cloud.positions[index * 3 + 2], true);
    for (let c = 0; c < 4; c++) {
      view.setUint8(offset + 12 + c, Math.round(clamp01(rgba[c]) * 255));
    }
  });

  return out;
}

/**
 * Apply one edit record to a normalized RGBA color. Returns null when the
 * edit hides the point.
 */
export function applyEdit(
  rgba: [number, number, number, number],
  edit: PointEditPod,
): [number, number, number, number] | null {
  if ((edit.flags & EditFlag.ENABLED) === 0) return rgba;
  if (edit.flags & EditFlag.HIDDEN) return null;

  let [r, g, b] = rgba;
  if (edit.flags & EditFlag.OVERRIDE_COLOR) {
    [r, g, b] = edit.color;
  } else if (!isIdentityHsl(edit.color)) {
    const color = new Color(r, g, b);
    const hsl = color.getHSL({ h: 0, s: 0, l: 0 });
    color.setHSL(
      (((hsl.h + edit.color[0]) % 1) + 1) % 1,
      clamp01(hsl.s * edit.color[1]),
      clamp01(hsl.l * edit.color[2]),
    );
    [r, g, b] = [color.r, color.g, color.b];
  }

  const adjust = (c: number) => {
    let v = c * Math.pow(2, edit.exposure);
    v = (v - 0.5) * (1 + edit.contrast) + 0.5;
    return Math.pow(clamp01(v), edit.gamma);
  };

  return [adjust(r), adjust(g), adjust(b), clamp01(rgba[3] * edit.alpha)];
}

function isIdentityHsl([h, s, l]: readonly number[]): boolean {
  return h === 0 && s === 1 && l === 1;
}

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}
