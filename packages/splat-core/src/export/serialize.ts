import { zipSync, type Zippable } from "fflate";
import { ExportError } from "../errors";
import { decodeEditPods, decodeMaskWords } from "./edit-pod";
import { writePly } from "./ply";
import type { ExportModelSource, ExportSettings } from "./types";

/** A model chosen at confirm time, with the settings it was confirmed with. */
export interface ExportSelection {
  source: ExportModelSource;
  settings: ExportSettings;
}

export const ARCHIVE_FILE_NAME = "models.zip";

export function suggestedFileName(selection: readonly ExportSelection[]): string {
  if (selection.length !== 1) return ARCHIVE_FILE_NAME;
  const { fileName } = selection[0].source;
  return fileName.toLowerCase().endsWith(".ply") ? fileName : `${fileName}.ply`;
}

/**
 * Serialize the selected models. One model is written as bare PLY; several
 * become one deflated zip entry each. Any model failing aborts the whole
 * export, so nothing partial ever reaches the destination.
 *
 * `edits[i]` and `masks[i]` are the downloaded buffers of `selection[i]`.
 */
export function serializeExport(
  selection: readonly ExportSelection[],
  edits: readonly Uint8Array[],
  masks: readonly Uint8Array[],
): Uint8Array {
  if (selection.length === 0) {
    throw new ExportError("No models selected for export");
  }

  const plys = selection.map((entry, i) => serializeModel(entry, edits[i], masks[i]));
  if (plys.length === 1) return plys[0];

  const entries: Zippable = {};
  selection.forEach(({ source }, i) => {
    entries[entryName(source.fileName, entries)] = plys[i];
  });
  return zipSync(entries, { level: 6 });
}

function serializeModel(
  { source, settings }: ExportSelection,
  edits: Uint8Array | undefined,
  mask: Uint8Array | undefined,
): Uint8Array {
  try {
    return writePly(source.cloud, {
      edits: settings.edit ? decodeEditPods(edits ?? new Uint8Array(0)) : null,
      mask: settings.mask ? decodeMaskWords(mask ?? new Uint8Array(0)) : null,
    });
  } catch (err) {
    throw new ExportError(`Failed to serialize ${source.fileName}`, { cause: err });
  }
}

// "a.ply", "1_a.ply", "2_a.ply", ...
function entryName(fileName: string, taken: Zippable): string {
  if (!Object.hasOwn(taken, fileName)) return fileName;
  let n = 1;
  while (Object.hasOwn(taken, `${n}_${fileName}`)) n++;
  return `${n}_${fileName}`;
}
