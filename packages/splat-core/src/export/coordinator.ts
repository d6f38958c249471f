// ─── Export Coordinator ─────────────────────────────────────────────────────
// Frame-polled export pipeline:
//
//   idle ──confirm()──▶ collecting-downloads ──(edits AND masks)──▶
//   awaiting-save-path ──(destination resolved)──▶ writing ──▶ done
//
// Nothing here blocks: every background step reports through a Deferred that
// poll() advances once per frame. There is no timeout; a stalled download
// keeps the coordinator in collecting-downloads.

import { Deferred } from "../deferred";
import { describeError, logError, logInfo, logWarn } from "../logging";
import {
  serializeExport,
  suggestedFileName,
  type ExportSelection,
} from "./serialize";
import {
  defaultExportSettings,
  type DownloadableBuffer,
  type ExportColumn,
  type ExportModelSource,
  type ExportSettings,
  type SaveDialog,
  type SaveTarget,
} from "./types";

export type ExportStage =
  | {
      kind: "collecting-downloads";
      selection: ExportSelection[];
      edits: Deferred<Uint8Array[]>;
      masks: Deferred<Uint8Array[]>;
    }
  | {
      kind: "awaiting-save-path";
      selection: ExportSelection[];
      edits: Uint8Array[];
      masks: Uint8Array[];
      target: Deferred<SaveTarget | null>;
    }
  | { kind: "writing"; file: string; written: Deferred<number> }
  | { kind: "done" };

const SAVE_TITLE = "Save the exported models";

export class ExportCoordinator {
  /** One entry per model key, in the order given at creation. */
  readonly settings: ExportSettings[];
  private currentStage: ExportStage | null = null;
  private dialog: SaveDialog | null = null;
  private lastError: string | null = null;

  constructor(readonly modelKeys: readonly string[]) {
    this.settings = modelKeys.map(() => defaultExportSettings());
  }

  get stage(): ExportStage | null {
    return this.currentStage;
  }

  get error(): string | null {
    return this.lastError;
  }

  /** Header check-box: set one column for every model. */
  setAll(column: ExportColumn, value: boolean): void {
    for (const settings of this.settings) settings[column] = value;
  }

  /** Whether every model has the column checked. */
  allChecked(column: ExportColumn): boolean {
    return this.settings.every((s) => s[column]);
  }

  /**
   * Start the export with the settings as they are now. `sources` must be in
   * the same order as `settings`. Returns false if nothing was started.
   */
  confirm(sources: readonly ExportModelSource[], dialog: SaveDialog): boolean {
    if (this.currentStage) {
      logWarn("export", "export already in progress");
      return false;
    }
    if (sources.length !== this.settings.length) {
      throw new Error(
        `Expected ${this.settings.length} export sources, got ${sources.length}`,
      );
    }

    const selection: ExportSelection[] = [];
    sources.forEach((source, i) => {
      if (this.settings[i].export) {
        selection.push({ source, settings: { ...this.settings[i] } });
      }
    });

    if (selection.length === 0) {
      logWarn("export", "no models selected");
      return false;
    }

    logInfo("export", "downloading buffers", { models: selection.length });

    this.dialog = dialog;
    this.currentStage = {
      kind: "collecting-downloads",
      selection,
      edits: downloadColumn(selection, "edit"),
      masks: downloadColumn(selection, "mask"),
    };
    return true;
  }

  /**
   * Advance the pipeline. Returns whether the export modal should stay open.
   */
  poll(): boolean {
    const stage = this.currentStage;
    if (!stage) return true;

    switch (stage.kind) {
      case "collecting-downloads": {
        const edits = stage.edits.tryAdvance();
        const masks = stage.masks.tryAdvance();
        if (!edits || !masks) return true;

        const dialog = this.dialog;
        if (!dialog) throw new Error("Export confirmed without a save dialog");

        const suggestedName = suggestedFileName(stage.selection);
        this.currentStage = {
          kind: "awaiting-save-path",
          selection: stage.selection,
          edits,
          masks,
          target: Deferred.spawn(
            () => dialog.saveFile({ title: SAVE_TITLE, suggestedName }),
            "export-save-path",
          ),
        };
        return true;
      }

      case "awaiting-save-path": {
        const target = stage.target.tryAdvance();
        if (!stage.target.isReady) {
          if (stage.target.error !== null) {
            this.finish(`Save dialog failed: ${stage.target.error}`);
            return false;
          }
          return true;
        }

        if (!target) {
          logInfo("export", "save cancelled");
          this.finish(null);
          return false;
        }

        this.write(stage, target);
        return this.currentStage?.kind === "writing";
      }

      case "writing": {
        const bytes = stage.written.tryAdvance();
        if (bytes !== undefined) {
          logInfo("export", "saved", { file: stage.file, bytes });
          this.finish(null);
          return false;
        }
        if (stage.written.error !== null) {
          this.finish(`Save file: ${stage.written.error}`);
          return false;
        }
        return true;
      }

      case "done":
        return false;
    }
  }

  /** Abandon the export. Running downloads and writes finish on their own. */
  cancel(): void {
    const stage = this.currentStage;
    if (stage?.kind === "collecting-downloads") {
      stage.edits.close();
      stage.masks.close();
    } else if (stage?.kind === "awaiting-save-path") {
      stage.target.close();
    } else if (stage?.kind === "writing") {
      stage.written.close();
    }
    this.currentStage = { kind: "done" };
  }

  private write(
    stage: Extract<ExportStage, { kind: "awaiting-save-path" }>,
    target: SaveTarget,
  ): void {
    let bytes: Uint8Array;
    try {
      bytes = serializeExport(stage.selection, stage.edits, stage.masks);
    } catch (err) {
      this.finish(describeWithCause(err));
      return;
    }

    this.currentStage = {
      kind: "writing",
      file: target.name,
      written: Deferred.spawn(async () => {
        await target.write(bytes);
        return bytes.length;
      }, "export-write"),
    };
  }

  private finish(error: string | null): void {
    if (error !== null) {
      this.lastError = error;
      logError("export", error);
    }
    this.currentStage = { kind: "done" };
  }
}

/** Downloads of one buffer kind; skipped when no selected model uses it. */
function downloadColumn(
  selection: readonly ExportSelection[],
  column: "edit" | "mask",
): Deferred<Uint8Array[]> {
  if (!selection.some(({ settings }) => settings[column])) {
    return Deferred.ready(selection.map(() => new Uint8Array(0)), `export-${column}s`);
  }
  return Deferred.spawn(
    () =>
      downloadAll(
        selection,
        (s) => (column === "edit" ? s.editBuffer : s.maskBuffer),
        column,
      ),
    `export-${column}s`,
  );
}

async function downloadAll(
  selection: readonly ExportSelection[],
  pick: (source: ExportModelSource) => DownloadableBuffer,
  buffer: "edit" | "mask",
): Promise<Uint8Array[]> {
  const result: Uint8Array[] = [];
  for (const { source } of selection) {
    try {
      result.push(await pick(source).download());
    } catch (err) {
      logError(
        "export",
        `download ${buffer} buffer failed`,
        { model: source.fileName },
        err,
      );
      result.push(new Uint8Array(0));
    }
  }
  return result;
}

function describeWithCause(err: unknown): string {
  if (err instanceof Error && err.cause !== undefined) {
    return `${err.message}: ${describeError(err.cause)}`;
  }
  return describeError(err);
}
