import type { PointCloud } from "../point-cloud";

/** A GPU buffer that can be read back asynchronously. */
export interface DownloadableBuffer {
  download(): Promise<Uint8Array>;
}

/** Everything the exporter needs from one loaded model. */
export interface ExportModelSource {
  fileName: string;
  cloud: PointCloud;
  editBuffer: DownloadableBuffer;
  maskBuffer: DownloadableBuffer;
}

/** A destination picked by the user. */
export interface SaveTarget {
  name: string;
  write(bytes: Uint8Array): Promise<void>;
}

export interface SaveDialog {
  /** Resolves to null when the user dismisses the dialog. */
  saveFile(options: { title: string; suggestedName: string }): Promise<SaveTarget | null>;
}

export interface ExportSettings {
  export: boolean;
  edit: boolean;
  mask: boolean;
}

export type ExportColumn = keyof ExportSettings;

export function defaultExportSettings(): ExportSettings {
  return { export: true, edit: true, mask: true };
}
