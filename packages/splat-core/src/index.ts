// Async plumbing
export { Deferred, DeferredProducer } from "./deferred";
export type { DeferredState } from "./deferred";
export { Channel } from "./channel";
export { SharedHandle } from "./shared";
export { execTask } from "./task";

// Logging & errors
export { logInfo, logWarn, logError, describeError } from "./logging";
export type { LogContext } from "./logging";
export { MaskParseError, ExportError, ChannelClosedError } from "./errors";

// Mask language
export * from "./mask";

// Point data
export { createPointCloud } from "./point-cloud";
export type { PointCloud } from "./point-cloud";

// Export
export { ExportCoordinator } from "./export/coordinator";
export type { ExportStage } from "./export/coordinator";
export {
  serializeExport,
  suggestedFileName,
  ARCHIVE_FILE_NAME,
} from "./export/serialize";
export type { ExportSelection } from "./export/serialize";
export { writePly, applyEdit } from "./export/ply";
export type { WritePlyOptions } from "./export/ply";
export {
  EditFlag,
  EDIT_POD_SIZE,
  encodeEditPods,
  decodeEditPods,
  encodeMaskWords,
  decodeMaskWords,
} from "./export/edit-pod";
export type { PointEditPod } from "./export/edit-pod";
export { defaultExportSettings } from "./export/types";
export type {
  DownloadableBuffer,
  ExportModelSource,
  ExportSettings,
  ExportColumn,
  SaveDialog,
  SaveTarget,
} from "./export/types";

// Queries
export * from "./query";

// Layout
export {
  DEFAULT_COMPRESSIONS,
  pointLayout,
  compressedSize,
  humanReadableSize,
  isShCompression,
  isCov3dCompression,
} from "./compressions";
export type {
  Compressions,
  ShCompression,
  Cov3dCompression,
  PointLayout,
} from "./compressions";
