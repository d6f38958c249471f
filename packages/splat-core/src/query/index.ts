export { NONE_QUERY, isSelectionInProgress } from "./types";
export type {
  HitMethod,
  SelectionMethod,
  SelectionTool,
  SelectionOp,
  QuerySelectionAction,
  Query,
  QueryResult,
  QueryDescriptor,
  QueryCursor,
} from "./types";
export {
  hitByMostAlpha,
  hitByClosest,
  locateHit,
  cpuHitTester,
  DEFAULT_ALPHA_THRESHOLD,
} from "./hit";
export type { QueryHitResult, HitTester } from "./hit";
export { QueryToolset } from "./toolset";
