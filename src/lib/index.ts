export type {
  AdmittedKind,
  EntryKind,
  EntryRecord,
  FlatItem,
  SerializedTreeNode,
  WalkConfig,
  WalkOptions,
  WalkSummary,
} from '../config/types.js';
export { DEFAULT_MAX_DEPTH, DEFAULT_MAX_ENTRIES } from './constants.js';
export {
  classifyError,
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  WalkError,
  type DetailedError,
} from './errors.js';
export * from './file-operations.js';
export * from './formatters.js';
export {
  WALK_CHANNEL_NAME,
  type WalkDiagnosticsEvent,
} from './observability/diagnostics.js';
export { createWalker, Walker } from './walker.js';
