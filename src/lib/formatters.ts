export {
  formatOperationSummary,
  formatWalkSummary,
  type OperationSummary,
} from './formatters/operation-summary.js';
export { formatTree, serializeTree } from './formatters/tree.js';
