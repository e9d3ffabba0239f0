export {
  findEntryInParent,
  readEntries,
  type ReadEntriesHooks,
} from './file-operations/directory-helpers.js';
export {
  buildTree,
  type WalkResult,
} from './file-operations/directory-tree-builders.js';
export {
  createEntryFilter,
  isAdmitted,
  type FilterConfig,
} from './file-operations/entry-filter.js';
export { compareEntryPaths } from './file-operations/sorting.js';
export { TreeNode } from './file-operations/tree-node.js';
