import * as fs from 'node:fs';

import type { WalkConfig, WalkSummary } from '../../config/types.js';
import { ErrorCode, WalkError } from '../errors.js';
import { canonicalizePath } from '../path-utils.js';
import { findEntryInParent, readEntries } from './directory-helpers.js';
import type { ReadEntriesHooks } from './directory-helpers.js';
import {
  buildWalkSummary,
  createReadHooks,
  hitMaxEntries,
  initTraversalState,
  recordEntry,
  type TraversalState,
} from './directory-tree-helpers.js';
import { createEntryFilter } from './entry-filter.js';
import { TreeNode } from './tree-node.js';

export interface WalkResult {
  tree: TreeNode;
  summary: WalkSummary;
}

interface TraversalContext {
  config: WalkConfig;
  admit: (candidate: string) => boolean;
  hooks: ReadEntriesHooks;
  state: TraversalState;
}

function buildChildren(
  ctx: TraversalContext,
  dirPath: string,
  depth: number
): TreeNode[] {
  if (depth > ctx.config.maxDepth) return [];
  if (hitMaxEntries(ctx.state, ctx.config.maxEntries)) return [];

  const children: TreeNode[] = [];
  for (const entry of readEntries(dirPath, ctx.admit, ctx.hooks)) {
    if (hitMaxEntries(ctx.state, ctx.config.maxEntries)) break;
    recordEntry(ctx.state, entry, depth);
    const grandchildren =
      entry.kind === 'directory'
        ? buildChildren(ctx, entry.path, depth + 1)
        : [];
    children.push(new TreeNode(entry, grandchildren, depth));
  }
  return children;
}

function statRoot(root: string): fs.Stats {
  try {
    return fs.statSync(root);
  } catch (error) {
    throw WalkError.fromError(
      ErrorCode.E_IO_ERROR,
      `Cannot read metadata: ${root}`,
      error,
      root
    );
  }
}

/**
 * Walks `config.root` and materializes the whole tree before returning.
 *
 * A file root yields a single node carrying the file's record. A directory
 * root yields a container node without a record whose children (depth 0)
 * are the root's admitted entries. Any directory that cannot be listed
 * aborts the walk with `E_IO_ERROR`.
 */
export function buildTree(config: WalkConfig): WalkResult {
  const root = canonicalizePath(config.root);
  const stats = statRoot(root);
  const state = initTraversalState();

  if (stats.isFile()) {
    const entry = findEntryInParent(root);
    recordEntry(state, entry, 0);
    return {
      tree: new TreeNode(entry, [], 0),
      summary: buildWalkSummary(state),
    };
  }

  if (!stats.isDirectory()) {
    throw new WalkError(
      ErrorCode.E_INVALID_INPUT,
      `Root is neither a regular file nor a directory: ${root}`,
      root
    );
  }

  const resolvedConfig: WalkConfig = { ...config, root };
  const ctx: TraversalContext = {
    config: resolvedConfig,
    admit: createEntryFilter(resolvedConfig),
    hooks: createReadHooks(state),
    state,
  };
  const children = buildChildren(ctx, root, 0);

  return {
    tree: new TreeNode(undefined, children, 0),
    summary: buildWalkSummary(state),
  };
}
