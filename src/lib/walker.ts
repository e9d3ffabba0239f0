import type { WalkConfig, WalkOptions } from '../config/types.js';
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_ENTRIES } from './constants.js';
import { ErrorCode, WalkError } from './errors.js';
import {
  buildTree,
  type WalkResult,
} from './file-operations/directory-tree-builders.js';
import type { TreeNode } from './file-operations/tree-node.js';
import { withWalkDiagnostics } from './observability/diagnostics.js';
import { canonicalizePath } from './path-utils.js';

function defaultConfig(root: string): WalkConfig {
  return Object.freeze({
    root,
    skipDotted: false,
    skipDirectories: Object.freeze([]),
    maxDepth: DEFAULT_MAX_DEPTH,
    maxEntries: DEFAULT_MAX_ENTRIES,
  });
}

function assertInteger(name: string, value: number, min: number): void {
  if (Number.isInteger(value) && value >= min) return;
  throw new WalkError(
    ErrorCode.E_INVALID_INPUT,
    `${name} must be an integer >= ${min}, got ${value}`
  );
}

/**
 * Fluent, immutable walk configuration. Every option returns a new
 * `Walker`; only `walk` and `skipDirectories` touch the filesystem.
 *
 * @example
 * const tree = new Walker('./src').skipDotted().maxDepth(2).walk();
 * for (const { entry, depth } of tree) console.log(depth, entry.path);
 */
export class Walker {
  private config: WalkConfig;

  constructor(root: string) {
    this.config = defaultConfig(root);
  }

  get options(): WalkConfig {
    return this.config;
  }

  private derive(overrides: Partial<Omit<WalkConfig, 'root'>>): Walker {
    const next = new Walker(this.config.root);
    next.config = Object.freeze({ ...this.config, ...overrides });
    return next;
  }

  skipDotted(): Walker {
    return this.derive({ skipDotted: true });
  }

  /**
   * Replaces the skip list. Paths are canonicalized now, so each one must
   * exist; a path that cannot be resolved throws `E_IO_ERROR`.
   */
  skipDirectories(directories: readonly string[]): Walker {
    const canonical = directories.map((dir) => canonicalizePath(dir));
    return this.derive({ skipDirectories: Object.freeze(canonical) });
  }

  maxDepth(depth: number): Walker {
    assertInteger('maxDepth', depth, 0);
    return this.derive({ maxDepth: depth });
  }

  maxEntries(entries: number): Walker {
    assertInteger('maxEntries', entries, 1);
    return this.derive({ maxEntries: entries });
  }

  walk(): TreeNode {
    return this.walkWithSummary().tree;
  }

  walkWithSummary(): WalkResult {
    return withWalkDiagnostics(
      this.config.root,
      () => buildTree(this.config),
      (result) => ({
        entries: result.tree.countEntries(),
        truncated: result.summary.truncated,
      })
    );
  }
}

const DEFAULT_OPTIONS: Required<WalkOptions> = {
  skipDotted: false,
  skipDirectories: [],
  maxDepth: DEFAULT_MAX_DEPTH,
  maxEntries: DEFAULT_MAX_ENTRIES,
};

// Options left undefined keep their defaults.
function resolveOptions(options: WalkOptions): Required<WalkOptions> {
  return {
    skipDotted: options.skipDotted ?? DEFAULT_OPTIONS.skipDotted,
    skipDirectories: options.skipDirectories ?? DEFAULT_OPTIONS.skipDirectories,
    maxDepth: options.maxDepth ?? DEFAULT_OPTIONS.maxDepth,
    maxEntries: options.maxEntries ?? DEFAULT_OPTIONS.maxEntries,
  };
}

export function createWalker(root: string, options: WalkOptions = {}): Walker {
  const resolved = resolveOptions(options);
  const walker = new Walker(root)
    .skipDirectories(resolved.skipDirectories)
    .maxDepth(resolved.maxDepth)
    .maxEntries(resolved.maxEntries);
  return resolved.skipDotted ? walker.skipDotted() : walker;
}
