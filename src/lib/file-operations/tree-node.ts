import type { EntryRecord, FlatItem } from '../../config/types.js';

// Pre-order over an explicit stack; children are pushed in reverse so the
// first child is visited next.
function* preOrder(root: TreeNode): Generator<TreeNode> {
  const stack: TreeNode[] = [root];
  let node = stack.pop();
  while (node) {
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
    node = stack.pop();
  }
}

/**
 * One node of a walk result. `entry` is absent only on the synthetic
 * container returned for a directory root; every other node carries the
 * record read from its parent directory.
 */
export class TreeNode {
  constructor(
    readonly entry: EntryRecord | undefined,
    readonly children: readonly TreeNode[],
    readonly depth: number
  ) {}

  /** Entries in depth-first pre-order, directories before files. */
  *flatten(): Generator<FlatItem> {
    for (const node of preOrder(this)) {
      if (node.entry) {
        yield { entry: node.entry, depth: node.depth };
      }
    }
  }

  [Symbol.iterator](): Generator<FlatItem> {
    return this.flatten();
  }

  /**
   * First node, in the order of `flatten`, whose final path component is
   * `name`.
   */
  find(name: string): TreeNode | undefined {
    for (const node of preOrder(this)) {
      if (node.entry?.name === name) return node;
    }
    return undefined;
  }

  countEntries(): number {
    let count = 0;
    for (const node of preOrder(this)) {
      if (node.entry) count++;
    }
    return count;
  }
}
