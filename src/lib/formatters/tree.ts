import type { SerializedTreeNode } from '../../config/types.js';
import type { TreeNode } from '../file-operations/tree-node.js';

export function formatTree(tree: TreeNode): string {
  const lines: string[] = [];
  for (const { entry, depth } of tree.flatten()) {
    const icon = entry.kind === 'directory' ? '[DIR]' : '[FILE]';
    lines.push(`${'  '.repeat(depth)}${icon} ${entry.name}`);
  }
  return lines.join('\n');
}

export function serializeTree(node: TreeNode): SerializedTreeNode {
  const serialized: SerializedTreeNode = {
    depth: node.depth,
    children: node.children.map(serializeTree),
  };
  if (node.entry) {
    serialized.path = node.entry.path;
    serialized.name = node.entry.name;
    serialized.kind = node.entry.kind;
  }
  return serialized;
}
