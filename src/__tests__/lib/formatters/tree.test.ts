import { expect, it } from 'vitest';

import type { EntryRecord } from '../../../config/types.js';
import { TreeNode } from '../../../lib/file-operations/tree-node.js';
import { formatTree, serializeTree } from '../../../lib/formatters.js';

const src: EntryRecord = { path: '/p/src', name: 'src', kind: 'directory' };
const main: EntryRecord = {
  path: '/p/src/main.ts',
  name: 'main.ts',
  kind: 'file',
};
const readme: EntryRecord = { path: '/p/README', name: 'README', kind: 'file' };

function buildSample(): TreeNode {
  return new TreeNode(
    undefined,
    [
      new TreeNode(src, [new TreeNode(main, [], 1)], 0),
      new TreeNode(readme, [], 0),
    ],
    0
  );
}

it('formatTree indents each entry by its depth', () => {
  expect(formatTree(buildSample())).toBe(
    ['[DIR] src', '  [FILE] main.ts', '[FILE] README'].join('\n')
  );
});

it('formatTree renders an empty container as an empty string', () => {
  expect(formatTree(new TreeNode(undefined, [], 0))).toBe('');
});

it('serializeTree keeps records and omits them on the container', () => {
  expect(serializeTree(buildSample())).toEqual({
    depth: 0,
    children: [
      {
        path: '/p/src',
        name: 'src',
        kind: 'directory',
        depth: 0,
        children: [
          {
            path: '/p/src/main.ts',
            name: 'main.ts',
            kind: 'file',
            depth: 1,
            children: [],
          },
        ],
      },
      {
        path: '/p/README',
        name: 'README',
        kind: 'file',
        depth: 0,
        children: [],
      },
    ],
  });
});
