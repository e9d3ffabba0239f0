import { z } from 'zod';

import type { SerializedTreeNode } from '../config/types.js';

export const EntryKindSchema = z.enum(['directory', 'file']);

export const ErrorSchema = z.object({
  code: z.string().describe('Error code (e.g., E_IO_ERROR)'),
  message: z.string().describe('Human-readable error message'),
  path: z.string().optional().describe('Path that caused the error'),
  suggestion: z.string().optional().describe('Suggested action to resolve'),
});

export const EntryRecordSchema = z.object({
  path: z.string().describe('Absolute, symlink-free path'),
  name: z.string().describe('Final path component'),
  kind: EntryKindSchema,
});

export const TreeNodeSchema: z.ZodType<SerializedTreeNode> = z.lazy(() =>
  z.object({
    path: z.string().optional(),
    name: z.string().optional(),
    kind: EntryKindSchema.optional(),
    depth: z
      .number()
      .describe("Depth below the root; the root's children are 0"),
    children: z.array(TreeNodeSchema),
  })
);
