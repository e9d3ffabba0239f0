import { z } from 'zod';

import { EntryRecordSchema, ErrorSchema, TreeNodeSchema } from './common.js';
import { WalkSummarySchema } from './output-helpers.js';

export const FlatItemSchema = z.object({
  entry: EntryRecordSchema,
  depth: z.number(),
});

export const WalkDirectoryOutputSchema = z.object({
  ok: z.boolean(),
  tree: TreeNodeSchema.optional(),
  entries: z.array(FlatItemSchema).optional(),
  summary: WalkSummarySchema.optional(),
  error: ErrorSchema.optional(),
});

export const FindEntryOutputSchema = z.object({
  ok: z.boolean(),
  found: z.boolean().optional(),
  entry: FlatItemSchema.optional(),
  error: ErrorSchema.optional(),
});

export const ListAllowedDirectoriesOutputSchema = z.object({
  ok: z.boolean(),
  allowedDirectories: z.array(z.string()).optional(),
  count: z.number().optional().describe('Number of allowed directories'),
  accessStatus: z
    .array(
      z.object({
        path: z.string(),
        accessible: z.boolean().describe('Whether the directory exists'),
        readable: z.boolean().describe('Whether the directory is readable'),
      })
    )
    .optional(),
  hint: z.string().optional(),
  error: ErrorSchema.optional(),
});
