import { z } from 'zod';

import {
  MaxDepthSchema,
  MaxEntriesSchema,
  SkipDirectoriesSchema,
  SkipDottedSchema,
  WalkPathSchema,
} from './input-helpers.js';

export const WalkDirectoryInputSchema = {
  path: WalkPathSchema,
  skipDotted: SkipDottedSchema,
  skipDirectories: SkipDirectoriesSchema,
  maxDepth: MaxDepthSchema,
  maxEntries: MaxEntriesSchema,
  view: z
    .enum(['tree', 'flat'])
    .optional()
    .default('tree')
    .describe('Return the nested tree or a flat depth-first list of entries'),
};

export const FindEntryInputSchema = {
  path: WalkPathSchema,
  name: z
    .string()
    .min(1, 'Name cannot be empty')
    .describe('File or directory name to look for (final path component)'),
  skipDotted: SkipDottedSchema,
  skipDirectories: SkipDirectoriesSchema,
  maxDepth: MaxDepthSchema,
  maxEntries: MaxEntriesSchema,
};
