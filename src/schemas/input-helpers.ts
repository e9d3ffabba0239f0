import { z } from 'zod';

import {
  TOOL_DEFAULT_MAX_DEPTH,
  TOOL_DEFAULT_MAX_ENTRIES,
} from '../lib/constants.js';

export const WalkPathSchema = z
  .string()
  .min(1, 'Path cannot be empty')
  .describe('Directory or file to walk (absolute or relative)');

export const SkipDottedSchema = z
  .boolean()
  .optional()
  .default(false)
  .describe('Skip files and directories whose name starts with a dot');

export const SkipDirectoriesSchema = z
  .array(z.string().min(1, 'Skipped directory cannot be empty'))
  .max(100, 'Too many skipped directories (max 100)')
  .optional()
  .default([])
  .describe('Directories to leave out of the walk, with everything below them');

export const MaxDepthSchema = z
  .number()
  .int('maxDepth must be an integer')
  .min(0, 'maxDepth cannot be negative')
  .max(1000, 'maxDepth cannot exceed 1,000')
  .optional()
  .default(TOOL_DEFAULT_MAX_DEPTH)
  .describe("Deepest level to include; the root's children are level 0");

export const MaxEntriesSchema = z
  .number()
  .int('maxEntries must be an integer')
  .min(1, 'maxEntries must be at least 1')
  .max(100000, 'maxEntries cannot exceed 100,000')
  .optional()
  .default(TOOL_DEFAULT_MAX_ENTRIES)
  .describe('Maximum number of entries in the result');
