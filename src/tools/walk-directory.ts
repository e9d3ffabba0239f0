import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import {
  formatTree,
  formatWalkSummary,
  serializeTree,
} from '../lib/formatters.js';
import type { WalkResult } from '../lib/file-operations.js';
import {
  WalkDirectoryInputSchema,
  WalkDirectoryOutputSchema,
} from '../schemas/index.js';
import { createValidatedWalker } from './shared/walker-args.js';
import {
  buildToolResponse,
  runWalkTool,
  type ToolResponse,
  type ToolResult,
} from './tool-response.js';

type WalkDirectoryArgs = z.infer<z.ZodObject<typeof WalkDirectoryInputSchema>>;
type WalkDirectoryStructuredResult = z.infer<typeof WalkDirectoryOutputSchema>;

function buildStructuredResult(
  result: WalkResult,
  view: WalkDirectoryArgs['view']
): WalkDirectoryStructuredResult {
  if (view === 'flat') {
    return {
      ok: true,
      entries: [...result.tree.flatten()],
      summary: result.summary,
    };
  }
  return {
    ok: true,
    tree: serializeTree(result.tree),
    summary: result.summary,
  };
}

function buildTextResult(result: WalkResult): string {
  const listing = formatTree(result.tree);
  const text = listing.length > 0 ? listing : '(no entries)';
  return text + formatWalkSummary(result.summary);
}

function handleWalkDirectory(
  args: WalkDirectoryArgs
): ToolResponse<WalkDirectoryStructuredResult> {
  const result = createValidatedWalker(args).walkWithSummary();
  return buildToolResponse(
    buildTextResult(result),
    buildStructuredResult(result, args.view)
  );
}

const WALK_DIRECTORY_TOOL = {
  title: 'Walk Directory',
  description:
    'Walk a directory (or a single file) and return its entries in a stable order: ' +
    'directories before files, each group sorted by path, depth-first. ' +
    'Symbolic links are never followed. ' +
    'Use skipDotted and skipDirectories to leave parts of the tree out, ' +
    'maxDepth and maxEntries to bound the walk, and view="flat" for a flat list.',
  inputSchema: WalkDirectoryInputSchema,
  outputSchema: WalkDirectoryOutputSchema.shape,
  annotations: {
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },
} as const;

export function registerWalkDirectoryTool(server: McpServer): void {
  server.registerTool(
    'walk_directory',
    WALK_DIRECTORY_TOOL,
    async (
      args: WalkDirectoryArgs
    ): Promise<ToolResult<WalkDirectoryStructuredResult>> =>
      runWalkTool(args.path, () => handleWalkDirectory(args))
  );
}
