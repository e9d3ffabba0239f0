import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import {
  FindEntryInputSchema,
  FindEntryOutputSchema,
} from '../schemas/index.js';
import { createValidatedWalker } from './shared/walker-args.js';
import {
  buildToolResponse,
  runWalkTool,
  type ToolResponse,
  type ToolResult,
} from './tool-response.js';

type FindEntryArgs = z.infer<z.ZodObject<typeof FindEntryInputSchema>>;
type FindEntryStructuredResult = z.infer<typeof FindEntryOutputSchema>;

function handleFindEntry(
  args: FindEntryArgs
): ToolResponse<FindEntryStructuredResult> {
  const found = createValidatedWalker(args).walk().find(args.name);

  if (!found?.entry) {
    return buildToolResponse(`No entry named "${args.name}" found.`, {
      ok: true,
      found: false,
    });
  }

  const entry = found.entry;
  const depth = found.depth;
  return buildToolResponse(
    `Found ${entry.kind} ${entry.path} (depth ${depth})`,
    { ok: true, found: true, entry: { entry, depth } }
  );
}

const FIND_ENTRY_TOOL = {
  title: 'Find Entry',
  description:
    'Find the first file or directory with the given name below a path. ' +
    '"First" follows the same depth-first order as walk_directory, ' +
    'so the answer is stable for an unchanged tree.',
  inputSchema: FindEntryInputSchema,
  outputSchema: FindEntryOutputSchema.shape,
  annotations: {
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },
} as const;

export function registerFindEntryTool(server: McpServer): void {
  server.registerTool(
    'find_entry',
    FIND_ENTRY_TOOL,
    async (
      args: FindEntryArgs
    ): Promise<ToolResult<FindEntryStructuredResult>> =>
      runWalkTool(args.path, () => handleFindEntry(args))
  );
}
