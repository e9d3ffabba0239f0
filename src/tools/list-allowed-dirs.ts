import * as fs from 'node:fs';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import { ErrorCode } from '../lib/errors.js';
import { getAllowedDirectories } from '../lib/path-validation.js';
import { ListAllowedDirectoriesOutputSchema } from '../schemas/index.js';
import {
  buildToolErrorResponse,
  buildToolResponse,
  type ToolResponse,
  type ToolResult,
} from './tool-response.js';

type ListAllowedDirectoriesStructuredResult = z.infer<
  typeof ListAllowedDirectoriesOutputSchema
>;
type DirectoryAccess = NonNullable<
  ListAllowedDirectoriesStructuredResult['accessStatus']
>[number];

// A walk needs to list the directory and traverse it.
const WALK_ACCESS = fs.constants.R_OK | fs.constants.X_OK;

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

function probeDirectory(dirPath: string): DirectoryAccess {
  if (!isDirectory(dirPath)) {
    return { path: dirPath, accessible: false, readable: false };
  }
  try {
    fs.accessSync(dirPath, WALK_ACCESS);
    return { path: dirPath, accessible: true, readable: true };
  } catch {
    return { path: dirPath, accessible: true, readable: false };
  }
}

function describeAccess(access: DirectoryAccess): string {
  if (access.readable) return 'readable';
  return access.accessible ? 'no read access' : 'inaccessible';
}

function formatAccessList(accessStatus: readonly DirectoryAccess[]): string {
  if (accessStatus.length === 0) {
    return 'No directories are currently allowed.';
  }
  const lines = accessStatus.map(
    (access) => `  - ${access.path} [${describeAccess(access)}]`
  );
  return [`Allowed directories (${accessStatus.length}):`, ...lines].join('\n');
}

function buildHint(count: number): string {
  if (count === 0) {
    return 'No directories configured. Every walk will be denied.';
  }
  if (count === 1) {
    return 'Single directory configured. All walks stay inside it.';
  }
  return `${count} directories configured. Walks may start in any of them.`;
}

function handleListAllowedDirectories(): ToolResponse<
  ListAllowedDirectoriesStructuredResult
> {
  const dirs = getAllowedDirectories();
  const accessStatus = dirs.map(probeDirectory);

  return buildToolResponse(formatAccessList(accessStatus), {
    ok: true,
    allowedDirectories: dirs,
    count: dirs.length,
    accessStatus,
    hint: buildHint(dirs.length),
  });
}

const LIST_ALLOWED_DIRECTORIES_TOOL = {
  title: 'List Allowed Directories',
  description:
    'Returns the directories this server may walk and whether each is readable. ' +
    'walk_directory and find_entry reject paths outside them.',
  outputSchema: ListAllowedDirectoriesOutputSchema.shape,
  annotations: {
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },
} as const;

export function registerListAllowedDirectoriesTool(server: McpServer): void {
  server.registerTool(
    'list_allowed_directories',
    LIST_ALLOWED_DIRECTORIES_TOOL,
    async (): Promise<ToolResult<ListAllowedDirectoriesStructuredResult>> => {
      try {
        return handleListAllowedDirectories();
      } catch (error: unknown) {
        return buildToolErrorResponse(error, ErrorCode.E_UNKNOWN);
      }
    }
  );
}
