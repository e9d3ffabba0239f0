import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerFindEntryTool } from './find-entry.js';
import { registerListAllowedDirectoriesTool } from './list-allowed-dirs.js';
import { registerWalkDirectoryTool } from './walk-directory.js';

export function registerAllTools(server: McpServer): void {
  registerListAllowedDirectoriesTool(server);
  registerWalkDirectoryTool(server);
  registerFindEntryTool(server);
}
