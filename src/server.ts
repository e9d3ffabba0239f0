import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { SERVER_NAME, SERVER_VERSION } from './lib/constants.js';
import { logger, setMcpServerInstance } from './lib/mcp-logger.js';
import { normalizePath } from './lib/path-utils.js';
import {
  getAllowedDirectories,
  setAllowedDirectories,
} from './lib/path-validation.js';
import { normalizeAllowedDirectories } from './server/cli.js';
import { registerAllTools } from './tools/index.js';

export { parseArgs } from './server/cli.js';

const SERVER_INSTRUCTIONS = `
Directory walker. Read-only, sandboxed to the allowed directories.

- walk_directory: depth-first listing of a directory (or a single file).
  Siblings come directories first, then files, each group in byte order of
  the path. Symbolic links are never followed or reported. Use skipDotted,
  skipDirectories, maxDepth and maxEntries to bound the walk; view "flat"
  returns (entry, depth) pairs in walk order.
- find_entry: first entry in walk order whose name matches exactly.
- list_allowed_directories: where walks may start.
`.trim();

export interface ServerOptions {
  allowCwd?: boolean;
  cliAllowedDirs?: string[];
}

function resolveAllowedDirectories(options: ServerOptions): string[] {
  const cliAllowedDirs = normalizeAllowedDirectories(
    options.cliAllowedDirs ?? []
  );
  const allowCwdDirs =
    options.allowCwd === true ? [normalizePath(process.cwd())] : [];
  return [...cliAllowedDirs, ...allowCwdDirs];
}

export function createServer(options: ServerOptions = {}): McpServer {
  setAllowedDirectories(resolveAllowedDirectories(options));

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        logging: {},
      },
    }
  );

  setMcpServerInstance(server);
  registerAllTools(server);

  return server;
}

export async function startServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const dirs = getAllowedDirectories();
  if (dirs.length === 0) {
    logger.warning(
      'No directories configured. Pass directories or --allow-cwd; every walk will be denied until then.',
      'server'
    );
    return;
  }
  logger.info(`Allowed directories: ${dirs.join(', ')}`, 'server');
}
