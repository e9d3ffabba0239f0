#!/usr/bin/env node
/**
 * Directory walker MCP server.
 *
 * Exposes a depth-first, symlink-free directory walk over stdio. Walks are
 * restricted to the directories given on the command line.
 *
 * Usage:
 *   dir-walker-mcp /path/to/dir1 /path/to/dir2
 *   dir-walker-mcp --allow-cwd  # Use current working directory
 */
import { logger } from './lib/mcp-logger.js';
import { createServer, parseArgs, startServer } from './server.js';

async function main(): Promise<void> {
  const { allowedDirs, allowCwd } = await parseArgs();
  const server = createServer({ allowCwd, cliAllowedDirs: allowedDirs });
  await startServer(server);
}

process.on('SIGTERM', () => {
  process.exit(0);
});

process.on('SIGINT', () => {
  process.exit(0);
});

main().catch((error: unknown) => {
  logger.critical(
    error instanceof Error ? error.message : String(error),
    'server'
  );
  process.exit(1);
});
