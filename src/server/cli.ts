import * as fs from 'node:fs/promises';
import { parseArgs as parseNodeArgs } from 'node:util';

import { normalizePath } from '../lib/path-utils.js';

export interface ParseArgsResult {
  allowedDirs: string[];
  allowCwd: boolean;
}

export const USAGE = 'Usage: dir-walker-mcp [--allow-cwd] [directory ...]';

async function resolveAllowedDirectory(arg: string): Promise<string> {
  if (arg.includes('\0')) {
    throw new Error('Error: Directory argument contains a null byte');
  }

  const resolved = normalizePath(arg);
  const stats = await fs.stat(resolved).catch((error: unknown) => {
    throw new Error(`Error: Cannot access directory '${arg}'`, {
      cause: error,
    });
  });
  if (!stats.isDirectory()) {
    throw new Error(`Error: '${arg}' is not a directory`);
  }
  return resolved;
}

// Blank entries are dropped; the rest are resolved against the working
// directory.
export function normalizeAllowedDirectories(dirs: readonly string[]): string[] {
  const normalized: string[] = [];
  for (const dir of dirs) {
    const trimmed = dir.trim();
    if (trimmed.length > 0) normalized.push(normalizePath(trimmed));
  }
  return normalized;
}

function parseFlags(argv: readonly string[]): {
  allowCwd: boolean;
  directories: string[];
} {
  try {
    const { values, positionals } = parseNodeArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      options: {
        'allow-cwd': { type: 'boolean', default: false },
      } as const,
    });
    return { allowCwd: values['allow-cwd'], directories: positionals };
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Error: ${reason}\n${USAGE}`, { cause: error });
  }
}

export async function parseArgs(
  argv: readonly string[] = process.argv.slice(2)
): Promise<ParseArgsResult> {
  const { allowCwd, directories } = parseFlags(argv);
  const allowedDirs = await Promise.all(
    directories.map(resolveAllowedDirectory)
  );
  return { allowedDirs, allowCwd };
}
