import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { ErrorCode, WalkError } from './errors.js';

function expandHome(filepath: string): string {
  if (filepath.startsWith('~/') || filepath === '~') {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

export function normalizePath(p: string): string {
  const expanded = expandHome(p);
  const resolved = path.resolve(expanded);

  if (process.platform === 'win32' && /^[A-Z]:/.test(resolved)) {
    return resolved.charAt(0).toLowerCase() + resolved.slice(1);
  }

  return resolved;
}

/**
 * Resolves `p` against the working directory and follows every symlink on
 * the way, so the result names the same inode as any other canonical path
 * produced during a walk.
 */
export function canonicalizePath(p: string): string {
  try {
    return fs.realpathSync.native(path.resolve(p));
  } catch (error) {
    throw WalkError.fromError(
      ErrorCode.E_IO_ERROR,
      `Cannot canonicalize path: ${p}`,
      error,
      p
    );
  }
}

const SEPARATORS = process.platform === 'win32' ? /[\\/]/ : /\//;

export function splitPathComponents(p: string): string[] {
  return p.split(SEPARATORS).filter((part) => part.length > 0);
}

export function hasDottedComponent(p: string): boolean {
  return splitPathComponents(p).some((part) =>
    part.startsWith('.')
  );
}
