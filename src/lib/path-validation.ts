import * as path from 'node:path';

import { ErrorCode, WalkError } from './errors.js';
import { canonicalizePath, normalizePath } from './path-utils.js';

const PATH_SEPARATOR = process.platform === 'win32' ? '\\' : '/';

let allowedDirectories: string[] = [];

function normalizeForComparison(p: string): string {
  return process.platform === 'win32' ? p.toLowerCase() : p;
}

// Keeps the canonical form beside the requested one so that both the
// requested path and its resolved target can be checked.
function expandAllowedDirectory(dir: string): string[] {
  const normalized = normalizePath(dir);
  try {
    return [normalized, canonicalizePath(normalized)];
  } catch {
    return [normalized];
  }
}

export function setAllowedDirectories(dirs: readonly string[]): void {
  const expanded = dirs
    .filter((d) => d.trim().length > 0)
    .flatMap(expandAllowedDirectory);
  allowedDirectories = [...new Set(expanded)];
}

export function getAllowedDirectories(): string[] {
  return [...allowedDirectories];
}

export function isPathWithinDirectories(
  normalizedPath: string,
  allowedDirs: readonly string[]
): boolean {
  const candidate = normalizeForComparison(normalizedPath);
  return allowedDirs.some((allowedDir) => {
    const allowed = normalizeForComparison(allowedDir);
    const root = normalizeForComparison(path.parse(allowedDir).root);
    if (allowed === root) {
      return candidate.startsWith(allowed);
    }
    return (
      candidate === allowed || candidate.startsWith(allowed + PATH_SEPARATOR)
    );
  });
}

function denyAccess(requested: string): never {
  throw new WalkError(
    ErrorCode.E_ACCESS_DENIED,
    `Access denied - path outside allowed directories: ${requested}`,
    requested
  );
}

/**
 * Returns the canonical form of `requested` when both the requested path and
 * its symlink-free target lie inside the allowed directories.
 */
export function validatePathWithinAllowed(requested: string): string {
  const allowed = getAllowedDirectories();
  if (!isPathWithinDirectories(normalizePath(requested), allowed)) {
    denyAccess(requested);
  }

  const canonical = canonicalizePath(normalizePath(requested));
  if (!isPathWithinDirectories(canonical, allowed)) {
    denyAccess(requested);
  }
  return canonical;
}
