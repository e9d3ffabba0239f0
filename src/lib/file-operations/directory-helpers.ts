import * as fs from 'node:fs';
import * as path from 'node:path';

import type { EntryKind, EntryRecord } from '../../config/types.js';
import { ErrorCode, WalkError } from '../errors.js';
import { sortDirectoriesFirst } from './sorting.js';

// ============================================================================
// DIRECTORY READING
// ============================================================================

export interface ReadEntriesHooks {
  onSymlink?: (fullPath: string) => void;
  onInaccessible?: (fullPath: string, error: unknown) => void;
  onOther?: (fullPath: string) => void;
}

function listDirectory(dirPath: string): string[] {
  try {
    return fs.readdirSync(dirPath);
  } catch (error) {
    throw WalkError.fromError(
      ErrorCode.E_IO_ERROR,
      `Cannot read directory: ${dirPath}`,
      error,
      dirPath
    );
  }
}

function tryLstat(
  fullPath: string,
  hooks: ReadEntriesHooks
): fs.Stats | null {
  try {
    return fs.lstatSync(fullPath);
  } catch (error) {
    hooks.onInaccessible?.(fullPath, error);
    return null;
  }
}

function resolveEntryKind(
  fullPath: string,
  hooks: ReadEntriesHooks
): EntryKind | null {
  const stats = tryLstat(fullPath, hooks);
  if (!stats) return null;
  if (stats.isSymbolicLink()) {
    hooks.onSymlink?.(fullPath);
    return null;
  }
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

function toEntryRecord(
  dirPath: string,
  name: string,
  hooks: ReadEntriesHooks
): EntryRecord | null {
  const fullPath = path.join(dirPath, name);
  const kind = resolveEntryKind(fullPath, hooks);
  if (kind === null) return null;
  if (kind === 'other') {
    hooks.onOther?.(fullPath);
    return null;
  }
  return { path: fullPath, name, kind };
}

/**
 * Lists the admitted, non-symlink children of `dirPath`: directories first,
 * then files, each group in byte order of their paths.
 *
 * Throws `E_IO_ERROR` when the directory itself cannot be listed. A child
 * whose metadata cannot be read is dropped and reported to
 * `hooks.onInaccessible`.
 */
export function readEntries(
  dirPath: string,
  admit: (candidate: string) => boolean,
  hooks: ReadEntriesHooks = {}
): EntryRecord[] {
  const entries: EntryRecord[] = [];

  for (const name of listDirectory(dirPath)) {
    if (!admit(path.join(dirPath, name))) continue;
    const entry = toEntryRecord(dirPath, name, hooks);
    if (entry) entries.push(entry);
  }

  return sortDirectoriesFirst(entries);
}

// Looks `filePath` up in its parent's listing so the record comes from the
// directory rather than from the path string.
export function findEntryInParent(filePath: string): EntryRecord {
  const parent = path.dirname(filePath);
  const name = path.basename(filePath);

  if (parent === filePath || !listDirectory(parent).includes(name)) {
    throw new WalkError(
      ErrorCode.E_INVALID_INPUT,
      `Path is not listed by its parent directory: ${filePath}`,
      filePath
    );
  }

  const entry = toEntryRecord(parent, name, {
    onInaccessible: (_fullPath, error) => {
      throw WalkError.fromError(
        ErrorCode.E_IO_ERROR,
        `Cannot read metadata: ${filePath}`,
        error,
        filePath
      );
    },
  });
  if (!entry) {
    throw new WalkError(
      ErrorCode.E_INVALID_INPUT,
      `Path is neither a regular file nor a directory: ${filePath}`,
      filePath
    );
  }
  return entry;
}
