import type { AdmittedKind, EntryRecord } from '../../config/types.js';

const KIND_RANK: Readonly<Record<AdmittedKind, number>> = {
  directory: 0,
  file: 1,
};

// Byte order of the UTF-8 encoded paths; stable across locales and peers.
export function compareEntryPaths(a: string, b: string): number {
  if (a === b) return 0;
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

function compareKindThenPath(a: EntryRecord, b: EntryRecord): number {
  const rankDiff = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rankDiff !== 0) return rankDiff;
  return compareEntryPaths(a.path, b.path);
}

export function sortDirectoriesFirst(entries: EntryRecord[]): EntryRecord[] {
  return entries.sort(compareKindThenPath);
}
