export type EntryKind = 'directory' | 'file' | 'other';

// Kinds that survive the directory reader
export type AdmittedKind = Exclude<EntryKind, 'other'>;

export interface EntryRecord {
  /** Absolute, symlink-free path of the entry. */
  path: string;
  /** Final path component. */
  name: string;
  kind: AdmittedKind;
}

export interface FlatItem {
  entry: EntryRecord;
  depth: number;
}

export interface WalkConfig {
  readonly root: string;
  readonly skipDotted: boolean;
  /** Canonical absolute paths, compared verbatim against candidates. */
  readonly skipDirectories: readonly string[];
  readonly maxDepth: number;
  readonly maxEntries: number;
}

export interface WalkOptions {
  skipDotted?: boolean;
  skipDirectories?: readonly string[];
  maxDepth?: number;
  maxEntries?: number;
}

export interface WalkSummary {
  totalFiles: number;
  totalDirectories: number;
  maxDepthReached: number;
  truncated: boolean;
  symlinksSkipped: number;
  skippedInaccessible: number;
  otherSkipped: number;
}

export interface SerializedTreeNode {
  path?: string;
  name?: string;
  kind?: AdmittedKind;
  depth: number;
  children: SerializedTreeNode[];
}
