import type { EntryRecord, WalkSummary } from '../../config/types.js';
import { logger } from '../mcp-logger.js';
import type { ReadEntriesHooks } from './directory-helpers.js';

const LOGGER_NAME = 'walker';

export interface TraversalState {
  visited: number;
  totalFiles: number;
  totalDirectories: number;
  maxDepthReached: number;
  truncated: boolean;
  symlinksSkipped: number;
  skippedInaccessible: number;
  otherSkipped: number;
}

export function initTraversalState(): TraversalState {
  return {
    visited: 0,
    totalFiles: 0,
    totalDirectories: 0,
    maxDepthReached: 0,
    truncated: false,
    symlinksSkipped: 0,
    skippedInaccessible: 0,
    otherSkipped: 0,
  };
}

// True once the entry budget is spent; the first hit marks the walk truncated.
export function hitMaxEntries(
  state: TraversalState,
  maxEntries: number
): boolean {
  if (state.visited < maxEntries) return false;
  if (!state.truncated) {
    state.truncated = true;
    logger.debug(
      `Entry limit of ${maxEntries} reached; remaining entries discarded`,
      LOGGER_NAME
    );
  }
  return true;
}

export function recordEntry(
  state: TraversalState,
  entry: EntryRecord,
  depth: number
): void {
  state.visited++;
  state.maxDepthReached = Math.max(state.maxDepthReached, depth);
  if (entry.kind === 'directory') {
    state.totalDirectories++;
  } else {
    state.totalFiles++;
  }
}

export function createReadHooks(state: TraversalState): ReadEntriesHooks {
  return {
    onSymlink: () => {
      state.symlinksSkipped++;
    },
    onInaccessible: (fullPath, error) => {
      state.skippedInaccessible++;
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(
        `Skipping unreadable entry ${fullPath}: ${reason}`,
        LOGGER_NAME
      );
    },
    onOther: () => {
      state.otherSkipped++;
    },
  };
}

export function buildWalkSummary(state: TraversalState): WalkSummary {
  return {
    totalFiles: state.totalFiles,
    totalDirectories: state.totalDirectories,
    maxDepthReached: state.maxDepthReached,
    truncated: state.truncated,
    symlinksSkipped: state.symlinksSkipped,
    skippedInaccessible: state.skippedInaccessible,
    otherSkipped: state.otherSkipped,
  };
}
