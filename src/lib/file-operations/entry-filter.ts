import type { WalkConfig } from '../../config/types.js';
import { hasDottedComponent } from '../path-utils.js';

export type FilterConfig = Pick<WalkConfig, 'skipDotted' | 'skipDirectories'>;

// The whole absolute path is checked: an entry under a dotted ancestor of
// the root is rejected too. The root itself never reaches the filter.
function isDotSkipped(config: FilterConfig, candidate: string): boolean {
  return config.skipDotted && hasDottedComponent(candidate);
}

/**
 * Decides whether `candidate` (an absolute path) may appear in the tree.
 * Pure: no filesystem access.
 */
export function isAdmitted(config: FilterConfig, candidate: string): boolean {
  if (config.skipDirectories.includes(candidate)) return false;
  return !isDotSkipped(config, candidate);
}

// Same rule as isAdmitted, with the skip list hashed once per walk.
export function createEntryFilter(
  config: FilterConfig
): (candidate: string) => boolean {
  const skipped = new Set(config.skipDirectories);
  return (candidate: string): boolean =>
    !skipped.has(candidate) && !isDotSkipped(config, candidate);
}
