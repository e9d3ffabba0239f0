import { validatePathWithinAllowed } from '../../lib/path-validation.js';
import { createWalker, type Walker } from '../../lib/walker.js';

export interface WalkerToolArgs {
  path: string;
  skipDotted: boolean;
  skipDirectories: string[];
  maxDepth: number;
  maxEntries: number;
}

// Both the root and every skipped directory must resolve inside the
// allowed directories before anything is read.
export function createValidatedWalker(args: WalkerToolArgs): Walker {
  const root = validatePathWithinAllowed(args.path);
  const skipDirectories = args.skipDirectories.map((dir) =>
    validatePathWithinAllowed(dir)
  );
  return createWalker(root, {
    skipDotted: args.skipDotted,
    skipDirectories,
    maxDepth: args.maxDepth,
    maxEntries: args.maxEntries,
  });
}
