import { z } from 'zod';

export const WalkSummarySchema = z.object({
  totalFiles: z.number(),
  totalDirectories: z.number(),
  maxDepthReached: z.number(),
  truncated: z.boolean().describe('Whether the entry limit cut the walk short'),
  symlinksSkipped: z.number(),
  skippedInaccessible: z.number(),
  otherSkipped: z
    .number()
    .describe('Sockets, FIFOs and devices left out of the result'),
});
