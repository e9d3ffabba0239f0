import type { WalkSummary } from '../../config/types.js';

export interface OperationSummary {
  truncated?: boolean;
  truncatedReason?: string;
  tip?: string;
  skippedInaccessible?: number;
  symlinksSkipped?: number;
  otherSkipped?: number;
}

export function formatOperationSummary(summary: OperationSummary): string {
  const lines: string[] = [];

  if (summary.truncated) {
    lines.push(
      `!! PARTIAL RESULTS: ${summary.truncatedReason ?? 'results truncated'}`
    );
    if (summary.tip) {
      lines.push(`Tip: ${summary.tip}`);
    }
  }

  if (summary.skippedInaccessible && summary.skippedInaccessible > 0) {
    lines.push(
      `Note: ${summary.skippedInaccessible} item(s) were inaccessible and skipped.`
    );
  }

  if (summary.symlinksSkipped && summary.symlinksSkipped > 0) {
    lines.push(`Note: ${summary.symlinksSkipped} symlink(s) were not followed.`);
  }

  if (summary.otherSkipped && summary.otherSkipped > 0) {
    lines.push(
      `Note: ${summary.otherSkipped} special file(s) (sockets, FIFOs, devices) were skipped.`
    );
  }

  // Appended to a listing, so it opens with a blank line.
  if (lines.length === 0) return '';
  return `\n\n${lines.join('\n')}`;
}

export function formatWalkSummary(summary: WalkSummary): string {
  return formatOperationSummary({
    truncated: summary.truncated,
    truncatedReason: 'entry limit reached',
    tip: 'Increase maxEntries, lower maxDepth, or skip directories to narrow scope.',
    skippedInaccessible: summary.skippedInaccessible,
    symlinksSkipped: summary.symlinksSkipped,
    otherSkipped: summary.otherSkipped,
  });
}
