import { createHash } from 'node:crypto';
import { channel } from 'node:diagnostics_channel';

type DiagnosticsDetail = 0 | 1 | 2;

export interface WalkDiagnosticsEvent {
  phase: 'start' | 'end';
  durationMs?: number;
  ok?: boolean;
  entries?: number;
  truncated?: boolean;
  error?: string;
  path?: string;
}

export const WALK_CHANNEL_NAME = 'dir-walker:walk';
const WALK_CHANNEL = channel(WALK_CHANNEL_NAME);

function parseDiagnosticsEnabled(): boolean {
  const raw = process.env.DIR_WALKER_DIAGNOSTICS;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

function parseDiagnosticsDetail(): DiagnosticsDetail {
  const raw = process.env.DIR_WALKER_DIAGNOSTICS_DETAIL;
  if (!raw) return 0;
  const normalized = raw.trim();
  if (normalized === '2') return 2;
  if (normalized === '1') return 1;
  return 0;
}

function hashPath(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

function normalizePathForDiagnostics(path: string): string | undefined {
  const detail = parseDiagnosticsDetail();
  if (detail === 0) return undefined;
  if (detail === 2) return path;
  return hashPath(path);
}

function resolveDurationMs(startNs: bigint): number {
  const endNs = process.hrtime.bigint();
  return Number(endNs - startNs) / 1_000_000;
}

function resolveErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function withWalkDiagnostics<T>(
  root: string,
  run: () => T,
  describe: (result: T) => { entries: number; truncated: boolean }
): T {
  if (!parseDiagnosticsEnabled() || !WALK_CHANNEL.hasSubscribers) {
    return run();
  }

  const path = normalizePathForDiagnostics(root);
  const startNs = process.hrtime.bigint();
  WALK_CHANNEL.publish({
    phase: 'start',
    path,
  } satisfies WalkDiagnosticsEvent);

  try {
    const result = run();
    WALK_CHANNEL.publish({
      phase: 'end',
      ok: true,
      path,
      durationMs: resolveDurationMs(startNs),
      ...describe(result),
    } satisfies WalkDiagnosticsEvent);
    return result;
  } catch (error: unknown) {
    WALK_CHANNEL.publish({
      phase: 'end',
      ok: false,
      path,
      durationMs: resolveDurationMs(startNs),
      error: resolveErrorMessage(error),
    } satisfies WalkDiagnosticsEvent);
    throw error;
  }
}
