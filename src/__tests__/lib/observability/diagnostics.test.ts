import * as diagnosticsChannel from 'node:diagnostics_channel';
import * as path from 'node:path';

import { afterEach, beforeEach, expect, it } from 'vitest';

import {
  WALK_CHANNEL_NAME,
  type WalkDiagnosticsEvent,
} from '../../../lib/observability/diagnostics.js';
import { Walker } from '../../../lib/walker.js';
import { useWalkFixture } from '../fixtures/walk-hooks.js';

const getFixture = useWalkFixture();

const ENV_KEYS = ['DIR_WALKER_DIAGNOSTICS', 'DIR_WALKER_DIAGNOSTICS_DETAIL'];
const previousEnv = new Map<string, string | undefined>();

let events: unknown[] = [];
const onMessage = (message: unknown): void => {
  events.push(message);
};

beforeEach(() => {
  for (const key of ENV_KEYS) previousEnv.set(key, process.env[key]);
  events = [];
  diagnosticsChannel.subscribe(WALK_CHANNEL_NAME, onMessage);
});

afterEach(() => {
  diagnosticsChannel.unsubscribe(WALK_CHANNEL_NAME, onMessage);
  for (const key of ENV_KEYS) {
    const previous = previousEnv.get(key);
    if (previous === undefined) {
      Reflect.deleteProperty(process.env, key);
    } else {
      process.env[key] = previous;
    }
  }
});

it('publishes nothing while diagnostics are disabled', () => {
  Reflect.deleteProperty(process.env, 'DIR_WALKER_DIAGNOSTICS');
  new Walker(getFixture().testDir).walk();
  expect(events).toEqual([]);
});

it('publishes start and end events around a walk', () => {
  process.env.DIR_WALKER_DIAGNOSTICS = '1';
  process.env.DIR_WALKER_DIAGNOSTICS_DETAIL = '0';

  new Walker(getFixture().testDir).maxEntries(2).walk();

  expect(events).toHaveLength(2);
  expect(events[0]).toEqual({ phase: 'start', path: undefined });
  expect(events[1]).toMatchObject({
    phase: 'end',
    ok: true,
    entries: 2,
    truncated: true,
  } satisfies WalkDiagnosticsEvent);
  expect(events[1]).toHaveProperty('durationMs', expect.any(Number));
});

it('publishes a failed end event and rethrows', () => {
  process.env.DIR_WALKER_DIAGNOSTICS = 'true';
  process.env.DIR_WALKER_DIAGNOSTICS_DETAIL = '2';
  const missing = path.join(getFixture().testDir, 'missing');

  expect(() => new Walker(missing).walk()).toThrow(
    `Cannot canonicalize path: ${missing}`
  );
  expect(events[1]).toMatchObject({
    phase: 'end',
    ok: false,
    path: missing,
    error: `Cannot canonicalize path: ${missing}`,
  } satisfies WalkDiagnosticsEvent);
});

it('hashes the root path at detail level 1', () => {
  process.env.DIR_WALKER_DIAGNOSTICS = 'yes';
  process.env.DIR_WALKER_DIAGNOSTICS_DETAIL = '1';

  new Walker(getFixture().testDir).walk();

  expect(events[0]).toMatchObject({
    phase: 'start',
    path: expect.stringMatching(/^[0-9a-f]{16}$/),
  });
});
