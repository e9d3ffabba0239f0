import * as path from 'node:path';

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { afterAll, beforeAll, expect, it } from 'vitest';

import { createServer } from '../../server.js';
import { createEmptyDir, removeDir } from '../lib/fixtures/walk-fixture.js';
import { useWalkFixture } from '../lib/fixtures/walk-hooks.js';

const getFixture = useWalkFixture();

let server: McpServer | undefined;
let client: Client | undefined;
let outsideDir = '';

beforeAll(async () => {
  outsideDir = await createEmptyDir('dir-walker-outside-');
  server = createServer({ cliAllowedDirs: [getFixture().testDir] });
  client = new Client({ name: 'walker-tools-test', version: '0.0.0' });
  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
});

afterAll(async () => {
  await client?.close();
  await server?.close();
  await removeDir(outsideDir);
});

function getClient(): Client {
  if (!client) throw new Error('client not connected');
  return client;
}

function symlinkNote(): string {
  return getFixture().hasSymlink
    ? '\n\nNote: 1 symlink(s) were not followed.'
    : '';
}

it('lists the registered tools', async () => {
  const { tools } = await getClient().listTools();
  expect(tools.map((tool) => tool.name).sort()).toEqual([
    'find_entry',
    'list_allowed_directories',
    'walk_directory',
  ]);
});

it('walk_directory renders the tree as indented text', async () => {
  const { testDir } = getFixture();
  const result = await getClient().callTool({
    name: 'walk_directory',
    arguments: { path: testDir, skipDotted: true },
  });
  expect(result).toMatchObject({
    content: [
      {
        type: 'text',
        text:
          ['[DIR] a', '  [FILE] x.txt', '[FILE] b.txt'].join('\n') +
          symlinkNote(),
      },
    ],
  });
  expect(result.isError).toBeFalsy();
});

it('walk_directory returns a flat list of (entry, depth) pairs', async () => {
  const { testDir } = getFixture();
  const result = await getClient().callTool({
    name: 'walk_directory',
    arguments: { path: testDir, view: 'flat', maxDepth: 0 },
  });
  expect(result.structuredContent).toMatchObject({
    ok: true,
    entries: [
      {
        entry: {
          path: path.join(testDir, '.git'),
          name: '.git',
          kind: 'directory',
        },
        depth: 0,
      },
      {
        entry: {
          path: path.join(testDir, 'a'),
          name: 'a',
          kind: 'directory',
        },
        depth: 0,
      },
      {
        entry: {
          path: path.join(testDir, 'b.txt'),
          name: 'b.txt',
          kind: 'file',
        },
        depth: 0,
      },
    ],
    summary: { totalFiles: 1, totalDirectories: 2, truncated: false },
  });
});

it('walk_directory reports truncation in text and summary', async () => {
  const { testDir } = getFixture();
  const result = await getClient().callTool({
    name: 'walk_directory',
    arguments: { path: testDir, maxEntries: 1 },
  });
  expect(result.structuredContent).toMatchObject({
    ok: true,
    tree: { depth: 0, children: [{ name: '.git', depth: 0, children: [] }] },
    summary: { truncated: true },
  });
  expect(result).toMatchObject({
    content: [
      {
        type: 'text',
        text:
          '[DIR] .git\n\n!! PARTIAL RESULTS: entry limit reached\n' +
          'Tip: Increase maxEntries, lower maxDepth, or skip directories to narrow scope.' +
          (getFixture().hasSymlink
            ? '\nNote: 1 symlink(s) were not followed.'
            : ''),
      },
    ],
  });
});

it('walk_directory denies paths outside the allowed directories', async () => {
  const result = await getClient().callTool({
    name: 'walk_directory',
    arguments: { path: outsideDir },
  });
  expect(result.isError).toBe(true);
  expect(result.structuredContent).toMatchObject({
    ok: false,
    error: { code: 'E_ACCESS_DENIED', path: outsideDir },
  });
});

it('walk_directory denies skipped directories outside the allowed ones', async () => {
  const { testDir } = getFixture();
  const result = await getClient().callTool({
    name: 'walk_directory',
    arguments: { path: testDir, skipDirectories: [outsideDir] },
  });
  expect(result.isError).toBe(true);
  expect(result.structuredContent).toMatchObject({
    ok: false,
    error: { code: 'E_ACCESS_DENIED' },
  });
});

it('walk_directory reports a missing root as E_IO_ERROR', async () => {
  const missing = path.join(getFixture().testDir, 'missing');
  const result = await getClient().callTool({
    name: 'walk_directory',
    arguments: { path: missing },
  });
  expect(result.isError).toBe(true);
  expect(result.structuredContent).toMatchObject({
    ok: false,
    error: { code: 'E_IO_ERROR', path: missing },
  });
});

it('find_entry returns the first match in walk order', async () => {
  const { testDir } = getFixture();
  const expectedPath = path.join(testDir, 'a', 'x.txt');
  const result = await getClient().callTool({
    name: 'find_entry',
    arguments: { path: testDir, name: 'x.txt' },
  });
  expect(result.structuredContent).toEqual({
    ok: true,
    found: true,
    entry: {
      entry: { path: expectedPath, name: 'x.txt', kind: 'file' },
      depth: 1,
    },
  });
  expect(result).toMatchObject({
    content: [{ type: 'text', text: `Found file ${expectedPath} (depth 1)` }],
  });
});

it('find_entry reports a name that is not present', async () => {
  const result = await getClient().callTool({
    name: 'find_entry',
    arguments: { path: getFixture().testDir, name: 'HEAD', skipDotted: true },
  });
  expect(result.structuredContent).toEqual({ ok: true, found: false });
});

it('list_allowed_directories reports the configured directory', async () => {
  const { testDir } = getFixture();
  const result = await getClient().callTool({
    name: 'list_allowed_directories',
    arguments: {},
  });
  expect(result.structuredContent).toMatchObject({
    ok: true,
    allowedDirectories: [testDir],
    count: 1,
    accessStatus: [{ path: testDir, accessible: true, readable: true }],
  });
  expect(result).toMatchObject({
    content: [
      {
        type: 'text',
        text: `Allowed directories (1):\n  - ${testDir} [readable]`,
      },
    ],
  });
});
