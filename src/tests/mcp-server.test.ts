import { strict as assert } from 'node:assert';
import { after, before, describe, it } from 'node:test';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createSearchServer, runSearchTree, toSearchConfig } from '../mcp/server.js';
import { searchTreeInputSchema } from '../schemas.js';
import { makeTempTree, removeTree, sorted } from './fixtures.js';

describe('toSearchConfig', () => {
  it('maps tool input onto a search config', () => {
    const input = searchTreeInputSchema.parse({ directory: 'src', pattern: 'x', type: 'files', depthLimit: 2 });
    assert.deepEqual(toSearchConfig(input), {
      maxDepth: 1,
      exactMatch: false,
      showDirs: false,
      showFiles: true,
      showHidden: false,
      pattern: 'x',
    });
  });

  it('leaves depth unbounded without a limit', () => {
    const input = searchTreeInputSchema.parse({ type: 'dirs' });
    const config = toSearchConfig(input);
    assert.equal(config.maxDepth, -1);
    assert.equal(config.showFiles, false);
    assert.equal(input.directory, '.');
    assert.equal(input.limit, 1000);
  });
});

describe('search_tree tool', () => {
  let root: string;
  let client: Client;

  before(async () => {
    root = await makeTempTree({
      'alpha.txt': 'a',
      'beta.txt': 'b',
      docs: {
        'alpha-notes.md': 'n',
      },
    });

    const server = createSearchServer({ onSubdirectoryError: 'skip' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'treeseek-test', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  after(async () => {
    await client.close();
    await removeTree(root);
  });

  it('is listed by the server', async () => {
    const { tools } = await client.listTools();
    assert.deepEqual(
      tools.map((tool) => tool.name),
      ['search_tree'],
    );
  });

  it('returns matching paths as structured content', async () => {
    const result = await client.callTool({ name: 'search_tree', arguments: { directory: root, pattern: 'alpha' } });
    assert.notEqual(result.isError, true);
    const structured = result.structuredContent;
    assert.deepEqual(
      sorted(readPaths(structured)),
      sorted([`${root}/alpha.txt`, `${root}/docs/alpha-notes.md`]),
    );
    assert.equal(readField(structured, 'truncated'), false);
    assert.deepEqual(readField(structured, 'skipped'), []);
  });

  it('reports a missing directory as a tool error', async () => {
    const result = await client.callTool({ name: 'search_tree', arguments: { directory: `${root}/missing` } });
    assert.equal(result.isError, true);
  });
});

function readField(content: unknown, key: string): unknown {
  if (typeof content !== 'object' || content === null) return undefined;
  return Object.entries(content).find(([name]) => name === key)?.[1];
}

function readPaths(content: unknown): string[] {
  const paths = readField(content, 'paths');
  if (!Array.isArray(paths)) return [];
  return paths.filter((item): item is string => typeof item === 'string');
}

describe('runSearchTree', () => {
  let root: string;

  before(async () => {
    root = await makeTempTree({ 'one.txt': '1', 'two.txt': '2', 'three.txt': '3' });
  });

  after(async () => {
    await removeTree(root);
  });

  it('caps the number of returned paths', async () => {
    const input = searchTreeInputSchema.parse({ directory: root, limit: 2 });
    const result = await runSearchTree(input, { onSubdirectoryError: 'skip' });
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.output.paths.length, 2);
    assert.equal(result.output.truncated, true);
  });

  it('surfaces the top-level failure', async () => {
    const input = searchTreeInputSchema.parse({ directory: `${root}/one.txt` });
    const result = await runSearchTree(input, { onSubdirectoryError: 'skip' });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, 'ENOTDIR');
  });
});
