import { fileURLToPath } from 'node:url';

import { afterEach, describe, expect, it } from 'vitest';

import { LaunchError, NotRunningError } from '../src/errors.js';
import { createLspClient, type LspClient } from '../src/service/lsp-client.js';

const FIXTURE_PATH = fileURLToPath(
  new URL('./fixtures/fake-lsp-server.ts', import.meta.url),
);
const ROOT_URI = 'file:///tmp';
const DOC_URI = 'file:///tmp/report.sql';

const clients: LspClient[] = [];

afterEach(async () => {
  await Promise.all(clients.map((client) => client.stop()));
  clients.length = 0;
});

async function startFakeServer(flags: string[] = []): Promise<LspClient> {
  const client = createLspClient({
    command: process.execPath,
    args: ['--import', 'tsx', FIXTURE_PATH, ...flags],
  });
  clients.push(client);
  await client.start();
  return client;
}

describe('LspClient against a real child process', () => {
  it('runs a full editing session', async () => {
    const client = await startFakeServer();
    const text = 'SELECT * FROM ';

    const result = await client.initialize(ROOT_URI);
    expect(result.capabilities).toMatchObject({ hoverProvider: true });
    expect(result.serverInfo).toEqual({
      name: 'fake-sql-server',
      version: '0.0.1',
    });

    await client.initialized();
    await client.didOpen(DOC_URI, 'sql', text);

    await expect(client.completionItems(DOC_URI, 0, 14)).resolves.toEqual([
      { label: 'SELECT', kind: 14, insertText: 'SELECT' },
      {
        label: 'users',
        kind: 7,
        detail: `table (${text.length} chars)`,
        insertText: 'users',
      },
    ]);
    await expect(client.hoverText(DOC_URI, 0, 7)).resolves.toBe('hover 0:7');

    await client.stop();
    expect(client.getState()).toBe('stopped');
  });

  it('delivers a fast answer while a slow one is still pending', async () => {
    const client = await startFakeServer(['--hover-delay-ms', '300']);
    await client.initialize(ROOT_URI);
    const order: string[] = [];

    const hover = client.hoverText(DOC_URI, 3, 4).then((value) => {
      order.push('hover');
      return value;
    });
    await client.completion(DOC_URI, 0, 0);
    order.push('completion');

    await expect(hover).resolves.toBe('hover 3:4');
    expect(order).toEqual(['completion', 'hover']);
  });

  it('survives a malformed frame from the server', async () => {
    const client = await startFakeServer(['--garbage-first']);

    const result = await client.initialize(ROOT_URI);
    expect(result.capabilities).toHaveProperty('completionProvider');
  });

  it('queues notifications the server sends', async () => {
    const client = await startFakeServer(['--log-on-open']);
    await client.initialize(ROOT_URI);
    await client.didOpen(DOC_URI, 'sql', 'SELECT 1');

    await expect(client.notifications.next()).resolves.toEqual({
      jsonrpc: '2.0',
      method: 'window/logMessage',
      params: { type: 3, message: `opened ${DOC_URI}` },
    });
  });

  it('rejects pending calls when the server exits', async () => {
    const client = await startFakeServer([
      '--exit-on-did-change',
      '--hover-delay-ms',
      '5000',
    ]);
    await client.initialize(ROOT_URI);

    const hover = client.hover(DOC_URI, 0, 0).catch((e: unknown) => e);
    await client.didChange(DOC_URI, 'SELECT 2', 2);

    await expect(hover).resolves.toBeInstanceOf(NotRunningError);
    expect(client.getState()).toBe('stopped');
    expect(client.pendingRequests).toBe(0);
  });

  it('reports a missing executable as LaunchError', async () => {
    const client = createLspClient({ command: '/nonexistent/sq-lsp-server' });
    clients.push(client);

    const error = await client.start().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({ command: '/nonexistent/sq-lsp-server' });
    expect(String(error)).toContain('ENOENT');
  });
});
