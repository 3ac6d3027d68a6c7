import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ServerParams, ToolDescriptor } from '../../types.js';
import type { ToolServerConnection } from '../../tools/tool-server-client.js';
import type { ClientFactory } from '../../tools/tool-server-registry.js';

import { ToolExecutionError, ToolNotFoundError, TransportInitError } from '../../errors.js';
import { normalizeCallToolResult, ToolServerClient } from '../../tools/tool-server-client.js';
import { ToolServerRegistry } from '../../tools/tool-server-registry.js';
import { createDeferred, delay, type Deferred } from '../../utils.js';
import { createToyFsServer, inMemoryClientFactory, inMemoryTransportFactory, STDIO_PLACEHOLDER } from '../helpers/in-memory-tool-server.js';

const registries: ToolServerRegistry[] = [];

const buildRegistry = (clientFactory: ClientFactory = inMemoryClientFactory({ fs: createToyFsServer })): ToolServerRegistry => {
  const registry = new ToolServerRegistry(
    { servers: { fs: STDIO_PLACEHOLDER, broken: STDIO_PLACEHOLDER }, disabled: ['off'] },
    { clientFactory }
  );
  registries.push(registry);
  return registry;
};

afterEach(async () => {
  await Promise.allSettled(registries.splice(0).map(async (r) => { await r.close(); }));
});

const NOOP_TOOLS: ToolDescriptor[] = [{ name: 'noop', description: '', inputSchema: { type: 'object' } }];

interface FakeConnectionOptions {
  handshake?: () => Promise<void>;
  onClose?: () => Promise<void>;
}

const fakeConnection = (name: string, opts: FakeConnectionOptions = {}): ToolServerConnection => ({
  name,
  params: STDIO_PLACEHOLDER,
  initialized: true,
  initialize: async () => {
    await opts.handshake?.();
    return NOOP_TOOLS;
  },
  listTools: () => NOOP_TOOLS,
  callTool: async () => await Promise.resolve({ content: [], isError: false }),
  close: async () => { await opts.onClose?.(); },
});

// handshakes that finish only when the test opens their gate
const gatedServers = (names: readonly string[]): {
  servers: Record<string, ServerParams>;
  gates: Record<string, Deferred<void>>;
  started: string[];
  clientFactory: ClientFactory;
} => {
  const started: string[] = [];
  const gates = Object.fromEntries(names.map((name) => [name, createDeferred<void>()]));
  const servers = Object.fromEntries(names.map((name) => [name, STDIO_PLACEHOLDER]));
  const clientFactory: ClientFactory = (name) => fakeConnection(name, {
    handshake: async () => {
      started.push(name);
      await gates[name].promise;
    },
  });
  return { servers, gates, started, clientFactory };
};

describe('ToolServerClient', () => {
  it('lists tools after initialize and calls them', async () => {
    const client = new ToolServerClient('fs', STDIO_PLACEHOLDER, { transportFactory: inMemoryTransportFactory({ fs: createToyFsServer }) });
    expect(client.initialized).toBe(false);
    const tools = await client.initialize();
    expect(tools.map((t) => t.name)).toEqual(['list_files', 'echo_text', 'explode']);
    const outcome = await client.callTool('list_files', { path: '/docs' });
    expect(outcome).toEqual({ content: [{ type: 'text', text: 'guide.md\nnotes.txt' }], isError: false });
    await client.close();
    expect(client.initialized).toBe(false);
  });

  it('wraps a failed handshake in TransportInitError', async () => {
    const client = new ToolServerClient('ghost', STDIO_PLACEHOLDER, { transportFactory: inMemoryTransportFactory({}) });
    await expect(client.initialize()).rejects.toThrow(TransportInitError);
    await expect(client.initialize()).rejects.toThrow("tool server 'ghost' failed to initialize: spawn ghost ENOENT");
  });

  it('refuses calls before initialize', async () => {
    const client = new ToolServerClient('fs', STDIO_PLACEHOLDER);
    await expect(client.callTool('list_files', {})).rejects.toBeInstanceOf(ToolExecutionError);
  });
});

describe('normalizeCallToolResult', () => {
  it('keeps structured content', () => {
    expect(normalizeCallToolResult({ content: [], structuredContent: { count: 2 }, isError: false }))
      .toEqual({ content: [], isError: false, structuredContent: { count: 2 } });
  });

  it('renders a legacy toolResult as text', () => {
    expect(normalizeCallToolResult({ toolResult: { ok: true } }))
      .toEqual({ content: [{ type: 'text', text: '{"ok":true}' }], isError: false });
  });
});

describe('ToolServerRegistry', () => {
  it('puts every configured server in exactly one of usable, disabled or failed', async () => {
    const registry = buildRegistry();
    await registry.initialize();
    const status = registry.status();
    expect(status.initialized).toBe(true);
    expect(Object.keys(status.usable)).toEqual(['fs']);
    expect(status.disabled).toEqual(['off']);
    expect(Object.keys(status.failed)).toEqual(['broken']);
    expect(status.failed.broken.error).toBe("tool server 'broken' failed to initialize: spawn broken ENOENT");
  });

  it('exposes tools under server-tool names', async () => {
    const registry = buildRegistry();
    await registry.initialize();
    const catalog = registry.buildCatalog();
    expect(catalog.map((t) => t.name)).toEqual(['fs-list_files', 'fs-echo_text', 'fs-explode']);
    expect(catalog[0].identity).toEqual({ serverName: 'fs', toolName: 'list_files' });
    expect(registry.resolveTool('fs-echo_text')).toEqual({ serverName: 'fs', toolName: 'echo_text' });
    expect(registry.resolveTool('other-thing')).toEqual({ serverName: 'other', toolName: 'thing' });
  });

  it('dispatches calls to the owning server', async () => {
    const registry = buildRegistry();
    await registry.initialize();
    const outcome = await registry.call('fs', 'echo_text', { text: 'hello' });
    expect(outcome).toEqual({ content: [{ type: 'text', text: 'hello' }], isError: false });
  });

  it('reports a throwing tool as a tool-level error', async () => {
    const registry = buildRegistry();
    await registry.initialize();
    const outcome = await registry.call('fs', 'explode', {});
    expect(outcome.isError).toBe(true);
    expect(JSON.stringify(outcome.content)).toContain('toy failure');
  });

  it('rejects calls to failed servers and unadvertised tools', async () => {
    const registry = buildRegistry();
    await registry.initialize();
    await expect(registry.call('broken', 'anything', {})).rejects.toBeInstanceOf(ToolNotFoundError);
    await expect(registry.call('off', 'anything', {})).rejects.toBeInstanceOf(ToolNotFoundError);
    await expect(registry.call('fs', 'delete_everything', {})).rejects.toThrow("tool 'delete_everything' on server 'fs' is not available");
  });

  it('runs one handshake per server when initialize is called concurrently', async () => {
    const factory = vi.fn(inMemoryClientFactory({ fs: createToyFsServer }));
    const registry = buildRegistry(factory);
    await Promise.all([registry.initialize(), registry.initialize()]);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory.mock.calls.map((c) => c[0]).sort()).toEqual(['broken', 'fs']);
  });

  it('runs handshakes concurrently so a slow server does not hold up the others', async () => {
    const { servers, gates, started, clientFactory } = gatedServers(['slow', 'fast']);
    const registry = new ToolServerRegistry({ servers, disabled: [] }, { clientFactory });
    registries.push(registry);
    const init = registry.initialize();
    await vi.waitFor(() => { expect([...started].sort()).toEqual(['fast', 'slow']); });

    gates.fast.resolve();
    await vi.waitFor(() => { expect(Object.keys(registry.listToolsByServer())).toEqual(['fast']); });
    expect(registry.initialized).toBe(false);

    gates.slow.resolve();
    await init;
    expect(Object.keys(registry.listToolsByServer()).sort()).toEqual(['fast', 'slow']);
  });

  it('limits handshakes in flight to initConcurrency', async () => {
    const { servers, gates, started, clientFactory } = gatedServers(['a', 'b', 'c']);
    const registry = new ToolServerRegistry({ servers, disabled: [] }, { clientFactory, initConcurrency: 2 });
    registries.push(registry);
    const init = registry.initialize();
    await vi.waitFor(() => { expect(started).toEqual(['a', 'b']); });
    await delay(20);
    expect(started).toEqual(['a', 'b']);

    gates.a.resolve();
    await vi.waitFor(() => { expect(started).toEqual(['a', 'b', 'c']); });
    gates.b.resolve();
    gates.c.resolve();
    await init;
    expect(registry.status().initialized).toBe(true);
  });

  it('attempts every close and aggregates the failures', async () => {
    const closed: string[] = [];
    const fake = (name: string, fail: boolean): ToolServerConnection => fakeConnection(name, {
      onClose: async () => {
        closed.push(name);
        if (fail) throw new Error('pipe already closed');
        await Promise.resolve();
      },
    });
    const servers: Record<string, ServerParams> = { a: STDIO_PLACEHOLDER, b: STDIO_PLACEHOLDER, c: STDIO_PLACEHOLDER };
    const registry = new ToolServerRegistry({ servers, disabled: [] }, {
      clientFactory: (name) => fake(name, name !== 'b'),
    });
    await registry.initialize();
    const error: unknown = await registry.close().then(() => undefined, (e: unknown) => e);
    expect(error).toBeInstanceOf(AggregateError);
    expect(error instanceof AggregateError ? error.errors.map((e: unknown) => (e instanceof Error ? e.message : '')).sort() : [])
      .toEqual(['a: pipe already closed', 'c: pipe already closed']);
    expect(closed.sort()).toEqual(['a', 'b', 'c']);
    expect(registry.buildCatalog()).toEqual([]);
  });
});
