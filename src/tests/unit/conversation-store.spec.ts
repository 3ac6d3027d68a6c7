import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { afterEach, describe, expect, it } from 'vitest';

import type { ConversationStore } from '../../store/types.js';
import type { ConversationTurn } from '../../types.js';

import { ConversationNotFoundError, StorageError } from '../../errors.js';
import { InMemoryConversationStore } from '../../store/memory-store.js';
import { SqliteConversationStore } from '../../store/sqlite-store.js';
import { createConversationStore } from '../../store/store-factory.js';
import { DEFAULT_LIST_QUERY } from '../../store/types.js';

const HISTORY: ConversationTurn[] = [
  { role: 'request', parts: [{ kind: 'user-prompt', content: 'hi', timestamp: 1 }] },
  { role: 'response', parts: [{ kind: 'tool-call', toolName: 'fs-list_files', args: { path: '/docs' }, toolCallId: 'a' }], timestamp: 2 },
];

// every store sees the same clock: 1000, 1001, ...
const ticking = (): (() => number) => {
  let t = 999;
  return () => { t += 1; return t; };
};

const backends: [string, () => ConversationStore][] = [
  ['memory', () => new InMemoryConversationStore(ticking())],
  ['sqlite', () => new SqliteConversationStore({ path: ':memory:', now: ticking() })],
];

describe.each(backends)('%s conversation store', (_name, build) => {
  let store: ConversationStore;

  afterEach(async () => {
    await store.close();
  });

  it('creates empty conversations', async () => {
    store = build();
    const created = await store.create({ userId: 'u1', systemPrompt: 'Be brief.' });
    expect(created).toMatchObject({
      userId: 'u1',
      systemPrompt: 'Be brief.',
      messages: [],
      usage: { requests: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      createdAt: 1000,
      updatedAt: 1000,
    });
    expect(created.title).toBeUndefined();
    expect(await store.get(created.id)).toEqual(created);
  });

  it('round-trips history and usage through update', async () => {
    store = build();
    const { id } = await store.create({ userId: 'u1' });
    const usage = { requests: 1, inputTokens: 10, outputTokens: 5, totalTokens: 15 };
    const updated = await store.update(id, { messages: HISTORY, usage, title: 'hi' });
    expect(updated.updatedAt).toBe(1001);
    const loaded = await store.get(id);
    expect(loaded?.messages).toEqual(HISTORY);
    expect(loaded?.usage).toEqual(usage);
    expect(loaded?.title).toBe('hi');
    expect(loaded?.createdAt).toBe(1000);
  });

  it('keeps fields a patch leaves out', async () => {
    store = build();
    const { id } = await store.create({ userId: 'u1', title: 'kept' });
    await store.update(id, { messages: HISTORY });
    expect((await store.get(id))?.title).toBe('kept');
  });

  it('throws for an unknown id on update and reports deletes', async () => {
    store = build();
    await expect(store.update('missing', { title: 'x' })).rejects.toBeInstanceOf(ConversationNotFoundError);
    const { id } = await store.create({ userId: 'u1' });
    expect(await store.delete(id)).toBe(true);
    expect(await store.delete(id)).toBe(false);
    expect(await store.get(id)).toBeUndefined();
  });

  it('lists only the owner\'s conversations, paged and ordered', async () => {
    store = build();
    const a = await store.create({ userId: 'u1', title: 'a' });
    const b = await store.create({ userId: 'u1', title: 'b' });
    const c = await store.create({ userId: 'u1', title: 'c' });
    await store.create({ userId: 'u2', title: 'other' });
    await store.update(a.id, { title: 'a2' });

    const byUpdated = await store.list('u1', DEFAULT_LIST_QUERY);
    expect(byUpdated.items.map((i) => i.title)).toEqual(['a2', 'c', 'b']);
    expect(byUpdated.hasMore).toBe(false);

    const firstPage = await store.list('u1', { limit: 2, offset: 0, orderBy: 'created', order: 'asc' });
    expect(firstPage.items.map((i) => i.id)).toEqual([a.id, b.id]);
    expect(firstPage.hasMore).toBe(true);
    const secondPage = await store.list('u1', { limit: 2, offset: 2, orderBy: 'created', order: 'asc' });
    expect(secondPage.items.map((i) => i.id)).toEqual([c.id]);
    expect(secondPage).toMatchObject({ limit: 2, offset: 2, hasMore: false });
    expect(secondPage.items[0]).not.toHaveProperty('messages');
  });
});

describe('SqliteConversationStore on disk', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('persists across reopen and creates the parent directory', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolgate-sqlite-'));
    const file = path.join(dir, 'nested', 'conversations.sqlite');
    const first = new SqliteConversationStore({ path: file });
    const { id } = await first.create({ userId: 'u1' });
    await first.update(id, { messages: HISTORY });
    await first.close();

    const second = createConversationStore({ backend: 'sqlite', path: file });
    expect((await second.get(id))?.messages).toEqual(HISTORY);
    await second.close();
  });

  it('raises StorageError for a row that does not decode', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolgate-sqlite-'));
    const file = path.join(dir, 'conversations.sqlite');
    const store = new SqliteConversationStore({ path: file });
    const { id } = await store.create({ userId: 'u1' });

    const raw = new Database(file);
    raw.prepare('UPDATE conversations SET messages = ? WHERE id = ?').run('[{"role":"oops"}]', id);
    raw.close();

    await expect(store.get(id)).rejects.toBeInstanceOf(StorageError);
    await store.close();
  });
});

describe('createConversationStore', () => {
  it('defaults to memory', async () => {
    const store = createConversationStore({ backend: 'memory', path: './unused.sqlite' });
    expect(store).toBeInstanceOf(InMemoryConversationStore);
    await store.close();
  });
});
