import fs from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';

import type { ConversationUsage } from '../types.js';
import type { ConversationPage, ConversationPatch, ConversationRecord, ConversationStore, ListOrder, ListOrderBy, ListQuery, NewConversation } from './types.js';
import type { Database as SqliteDatabase, Statement as SqliteStatement } from 'better-sqlite3';

import { emptyUsage, parseTurns, parseUsage } from '../conversation/messages.js';
import { formatZodIssues } from '../config.js';
import { ConversationNotFoundError, StorageError, toErrorMessage } from '../errors.js';

import { createTimestamper, toSummary } from './types.js';

type SqliteFactory = new (filename: string) => SqliteDatabase;

interface UpdateParams {
  id: string;
  title: string | null;
  messages: string;
  usage: string;
  updated_at: number;
}

interface Row {
  id: string;
  user_id: string;
  title: string | null;
  system_prompt: string | null;
  messages: string;
  usage: string;
  created_at: number;
  updated_at: number;
}

let cachedFactory: SqliteFactory | undefined;

const loadSqliteFactory = (): SqliteFactory => {
  if (cachedFactory !== undefined) return cachedFactory;
  const require = createRequire(import.meta.url);
  const factory = require('better-sqlite3') as SqliteFactory;
  cachedFactory = factory;
  return factory;
};

const ORDER_COLUMNS: Record<ListOrderBy, string> = { created: 'created_at', updated: 'updated_at' };

const decodeJson = (text: string, what: string, id: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new StorageError(`conversation '${id}': ${what} is not valid JSON: ${toErrorMessage(e)}`, { cause: e });
  }
};

function rowToRecord(row: Row): ConversationRecord {
  const turns = parseTurns(decodeJson(row.messages, 'messages', row.id));
  if (!turns.ok) {
    throw new StorageError(`conversation '${row.id}': invalid messages: ${formatZodIssues(turns.issues)}`);
  }
  const usage: ConversationUsage | undefined = parseUsage(decodeJson(row.usage, 'usage', row.id));
  if (usage === undefined) {
    throw new StorageError(`conversation '${row.id}': invalid usage`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    ...(row.title !== null ? { title: row.title } : {}),
    ...(row.system_prompt !== null ? { systemPrompt: row.system_prompt } : {}),
    messages: turns.turns,
    usage,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Conversation rows in SQLite; history and usage are JSON columns validated on read. */
export class SqliteConversationStore implements ConversationStore {
  private readonly db: SqliteDatabase;
  private readonly timestamp: () => number;
  private readonly getStmt: SqliteStatement<[string], Row>;
  private readonly insertStmt: SqliteStatement<[Row]>;
  private readonly updateStmt: SqliteStatement<[UpdateParams]>;
  private readonly deleteStmt: SqliteStatement<[string]>;
  private readonly listStmts = new Map<string, SqliteStatement<[string, number, number], Row>>();

  constructor(opts: { path: string; now?: () => number }) {
    const filePath = opts.path;
    if (filePath !== ':memory:') {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    this.timestamp = createTimestamper(opts.now);
    const sqlite = loadSqliteFactory();
    this.db = new sqlite(filePath);
    if (filePath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        title TEXT,
        system_prompt TEXT,
        messages TEXT NOT NULL,
        usage TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_conversations_user_created ON conversations(user_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_conversations_user_updated ON conversations(user_id, updated_at);
    `);

    this.getStmt = this.db.prepare<[string], Row>(`
      SELECT id, user_id, title, system_prompt, messages, usage, created_at, updated_at
      FROM conversations
      WHERE id = ?
    `);
    this.insertStmt = this.db.prepare<[Row]>(`
      INSERT INTO conversations (id, user_id, title, system_prompt, messages, usage, created_at, updated_at)
      VALUES (@id, @user_id, @title, @system_prompt, @messages, @usage, @created_at, @updated_at)
    `);
    this.updateStmt = this.db.prepare<[UpdateParams]>(`
      UPDATE conversations
      SET title = @title, messages = @messages, usage = @usage, updated_at = @updated_at
      WHERE id = @id
    `);
    this.deleteStmt = this.db.prepare<[string]>('DELETE FROM conversations WHERE id = ?');
  }

  async get(id: string): Promise<ConversationRecord | undefined> {
    const row = this.getStmt.get(id);
    return await Promise.resolve(row === undefined ? undefined : rowToRecord(row));
  }

  async create(input: NewConversation): Promise<ConversationRecord> {
    const ts = this.timestamp();
    const row: Row = {
      id: crypto.randomUUID(),
      user_id: input.userId,
      title: input.title ?? null,
      system_prompt: input.systemPrompt ?? null,
      messages: '[]',
      usage: JSON.stringify(emptyUsage()),
      created_at: ts,
      updated_at: ts,
    };
    this.insertStmt.run(row);
    return await Promise.resolve(rowToRecord(row));
  }

  async update(id: string, patch: ConversationPatch): Promise<ConversationRecord> {
    const updated = this.db.transaction((): ConversationRecord => {
      const row = this.getStmt.get(id);
      if (row === undefined) throw new ConversationNotFoundError(id);
      const next: Row = {
        ...row,
        title: patch.title ?? row.title,
        messages: patch.messages !== undefined ? JSON.stringify(patch.messages) : row.messages,
        usage: patch.usage !== undefined ? JSON.stringify(patch.usage) : row.usage,
        updated_at: this.timestamp(),
      };
      this.updateStmt.run({ id, title: next.title, messages: next.messages, usage: next.usage, updated_at: next.updated_at });
      return rowToRecord(next);
    });
    return await Promise.resolve(updated());
  }

  async delete(id: string): Promise<boolean> {
    const info = this.deleteStmt.run(id);
    return await Promise.resolve(info.changes > 0);
  }

  async list(userId: string, query: ListQuery): Promise<ConversationPage> {
    // one extra row tells whether another page exists
    const rows = this.listStatement(query.orderBy, query.order).all(userId, query.limit + 1, query.offset);
    const hasMore = rows.length > query.limit;
    const items = rows.slice(0, query.limit).map((row) => toSummary(rowToRecord(row)));
    return await Promise.resolve({ items, limit: query.limit, offset: query.offset, hasMore });
  }

  close(): Promise<void> {
    this.db.close();
    return Promise.resolve();
  }

  private listStatement(orderBy: ListOrderBy, order: ListOrder): SqliteStatement<[string, number, number], Row> {
    const key = `${orderBy}:${order}`;
    const cached = this.listStmts.get(key);
    if (cached !== undefined) return cached;
    const direction = order === 'asc' ? 'ASC' : 'DESC';
    const stmt = this.db.prepare<[string, number, number], Row>(`
      SELECT id, user_id, title, system_prompt, messages, usage, created_at, updated_at
      FROM conversations
      WHERE user_id = ?
      ORDER BY ${ORDER_COLUMNS[orderBy]} ${direction}, id ${direction}
      LIMIT ? OFFSET ?
    `);
    this.listStmts.set(key, stmt);
    return stmt;
  }
}
