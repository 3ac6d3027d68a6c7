import type { ConversationPage, ConversationPatch, ConversationRecord, ConversationStore, ListQuery, NewConversation } from './types.js';

import { ConversationNotFoundError } from '../errors.js';
import { emptyUsage } from '../conversation/messages.js';

import { createTimestamper, toSummary } from './types.js';

export class InMemoryConversationStore implements ConversationStore {
  private readonly records = new Map<string, ConversationRecord>();
  private readonly timestamp: () => number;

  constructor(now?: () => number) {
    this.timestamp = createTimestamper(now);
  }

  get(id: string): Promise<ConversationRecord | undefined> {
    const record = this.records.get(id);
    return Promise.resolve(record === undefined ? undefined : structuredClone(record));
  }

  create(input: NewConversation): Promise<ConversationRecord> {
    const ts = this.timestamp();
    const record: ConversationRecord = {
      id: crypto.randomUUID(),
      userId: input.userId,
      ...(input.title !== undefined ? { title: input.title } : {}),
      ...(input.systemPrompt !== undefined ? { systemPrompt: input.systemPrompt } : {}),
      messages: [],
      usage: emptyUsage(),
      createdAt: ts,
      updatedAt: ts,
    };
    this.records.set(record.id, record);
    return Promise.resolve(structuredClone(record));
  }

  update(id: string, patch: ConversationPatch): Promise<ConversationRecord> {
    const existing = this.records.get(id);
    if (existing === undefined) return Promise.reject(new ConversationNotFoundError(id));
    const next: ConversationRecord = {
      ...existing,
      ...(patch.title !== undefined ? { title: patch.title } : {}),
      ...(patch.messages !== undefined ? { messages: structuredClone(patch.messages) } : {}),
      ...(patch.usage !== undefined ? { usage: { ...patch.usage } } : {}),
      updatedAt: this.timestamp(),
    };
    this.records.set(id, next);
    return Promise.resolve(structuredClone(next));
  }

  delete(id: string): Promise<boolean> {
    return Promise.resolve(this.records.delete(id));
  }

  list(userId: string, query: ListQuery): Promise<ConversationPage> {
    const key = query.orderBy === 'created' ? 'createdAt' : 'updatedAt';
    const direction = query.order === 'asc' ? 1 : -1;
    const owned = Array.from(this.records.values())
      .filter((record) => record.userId === userId)
      .sort((a, b) => ((a[key] - b[key]) || a.id.localeCompare(b.id)) * direction);
    const items = owned.slice(query.offset, query.offset + query.limit).map(toSummary);
    return Promise.resolve({
      items,
      limit: query.limit,
      offset: query.offset,
      hasMore: query.offset + items.length < owned.length,
    });
  }

  close(): Promise<void> {
    this.records.clear();
    return Promise.resolve();
  }
}
