import type { ConversationTurn, ConversationUsage } from '../types.js';

export interface ConversationRecord {
  id: string;
  userId: string;
  title?: string;
  systemPrompt?: string;
  messages: ConversationTurn[];
  usage: ConversationUsage;
  createdAt: number;
  updatedAt: number;
}

export type ConversationSummary = Omit<ConversationRecord, 'messages' | 'systemPrompt'>;

export interface NewConversation {
  userId: string;
  title?: string;
  systemPrompt?: string;
}

export interface ConversationPatch {
  title?: string;
  messages?: ConversationTurn[];
  usage?: ConversationUsage;
}

export type ListOrderBy = 'created' | 'updated';
export type ListOrder = 'asc' | 'desc';

export interface ListQuery {
  limit: number;
  offset: number;
  orderBy: ListOrderBy;
  order: ListOrder;
}

export interface ConversationPage {
  items: ConversationSummary[];
  limit: number;
  offset: number;
  hasMore: boolean;
}

export const DEFAULT_LIST_QUERY: ListQuery = { limit: 20, offset: 0, orderBy: 'updated', order: 'desc' };

/** Keyed persistence of conversation rows. `update` on an unknown id throws `ConversationNotFoundError`. */
export interface ConversationStore {
  get: (id: string) => Promise<ConversationRecord | undefined>;
  create: (input: NewConversation) => Promise<ConversationRecord>;
  update: (id: string, patch: ConversationPatch) => Promise<ConversationRecord>;
  delete: (id: string) => Promise<boolean>;
  list: (userId: string, query: ListQuery) => Promise<ConversationPage>;
  close: () => Promise<void>;
}

export const toSummary = (record: ConversationRecord): ConversationSummary => ({
  id: record.id,
  userId: record.userId,
  ...(record.title !== undefined ? { title: record.title } : {}),
  usage: { ...record.usage },
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

/** Monotonic clock so `updatedAt` strictly orders writes made in the same millisecond. */
export function createTimestamper(now: () => number = Date.now): () => number {
  let last = 0;
  return () => {
    const current = now();
    last = current > last ? current : last + 1;
    return last;
  };
}
