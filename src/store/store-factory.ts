import type { Configuration } from '../config.js';
import type { ConversationStore } from './types.js';

import { InMemoryConversationStore } from './memory-store.js';
import { SqliteConversationStore } from './sqlite-store.js';

export function createConversationStore(config: Configuration['database']): ConversationStore {
  if (config.backend === 'sqlite') {
    return new SqliteConversationStore({ path: config.path });
  }
  return new InMemoryConversationStore();
}
