import type { SessionConfig } from '../../config/session.js';
import type { ChatMessageT } from '../../schemas/chat.js';
import type { ConversationStateT } from '../../schemas/conversation.js';
import type { ConversationStore } from '../session_store.js';

interface Entry {
  state?: ConversationStateT;
  msgs: ChatMessageT[];
  expiresAt: number;
}

export function createInMemoryStore(
  cfg: Pick<SessionConfig, 'ttlSec' | 'maxMessages'>,
  deps: { now?: () => number } = {},
): ConversationStore {
  const store = new Map<string, Entry>();
  const ttlMs = cfg.ttlSec * 1000;
  const now = deps.now ?? Date.now;

  // Expired entries are dropped lazily, on access and on every write.
  function sweep(): void {
    const t = now();
    for (const [id, entry] of store.entries()) {
      if (entry.expiresAt <= t) store.delete(id);
    }
  }

  function live(id: string): Entry | undefined {
    const entry = store.get(id);
    if (entry && entry.expiresAt <= now()) {
      store.delete(id);
      return undefined;
    }
    return entry;
  }

  function getEntry(id: string): Entry {
    const entry = live(id);
    if (entry) {
      entry.expiresAt = now() + ttlMs;
      return entry;
    }
    sweep();
    const fresh: Entry = { msgs: [], expiresAt: now() + ttlMs };
    store.set(id, fresh);
    return fresh;
  }

  return {
    async getState(id: string): Promise<ConversationStateT | undefined> {
      const state = live(id)?.state;
      return state ? structuredClone(state) : undefined;
    },

    async setState(id: string, state: ConversationStateT): Promise<void> {
      getEntry(id).state = structuredClone(state);
    },

    async getMsgs(id: string, limit?: number): Promise<ChatMessageT[]> {
      const msgs = live(id)?.msgs ?? [];
      if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
        return msgs.slice(-limit).map((m) => ({ ...m }));
      }
      return msgs.map((m) => ({ ...m }));
    },

    async appendMsg(id: string, msg: ChatMessageT): Promise<void> {
      const entry = getEntry(id);
      entry.msgs.push({ ...msg });
      while (entry.msgs.length > cfg.maxMessages) {
        entry.msgs.shift();
      }
    },

    async clear(id: string): Promise<void> {
      store.delete(id);
    },
  };
}
