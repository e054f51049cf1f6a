import type { SessionConfig } from '../config/session.js';
import type { ChatMessageT } from '../schemas/chat.js';
import type { ConversationStateT } from '../schemas/conversation.js';
import { createInMemoryStore } from './stores/inmemory.js';

/**
 * Per-conversation persistence: workflow state plus a bounded message
 * history. Values are copied in and out, so callers never share objects with
 * the store.
 */
export interface ConversationStore {
  getState(id: string): Promise<ConversationStateT | undefined>;
  setState(id: string, state: ConversationStateT): Promise<void>;
  getMsgs(id: string, limit?: number): Promise<ChatMessageT[]>;
  appendMsg(id: string, msg: ChatMessageT): Promise<void>;
  clear(id: string): Promise<void>;
}

export function createStore(cfg: SessionConfig, deps: { now?: () => number } = {}): ConversationStore {
  switch (cfg.kind) {
    case 'memory':
      return createInMemoryStore(cfg, deps);
  }
}
