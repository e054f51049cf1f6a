import { describe, it, expect, beforeEach } from '@jest/globals';
import { createStore, type ConversationStore } from '../../../src/core/session_store.js';
import { initialState } from '../../../src/schemas/conversation.js';
import { OFFERS } from '../../helpers/fakes.js';

describe('SessionStore (memory)', () => {
  let clock: number;
  let store: ConversationStore;

  beforeEach(() => {
    clock = 0;
    store = createStore({ kind: 'memory', ttlSec: 60, maxMessages: 3 }, { now: () => clock });
  });

  it('returns nothing for an unknown conversation', async () => {
    expect(await store.getState('c1')).toBeUndefined();
    expect(await store.getMsgs('c1')).toEqual([]);
  });

  it('stores state as a copy', async () => {
    const state = { ...initialState('c1', 0), phase: 'CANDIDATES_PRESENTED' as const, candidates: [...OFFERS] };
    await store.setState('c1', state);
    state.candidates.pop();

    const loaded = await store.getState('c1');
    expect(loaded?.candidates).toEqual(OFFERS);

    loaded?.candidates.splice(0);
    expect((await store.getState('c1'))?.candidates).toHaveLength(3);
  });

  it('keeps only the newest messages', async () => {
    for (const content of ['one', 'two', 'three', 'four', 'five']) {
      await store.appendMsg('c1', { role: 'user', content });
    }
    expect((await store.getMsgs('c1')).map((m) => m.content)).toEqual(['three', 'four', 'five']);
    expect((await store.getMsgs('c1', 2)).map((m) => m.content)).toEqual(['four', 'five']);
  });

  it('expires conversations after the ttl', async () => {
    await store.setState('c1', initialState('c1', 0));
    clock = 59_999;
    expect(await store.getState('c1')).toBeDefined();
    clock = 60_000;
    expect(await store.getState('c1')).toBeUndefined();
  });

  it('extends the ttl on every write', async () => {
    await store.setState('c1', initialState('c1', 0));
    clock = 50_000;
    await store.appendMsg('c1', { role: 'user', content: 'still here' });
    clock = 100_000;
    expect((await store.getState('c1'))?.phase).toBe('INIT');
    expect(await store.getMsgs('c1')).toEqual([{ role: 'user', content: 'still here' }]);
  });

  it('clears one conversation only', async () => {
    await store.setState('c1', initialState('c1', 0));
    await store.setState('c2', initialState('c2', 0));
    await store.clear('c1');
    expect(await store.getState('c1')).toBeUndefined();
    expect((await store.getState('c2'))?.conversationId).toBe('c2');
  });
});
