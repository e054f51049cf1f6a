import { describe, it, expect } from '@jest/globals';
import { loadSessionConfig } from '../../../src/config/session.js';

describe('Session Config', () => {
  it('defaults to an in-memory store', () => {
    expect(loadSessionConfig({})).toEqual({ kind: 'memory', ttlSec: 3600, maxMessages: 20 });
  });

  it('reads overrides from the environment', () => {
    expect(loadSessionConfig({ SESSION_STORE: 'memory', SESSION_TTL_SEC: '600', SESSION_MAX_MESSAGES: '8' })).toEqual({
      kind: 'memory',
      ttlSec: 600,
      maxMessages: 8,
    });
  });

  it('rejects an unsupported store kind', () => {
    expect(() => loadSessionConfig({ SESSION_STORE: 'redis' })).toThrow();
  });
});
