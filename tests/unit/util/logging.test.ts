import { describe, it, expect, afterEach } from '@jest/globals';
import { createLogger, silentLogger } from '../../../src/util/logging.js';

describe('Logging', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLevel;
  });

  it('takes its level from LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(createLogger().level).toBe('warn');
  });

  it('defaults to info', () => {
    delete process.env.LOG_LEVEL;
    expect(createLogger().level).toBe('info');
  });

  it('binds child fields', () => {
    process.env.LOG_LEVEL = 'silent';
    const log = createLogger({ mod: 'gateway' });
    expect(log.bindings()).toEqual({ mod: 'gateway' });
  });

  it('silent logger drops everything', () => {
    const log = silentLogger();
    expect(log.level).toBe('silent');
    expect(() => log.error({ first_name: 'Jane' }, 'dropped')).not.toThrow();
  });
});
