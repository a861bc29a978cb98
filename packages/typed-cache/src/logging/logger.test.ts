import { describe, it, expect, vi, afterEach } from 'vitest';
import { createRecordingLogger } from '../test/mocks.js';
import { createConsoleLogger, resolveLogger, silentLogger } from './logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped lines to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger('lru-cache');

    logger.debug('evicted least recently used key');

    expect(spy).toHaveBeenCalledWith('[lru-cache] debug: evicted least recently used key');
  });

  it('passes context as a second argument', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createConsoleLogger('persistable-cache');

    logger.warn('ignored unreadable cache file', { filePath: '/tmp/cache.json' });

    expect(spy).toHaveBeenCalledWith('[persistable-cache] warn: ignored unreadable cache file', {
      filePath: '/tmp/cache.json',
    });
  });
});

describe('resolveLogger', () => {
  describe('given a logger in the options', () => {
    it('uses it', () => {
      const logger = createRecordingLogger();

      expect(resolveLogger({ logger }, 'store', { TYPED_CACHE_DEBUG: '1' })).toBe(logger);
    });
  });

  describe('given no logger and debug off', () => {
    it('is silent', () => {
      expect(resolveLogger({}, 'store', {})).toBe(silentLogger);
    });
  });

  describe('given no logger and debug on', () => {
    it('logs to the console', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      resolveLogger({}, 'store', { TYPED_CACHE_DEBUG: 'true' }).debug('cleared store');

      expect(spy).toHaveBeenCalledWith('[store] debug: cleared store');
      spy.mockRestore();
    });
  });
});
