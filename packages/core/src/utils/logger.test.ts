import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger, getLogLevel } from './logger.js';

describe('getLogLevel', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });

  it('should default to INFO', () => {
    delete process.env.LOG_LEVEL;
    expect(getLogLevel()).toBe('INFO');
  });

  it('should accept lower-case levels', () => {
    process.env.LOG_LEVEL = 'debug';
    expect(getLogLevel()).toBe('DEBUG');
  });

  it('should fall back to INFO for unknown levels', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(getLogLevel()).toBe('INFO');
  });
});

describe('createLogger', () => {
  const original = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });

  it('should prefix messages with the scope', () => {
    delete process.env.LOG_LEVEL;
    const logger = createLogger('block-repository');

    logger.info('opened');
    logger.warn('slow', { ms: 12 });

    expect(console.log).toHaveBeenCalledWith('[block-repository]', 'opened');
    expect(console.warn).toHaveBeenCalledWith('[block-repository]', 'slow', { ms: 12 });
  });

  it('should drop messages below the current level', () => {
    process.env.LOG_LEVEL = 'WARNING';
    const logger = createLogger('store');

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('[store]', 'shown');
  });

  it('should emit debug output when enabled', () => {
    process.env.LOG_LEVEL = 'DEBUG';
    createLogger('store').debug('detail');
    expect(console.debug).toHaveBeenCalledWith('[store]', 'detail');
  });

  it('should nest scopes for child loggers', () => {
    delete process.env.LOG_LEVEL;
    createLogger('store').child('documents').info('ready');
    expect(console.log).toHaveBeenCalledWith('[store:documents]', 'ready');
  });
});
