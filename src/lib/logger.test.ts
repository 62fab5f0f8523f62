import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

  beforeEach(() => {
    stderr.mockClear();
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterAll(() => {
    stderr.mockRestore();
  });

  afterEach(() => {
    vi.useRealTimers();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('formats timestamp, level, scope and data', () => {
    process.env.LOG_LEVEL = 'debug';

    createLogger('query').warn('Header missing', { header: 'X-Total' });

    expect(stderr).toHaveBeenCalledWith('2026-01-02T03:04:05.000Z [WARN ] (query) Header missing {"header":"X-Total"}');
  });

  it('omits empty data and scope', () => {
    process.env.LOG_LEVEL = 'debug';

    createLogger().info('Ready', {});

    expect(stderr).toHaveBeenCalledWith('2026-01-02T03:04:05.000Z [INFO ] Ready');
  });

  it('drops messages below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = createLogger('http');

    log.debug('hidden');
    log.info('hidden');
    log.error('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
  });

  it('defaults to info for an unknown level', () => {
    process.env.LOG_LEVEL = 'chatty';
    const log = createLogger();

    log.debug('hidden');
    log.info('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
  });
});
