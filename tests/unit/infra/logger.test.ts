import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, shouldLog } from '../../../src/infra/logger/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('orders levels', () => {
    expect(shouldLog('error', 'warn')).toBe(true);
    expect(shouldLog('warn', 'warn')).toBe(true);
    expect(shouldLog('info', 'warn')).toBe(false);
    expect(shouldLog('debug', 'info')).toBe(false);
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger({ logging: { level: 'warn', color: false } });

    logger.info('matchers', 'ignored');
    logger.debug('matchers', 'ignored');
    logger.warn('matchers', 'deprecated');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{2} WARN \[matchers\] deprecated$/);
  });

  it('writes errors to console.error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ logging: { level: 'debug', color: false } });

    logger.error('skills', 'boom');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/ ERROR \[skills\] boom$/);
  });
});
