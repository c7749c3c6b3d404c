import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, describeError, shouldLog } from '../../../src/infra/logger/logger.js';

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

  it('writes plain lines below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ level: 'warn', color: false });

    logger.info('router', 'dropped');
    logger.warn('router', 'careful');
    logger.error('event-log', 'broken');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{2} \[WARN\] \[router\] careful$/);
    expect(String(error.mock.calls[0]?.[0])).toMatch(/ \[ERROR\] \[event-log\] broken$/);
  });

  it('describes errors', () => {
    expect(describeError(new Error('nope'))).toBe('nope');
    expect(describeError(42)).toBe('42');
  });
});
