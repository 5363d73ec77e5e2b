import { afterEach, describe, expect, it, vi } from 'vitest';
import { createComponentLogger, truncateForLog } from '../utils/log';

describe('createComponentLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('hides debug and info unless verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createComponentLogger('Agent');
    logger.debug('request sent');
    logger.info('tool ran');
    expect(spy).not.toHaveBeenCalled();
  });

  it('always prints warnings and errors to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createComponentLogger('Agent');
    logger.warn('round limit reached');
    logger.error('request failed');

    expect(spy).toHaveBeenCalledTimes(2);
    const [line] = spy.mock.calls[0];
    expect(line).toContain('[Agent]');
    expect(line).toMatch(/round limit reached$/);
  });

  it('prints diagnostics when verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createComponentLogger('Agent', { verbose: true });
    logger.debug('request sent');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/request sent$/);
  });
});

describe('truncateForLog', () => {
  it('keeps short values', () => {
    expect(truncateForLog('short')).toBe('short');
    expect(truncateForLog({ a: 1 })).toBe('{"a":1}');
  });

  it('shortens long values', () => {
    expect(truncateForLog('abcdefghij', 8)).toBe('abcde...');
  });
});
