import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write info to stderr with prefix and metadata', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger({ level: 'info', prefix: 'test' }).info('Loaded', { tables: 2 });

    expect(write).toHaveBeenCalledWith('[test] INFO: Loaded {"tables":2}\n');
  });

  it('should suppress messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger({ level: 'error' });

    log.info('hidden');
    log.debug('hidden');
    log.warn('hidden');

    expect(write).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('should print error messages from Error metadata', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger({ level: 'error', prefix: 'test' }).error('Failed', new Error('boom'));

    expect(error).toHaveBeenCalledWith('[test] ERROR:', 'Failed', 'boom');
  });

  it('should change level at runtime', () => {
    const log = createLogger({ level: 'info' });
    log.setLevel('debug');
    expect(log.getLevel()).toBe('debug');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
