import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('should suppress messages below the configured level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'warn' });

    log.info('hidden');
    log.warn('shown', { fieldNumber: 2 });

    expect(write).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[FieldScope] WARN:', 'shown', { fieldNumber: 2 });
  });

  it('should write info and debug lines to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger({ level: 'debug', prefix: 'test' });

    log.debug('scan', { recordsScanned: 3 });

    expect(write).toHaveBeenCalledWith('[test] DEBUG: scan {"recordsScanned":3}\n');
  });

  it('should change level at runtime', () => {
    const log = createLogger({ level: 'error' });
    log.setLevel('info');
    expect(log.getLevel()).toBe('info');
  });
});
