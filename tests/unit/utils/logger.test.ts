/**
 * Logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, parseLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write warnings through console.warn with the prefix', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger({ level: 'warn', prefix: 'test' });

    logger.warn('Schema field x has no type declaration', { field: 'x' });

    expect(warn).toHaveBeenCalledWith('[test] WARN:', 'Schema field x has no type declaration', {
      field: 'x',
    });
  });

  it('should suppress messages above the configured level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'error' });

    logger.warn('hidden');
    logger.info('hidden');

    expect(warn).not.toHaveBeenCalled();
    expect(write).not.toHaveBeenCalled();
  });

  it('should write info and debug lines to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'debug' });

    logger.info('Flattening messages', { input: 'stdin' });
    logger.debug('done');

    expect(write).toHaveBeenNthCalledWith(1, '[flatcol] INFO: Flattening messages {"input":"stdin"}\n');
    expect(write).toHaveBeenNthCalledWith(2, '[flatcol] DEBUG: done \n');
  });

  it('should change level at runtime', () => {
    const logger = createLogger({ level: 'info' });
    logger.setLevel('debug');
    expect(logger.getLevel()).toBe('debug');
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  it('should fall back for missing or unknown levels', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('verbose', 'error')).toBe('error');
  });
});

describe('isLogLevel', () => {
  it('should only accept the four levels', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
