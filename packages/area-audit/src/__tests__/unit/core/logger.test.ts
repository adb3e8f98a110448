/**
 * Engine logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, parseLogLevel } from '../../../core/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger({ level: 'warn', service: 'test', pretty: false });

    log.info('ignored');

    expect(info).not.toHaveBeenCalled();
  });

  it('should write JSON lines with metadata when not pretty', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger({ level: 'debug', service: 'test', pretty: false });

    log.warn('cache full', { size: 3 });

    expect(warn).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(warn.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: 'warn', service: 'test', message: 'cache full', size: 3 });
  });

  it('should write a single readable line when pretty', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger({ level: 'debug', service: 'test', pretty: true });

    log.error('boom');

    expect(String(error.mock.calls[0]?.[0])).toMatch(/^\[.+\] ERROR test: boom$/);
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warn')).toBe('warn');
  });

  it('should reject unknown levels', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
