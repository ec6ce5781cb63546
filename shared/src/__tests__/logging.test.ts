/**
 * Tests for the leveled console logger
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../logging.js';

describe('isLogLevel', () => {
  it('should accept the four levels', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
  });

  it('should reject inherited object properties', () => {
    expect(isLogLevel('constructor')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('__proto__')).toBe(false);
  });

  it('should reject unknown names', () => {
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('')).toBe(false);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should prefix lines and drop those below the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    setLogLevel('info');
    const logger = createLogger('selector').child('bandit');
    logger.info('chose', 'R1');
    logger.debug('ignored');

    expect(getLogLevel()).toBe('info');
    expect(log).toHaveBeenCalledWith('[selector:bandit]', 'chose', 'R1');
    expect(debug).not.toHaveBeenCalled();
  });
});
