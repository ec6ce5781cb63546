/**
 * Tests for output formatting utilities
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import {
  output,
  success,
  error,
  warning,
  info,
  formatTimestamp,
  formatSeconds,
  formatPercent,
  colorStatus,
  colorConfidence,
  truncate,
  formatList,
  formatKeyValue,
  createTable,
  errorMessage,
} from '../utils/output.js';

describe('Output Utilities', () => {
  let consoleLogs: string[];
  let consoleErrors: string[];
  let consoleWarns: string[];

  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    consoleLogs = [];
    consoleErrors = [];
    consoleWarns = [];
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
    console.warn = (...args) => consoleWarns.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    console.warn = originalWarn;
    vi.useRealTimers();
  });

  describe('output', () => {
    it('should output data directly', () => {
      output('test data');
      expect(consoleLogs).toEqual(['test data']);
    });

    it('should output as JSON when json option is true', () => {
      output({ key: 'value' }, { json: true });
      expect(consoleLogs[0]).toBe(JSON.stringify({ key: 'value' }, null, 2));
    });

    it('should not output when quiet option is true', () => {
      output('test data', { quiet: true });
      expect(consoleLogs).toHaveLength(0);
    });
  });

  describe('messages', () => {
    it('should print success with a checkmark', () => {
      success('Recorded');
      expect(consoleLogs).toEqual(['✓ Recorded']);
    });

    it('should print success as JSON', () => {
      success('Recorded', { json: true });
      expect(JSON.parse(consoleLogs[0] ?? '')).toEqual({ success: true, message: 'Recorded' });
    });

    it('should print errors even when quiet', () => {
      error('Failed', { quiet: true });
      expect(consoleErrors).toEqual(['✗ Failed']);
    });

    it('should print errors as JSON', () => {
      error('Failed', { json: true });
      expect(JSON.parse(consoleErrors[0] ?? '')).toEqual({ success: false, error: 'Failed' });
    });

    it('should print warnings', () => {
      warning('Availability unknown');
      expect(consoleWarns).toEqual(['⚠ Availability unknown']);
    });

    it('should print info as JSON', () => {
      info('Hello', { json: true });
      expect(JSON.parse(consoleLogs[0] ?? '')).toEqual({ info: 'Hello' });
    });
  });

  describe('formatTimestamp', () => {
    it('should return N/A for missing values', () => {
      expect(formatTimestamp(undefined)).toBe('N/A');
      expect(formatTimestamp(null)).toBe('N/A');
    });

    it('should show time ago', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));

      expect(formatTimestamp('2024-05-01T11:59:30Z')).toBe('30s ago');
      expect(formatTimestamp('2024-05-01T11:55:00Z')).toBe('5m ago');
      expect(formatTimestamp('2024-05-01T09:00:00Z')).toBe('3h ago');
      expect(formatTimestamp('2024-04-29T12:00:00Z')).toBe('2d ago');
    });

    it('should show future deadlines', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));

      expect(formatTimestamp('2024-05-01T12:05:00Z')).toBe('in 5m');
    });
  });

  describe('formatSeconds', () => {
    it('should return N/A for undefined', () => {
      expect(formatSeconds(undefined)).toBe('N/A');
    });

    it('should format seconds, minutes and hours', () => {
      expect(formatSeconds(30)).toBe('30s');
      expect(formatSeconds(125)).toBe('2m 5s');
      expect(formatSeconds(3725)).toBe('1h 2m');
    });

    it('should round fractional seconds', () => {
      expect(formatSeconds(42.6)).toBe('43s');
    });
  });

  describe('formatPercent', () => {
    it('should format with one decimal', () => {
      expect(formatPercent(0.5)).toBe('50.0%');
      expect(formatPercent(1 / 3)).toBe('33.3%');
    });
  });

  describe('colors', () => {
    it('should return plain text without color support', () => {
      expect(colorStatus('online')).toBe('online');
      expect(colorStatus('some-unknown-status')).toBe('some-unknown-status');
      expect(colorConfidence(0.25)).toBe('25.0%');
    });
  });

  describe('truncate', () => {
    it('should not truncate short text', () => {
      expect(truncate('hello', 10)).toBe('hello');
    });

    it('should truncate long text with ellipsis', () => {
      expect(truncate('hello world this is long', 10)).toBe('hello w...');
    });

    it('should handle edge case of exactly max length', () => {
      expect(truncate('hello', 5)).toBe('hello');
    });
  });

  describe('formatList', () => {
    it('should format items as bullet points', () => {
      expect(formatList(['R1', 'R2'])).toBe('  • R1\n  • R2');
    });

    it('should handle empty list', () => {
      expect(formatList([])).toBe('');
    });
  });

  describe('formatKeyValue', () => {
    it('should pad keys to the longest one', () => {
      expect(formatKeyValue({ name: 'test', runners: 3 })).toBe('  name   : test\n  runners: 3');
    });
  });

  describe('createTable', () => {
    it('should render headers and rows', () => {
      const rendered = createTable(['Runner', 'Jobs'], [['R1', '4']]).toString();
      expect(rendered).toContain('Runner');
      expect(rendered).toContain('R1');
    });
  });

  describe('errorMessage', () => {
    it('should use the message of errors', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
    });
  });
});
