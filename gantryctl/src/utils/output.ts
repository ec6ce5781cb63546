/**
 * Terminal output for gantryctl: messages, tables and value formatting.
 * Every printer honours --json and --quiet.
 */

import chalk from 'chalk';
import Table from 'cli-table3';

export interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Print a value: JSON when asked, otherwise as-is unless quiet
 */
export function output(data: unknown, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else if (!options.quiet) {
    console.log(data);
  }
}

type MessageKind = 'success' | 'error' | 'warning' | 'info';

interface MessageStyle {
  symbol: () => string;
  stream: 'log' | 'warn' | 'error';
  /** Errors are printed even with --quiet */
  always: boolean;
  json: (message: string) => Record<string, unknown>;
}

const MESSAGE_STYLES: Record<MessageKind, MessageStyle> = {
  success: { symbol: () => chalk.green('✓'), stream: 'log', always: false, json: (message) => ({ success: true, message }) },
  error: { symbol: () => chalk.red('✗'), stream: 'error', always: true, json: (message) => ({ success: false, error: message }) },
  warning: { symbol: () => chalk.yellow('⚠'), stream: 'warn', always: false, json: (message) => ({ warning: message }) },
  info: { symbol: () => chalk.blue('ℹ'), stream: 'log', always: false, json: (message) => ({ info: message }) },
};

function announce(kind: MessageKind, message: string, options: OutputOptions): void {
  const style = MESSAGE_STYLES[kind];
  if (options.json) {
    console[style.stream](JSON.stringify(style.json(message)));
  } else if (style.always || !options.quiet) {
    console[style.stream](style.symbol(), message);
  }
}

export function success(message: string, options: OutputOptions = {}): void {
  announce('success', message, options);
}

export function error(message: string, options: OutputOptions = {}): void {
  announce('error', message, options);
}

export function warning(message: string, options: OutputOptions = {}): void {
  announce('warning', message, options);
}

export function info(message: string, options: OutputOptions = {}): void {
  announce('info', message, options);
}

/**
 * Create a table with headers and rows
 */
export function createTable(headers: string[], rows: string[][]): Table.Table {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: {
      head: [],
      border: ['grey'],
    },
  });

  rows.forEach((row) => table.push(row));
  return table;
}

/**
 * Format a timestamp for display
 */
export function formatTimestamp(iso: string | null | undefined): string {
  if (!iso) return 'N/A';

  const date = new Date(iso);
  const diffMs = Date.now() - date.getTime();
  const future = diffMs < 0;
  const diffSec = Math.floor(Math.abs(diffMs) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  const relative = (amount: string) => (future ? `in ${amount}` : `${amount} ago`);

  if (diffSec < 60) return relative(`${diffSec}s`);
  if (diffMin < 60) return relative(`${diffMin}m`);
  if (diffHour < 24) return relative(`${diffHour}h`);
  if (diffDay < 7) return relative(`${diffDay}d`);

  return date.toLocaleDateString();
}

/**
 * Format a duration in seconds to human readable
 */
export function formatSeconds(seconds: number | undefined): string {
  if (seconds === undefined) return 'N/A';

  const sec = Math.round(seconds);
  const min = Math.floor(sec / 60);
  const hour = Math.floor(min / 60);

  if (sec < 60) return `${sec}s`;
  if (min < 60) return `${min}m ${sec % 60}s`;
  return `${hour}h ${min % 60}m`;
}

/**
 * Format a [0, 1] value as a percentage
 */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Color status text
 */
export function colorStatus(status: string): string {
  switch (status.toLowerCase()) {
    case 'online':
    case 'known':
    case 'running':
    case 'started':
    case 'already-started':
    case 'recorded':
      return chalk.green(status);
    case 'starting':
    case 'stopping':
    case 'skipped':
      return chalk.yellow(status);
    case 'offline':
    case 'failed':
    case 'error':
      return chalk.red(status);
    case 'idle':
    case 'stopped':
    case 'unknown':
    case 'not-configured':
      return chalk.gray(status);
    default:
      return status;
  }
}

/**
 * Color a confidence value: green when the choice is clear, yellow when
 * it is close, gray while still exploring
 */
export function colorConfidence(confidence: number): string {
  const text = formatPercent(confidence);
  if (confidence >= 0.5) return chalk.green(text);
  if (confidence > 0) return chalk.yellow(text);
  return chalk.gray(text);
}

/**
 * Truncate text to a max length
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

/**
 * Format a list as bullet points
 */
export function formatList(items: string[]): string {
  return items.map((item) => `  • ${item}`).join('\n');
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(data: Record<string, unknown>): string {
  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));
  return Object.entries(data)
    .map(([key, value]) => {
      const paddedKey = key.padEnd(maxKeyLength);
      return `  ${chalk.cyan(paddedKey)}: ${String(value)}`;
    })
    .join('\n');
}

/**
 * Message of a caught value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
