/**
 * CLI output formatting utilities
 */

import type { TokenUsage } from '@llm-unify/core';

export interface TableColumn<T> {
  header: string;
  key: keyof T & string;
  width?: number;
  align?: 'left' | 'right';
  format?: (value: T[keyof T]) => string;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined || value === '') {
    return '-';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(', ') : '-';
  }
  return String(value);
}

/**
 * Truncate or pad a string to a specific width
 */
function fitToWidth(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length > width) {
    return str.slice(0, width - 1) + '…';
  }
  const padding = ' '.repeat(width - str.length);
  return align === 'right' ? padding + str : str + padding;
}

function cell<T>(column: TableColumn<T>, row: T): string {
  const value = row[column.key];
  return column.format ? column.format(value) : formatValue(value);
}

/**
 * Format rows as a table. Column widths fit the content, capped at 60.
 */
export function formatTable<T>(columns: TableColumn<T>[], rows: T[]): string {
  if (rows.length === 0) {
    return 'No data';
  }

  const widths = columns.map(col => col.width
    ?? Math.min(60, Math.max(col.header.length, ...rows.map(row => cell(col, row).length))));

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fitToWidth(col.header, widths[i])).join('  ').trimEnd());
  lines.push(widths.map(w => '─'.repeat(w)).join('──'));
  for (const row of rows) {
    lines.push(columns.map((col, i) => fitToWidth(cell(col, row), widths[i], col.align)).join('  ').trimEnd());
  }

  return lines.join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatUsage(usage: TokenUsage): string {
  return `tokens: prompt=${usage.promptTokens} completion=${usage.completionTokens} total=${usage.totalTokens}`;
}

/**
 * Print an error message
 */
export function error(message: string): void {
  console.error(`✗ ${message}`);
}
