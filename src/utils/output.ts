/**
 * Output Formatter Module
 * JSON, table (cli-table3) and CSV rendering driven by column definitions,
 * plus the shared error report used by every command.
 */

import Table from 'cli-table3';
import type { OutputFormat } from '../types/config.js';
import { describeError, isClientError, type ClientErrorCode } from '../lib/errors.js';
import { ConfigError } from '../services/config.js';

export interface ColumnDef<T> {
  /** Property path, dot-separated for nested values */
  key: string;
  label: string;
  width?: number;
  align?: 'left' | 'right' | 'center';
  format?: (value: unknown, row: T) => string;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: 1,
  API: 2,
  AUTH: 3,
} as const;

function getValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

function cellText<T>(row: T, column: ColumnDef<T>): string {
  const value = getValue(row, column.key);
  if (column.format) {
    return column.format(value, row);
  }
  return value === undefined || value === null ? '' : String(value);
}

export function formatTable<T>(data: T[], columns: ColumnDef<T>[]): string {
  if (data.length === 0) {
    return '';
  }

  const colWidths = columns.map((column) => column.width ?? null);
  const table = new Table({
    head: columns.map((column) => column.label),
    colAligns: columns.map((column) => column.align ?? 'left'),
    style: { head: [], border: [] },
    ...(colWidths.some((width) => width !== null) ? { colWidths, wordWrap: true } : {}),
  });

  for (const row of data) {
    table.push(columns.map((column) => cellText(row, column)));
  }

  return table.toString();
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCSV<T>(data: T[], columns: ColumnDef<T>[]): string {
  if (data.length === 0) {
    return '';
  }

  const lines = [columns.map((column) => escapeCSV(column.label)).join(',')];
  for (const row of data) {
    lines.push(columns.map((column) => escapeCSV(cellText(row, column))).join(','));
  }
  return lines.join('\n');
}

export function formatJSON(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function output<T>(data: T[], columns: ColumnDef<T>[], format: OutputFormat = 'json'): string {
  switch (format) {
    case 'table':
      return formatTable(data, columns);
    case 'csv':
      return formatCSV(data, columns);
    case 'json':
    default:
      return formatJSON(data);
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return EXIT_CODES.USAGE;
  }
  if (!isClientError(error)) {
    return EXIT_CODES.USAGE;
  }
  switch (error.code) {
    case 'NOT_AUTHENTICATED':
    case 'REAUTH_REQUIRED':
    case 'AUTH_EXPIRED':
      return EXIT_CODES.AUTH;
    default:
      return EXIT_CODES.API;
  }
}

export interface ErrorReport {
  code: ClientErrorCode | 'CONFIG_ERROR' | 'ERROR';
  message: string;
}

export function toErrorReport(error: unknown): ErrorReport {
  if (isClientError(error)) {
    return { code: error.code, message: describeError(error).message };
  }
  if (error instanceof ConfigError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'ERROR', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Print a failed command's error in the requested format and return its exit code
 */
export function reportError(
  error: unknown,
  format: OutputFormat,
  write: { out: (text: string) => void; err: (text: string) => void } = {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
  }
): number {
  const report = toErrorReport(error);
  if (format === 'json') {
    write.out(formatJSON({ success: false, error: report }, false));
  } else {
    write.err(`Error: ${report.message}`);
  }
  return exitCodeFor(error);
}
