/**
 * Output rendering for CLI commands
 *
 * json and yaml print the data as is. table prints rows of fields with a
 * header line; nested values are shown as compact JSON.
 */

import { stringify } from 'yaml';

export const OUTPUT_FORMATS = ['json', 'yaml', 'table'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface TableColumn {
  key: string;
  label: string;
}

export function parseFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  const format = OUTPUT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new Error(`Unknown format "${value}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

function cell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Columns default to the keys of the first row.
 */
export function renderTable(rows: readonly unknown[], columns?: readonly TableColumn[]): string {
  const records = rows.filter(isRecord);
  if (records.length === 0) {
    return '(no results)';
  }

  const first = records[0] ?? {};
  const cols = columns ?? Object.keys(first).map((key) => ({ key, label: key }));
  const body = records.map((record) => cols.map((col) => cell(record[col.key])));
  const widths = cols.map((col, i) => Math.max(col.label.length, ...body.map((row) => (row[i] ?? '').length)));

  const line = (values: readonly string[]) =>
    values.map((value, i) => value.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [line(cols.map((col) => col.label)), widths.map((w) => '─'.repeat(w)).join('  '), ...body.map(line)].join(
    '\n'
  );
}

export function render(data: unknown, format: OutputFormat, columns?: readonly TableColumn[]): string {
  switch (format) {
    case 'json':
      return JSON.stringify(data, null, 2);
    case 'yaml':
      return stringify(data).trimEnd();
    case 'table':
      return renderTable(Array.isArray(data) ? data : [data], columns);
  }
}

export function print(data: unknown, format: OutputFormat, columns?: readonly TableColumn[]): void {
  console.log(render(data, format, columns));
}
