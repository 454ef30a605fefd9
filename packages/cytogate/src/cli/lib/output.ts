/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function cellText(column: TableColumn, row: Readonly<Record<string, unknown>>): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

export function formatTable(data: readonly Readonly<Record<string, unknown>>[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cellText(col, row).length))
  );

  const headerRow = columns.map((col, i) => padCell(col.header, widths[i], col.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(cellText(col, row), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

export function formatCsv(data: readonly Readonly<Record<string, unknown>>[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) => columns.map((col) => escapeCSV(cellText(col, row))).join(','));
  return [headerRow, ...dataRows].join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatOutput(
  data: readonly Readonly<Record<string, unknown>>[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

export const formatters = {
  /**
   * Format a fraction as a percentage with two decimals
   */
  percent: (value: unknown): string => {
    if (typeof value !== 'number' || Number.isNaN(value)) return '-';
    return `${(value * 100).toFixed(2)}%`;
  },

  dash: (value: unknown): string => (value === undefined || value === null || value === '' ? '-' : String(value)),
};

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
