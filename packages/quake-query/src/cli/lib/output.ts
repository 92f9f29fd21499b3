/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, ndjson formats
 *
 * @module cli/lib/output
 */

export const OUTPUT_FORMATS = ['table', 'json', 'ndjson'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

export type TableRow = Readonly<Record<string, unknown>>;

/**
 * Format data as a table
 */
export function formatTable(data: readonly TableRow[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (row: TableRow, col: TableColumn): string => {
    const value = row[col.key];
    return col.formatter ? col.formatter(value) : String(value ?? '');
  };

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    return Math.max(col.header.length, ...data.map((row) => cell(row, col).length));
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(cell(row, col), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson(data: readonly unknown[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format rows in the specified format
 */
export function formatOutput(
  data: readonly TableRow[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'table':
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Fixed decimals, '-' for null/undefined
   */
  fixed:
    (digits: number) =>
    (value: unknown): string => {
      if (value === null || value === undefined) return '-';
      return typeof value === 'number' ? value.toFixed(digits) : String(value);
    },

  /**
   * Truncate a string to max length
   */
  truncate:
    (maxLength: number) =>
    (value: unknown): string => {
      const str = String(value ?? '');
      return str.length > maxLength ? str.slice(0, maxLength - 3) + '...' : str;
    },

  /**
   * '-' for null/undefined
   */
  optional: (value: unknown): string => {
    return value === null || value === undefined ? '-' : String(value);
  },
};

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
