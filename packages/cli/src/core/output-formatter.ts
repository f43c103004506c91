/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return value.toFixed(4);
  }
  if (typeof value === 'object') {
    // Convert objects/arrays to compact JSON
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table
 */
export function formatTable(data: readonly Row[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  // Auto-detect columns if not provided
  const detectedColumns = columns ?? Object.keys(data[0]);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const cells = data.map((row) => detectedColumns.map((col) => valueToString(row[col])));
  const widths = detectedColumns.map((col, i) =>
    Math.max(col.length, ...cells.map((row) => row[i].length))
  );

  const lines: string[] = [];

  // Header
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));

  // Rows
  for (const row of cells) {
    lines.push(row.map((cell, i) => cell.padEnd(widths[i])).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format a single object as key/value rows
 */
function formatObject(data: Row): string {
  return formatTable(
    Object.entries(data).map(([key, value]) => ({ key, value })),
    ['key', 'value']
  );
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  if (Array.isArray(data)) {
    return data.every(isRow) ? formatTable(data) : formatJSON(data);
  }
  if (isRow(data)) {
    return formatObject(data);
  }
  return valueToString(data);
}
