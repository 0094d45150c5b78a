import iconv from 'iconv-lite';
import type { Row } from './types.js';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Leading columns first, then every other key in the order it first appears across the rows. */
export function csvHeader(rows: readonly Row[], leadingColumns: readonly string[] = []): string[] {
  const header = new Set<string>(leadingColumns);
  for (const row of rows) {
    for (const key of row.keys()) header.add(key);
  }
  return Array.from(header);
}

export function formatCsv(rows: readonly Row[], leadingColumns: readonly string[] = []): string {
  const header = csvHeader(rows, leadingColumns);
  const lines = [header.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(header.map((key) => escapeCsvField(row.get(key) ?? '')).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

// Spreadsheet tools only detect UTF-8 in a CSV when it starts with a BOM
export function encodeCsv(text: string): Buffer {
  return iconv.encode(text, 'utf8', { addBOM: true });
}
