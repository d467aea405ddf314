import { writeFileSync } from 'node:fs';

export type CsvValue = string | number | boolean | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

/** RFC 4180 field: quoted only when it contains a comma, quote or line break. */
export function escapeCsvField(value: CsvValue): string {
  if (value == null) return '';
  if (typeof value === 'number' && !Number.isFinite(value)) return '';
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(headers: string[], rows: CsvValue[][]): string {
  const lines = [headers, ...rows].map((row) => row.map(escapeCsvField).join(','));
  return `${lines.join('\n')}\n`;
}

export function writeCsv(path: string, headers: string[], rows: CsvValue[][]): void {
  writeFileSync(path, toCsv(headers, rows), 'utf-8');
}
