/**
 * CSV parsing shared by the file and report adapters
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawValue } from '../types.js';

const CsvRowsSchema = z.array(z.record(z.string()));

export type CsvRow = Record<string, string>;

/**
 * Parse CSV text with a header row into records keyed by column name
 */
export function parseCsvRows(text: string): CsvRow[] {
  const rows: unknown = parse(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return CsvRowsSchema.parse(rows);
}

/**
 * First non-empty value among the given columns
 */
export function pick(row: CsvRow, ...columns: string[]): string | undefined {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Drop absent entries so that the field map stays sparse
 */
export function compact(fields: Record<string, RawValue>): Record<string, RawValue> {
  const result: Record<string, RawValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
