/**
 * Row decoding helpers - sql.js hands back loosely typed column values;
 * these narrow them at the storage boundary.
 */

import type { SqlValue } from 'sql.js';

export type Row = Record<string, SqlValue>;

function columnError(column: string, expected: string, value: SqlValue | undefined): Error {
  const actual = value === undefined ? 'missing' : value === null ? 'null' : typeof value;
  return new Error(`column ${column}: expected ${expected}, got ${actual}`);
}

export function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw columnError(column, 'string', value);
  return value;
}

export function readOptionalString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw columnError(column, 'string', value);
  return value;
}

export function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') throw columnError(column, 'number', value);
  return value;
}

export function readOptionalNumber(row: Row, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'number') throw columnError(column, 'number', value);
  return value;
}

/** SQLite has no boolean type; flags are stored as 0/1. */
export function readBoolean(row: Row, column: string): boolean {
  return readNumber(row, column) !== 0;
}

/** Parse a JSON text column. The result is unknown until a schema narrows it. */
export function readJson(row: Row, column: string): unknown {
  const text = readString(row, column);
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
