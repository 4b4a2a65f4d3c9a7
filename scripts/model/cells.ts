/**
 * Column cell schemas shared by every table definition.
 *
 * Each builder returns a zod schema that accepts what a CSV parser or the
 * mssql driver hands back for that column and normalizes it to a CellValue.
 * The SQL column type travels with the schema as its description so the bulk
 * loader can rebuild the column list without a second declaration.
 */

import { z } from 'zod';

export type CellValue = string | number | null;
export type TableRow = Record<string, CellValue>;

export type ColumnType =
  | { kind: 'int' }
  | { kind: 'decimal'; precision: number; scale: number }
  | { kind: 'text'; length: number | 'max' }
  | { kind: 'date' }
  | { kind: 'timestamp' };

const NULL_TOKENS = new Set(['', 'NULL', '\\N']);
const ISO_DATE = /^(\d{4}-\d{2}-\d{2})/;

function blankToNull(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value === 'string' && NULL_TOKENS.has(value.trim())) return null;
  return value;
}

function toNumber(value: unknown): unknown {
  const cleaned = blankToNull(value);
  return typeof cleaned === 'string' ? Number(cleaned.trim()) : cleaned;
}

// DATE columns come back from the driver as Date objects (UTC midnight)
function toCalendarDate(value: unknown): unknown {
  const cleaned = blankToNull(value);
  if (cleaned instanceof Date) {
    return Number.isNaN(cleaned.getTime()) ? cleaned : cleaned.toISOString().slice(0, 10);
  }
  if (typeof cleaned === 'string') {
    const match = ISO_DATE.exec(cleaned.trim());
    return match ? match[1] : cleaned;
  }
  return cleaned;
}

function toTimestamp(value: unknown): unknown {
  const cleaned = blankToNull(value);
  if (cleaned instanceof Date && !Number.isNaN(cleaned.getTime())) {
    return cleaned.toISOString();
  }
  return cleaned;
}

function toText(value: unknown): unknown {
  const cleaned = blankToNull(value);
  return typeof cleaned === 'number' ? String(cleaned) : cleaned;
}

export const cells = {
  int: () => z.preprocess(toNumber, z.number().int().nullable()).describe('int'),
  decimal: () => z.preprocess(toNumber, z.number().finite().nullable()).describe('decimal(10,2)'),
  text: (length: number | 'max' = 50) =>
    z.preprocess(toText, z.string().nullable()).describe(`text(${length})`),
  date: () =>
    z
      .preprocess(toCalendarDate, z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date').nullable())
      .describe('date'),
  timestamp: () =>
    z
      .preprocess(toTimestamp, z.string().datetime({ message: 'Expected an ISO-8601 timestamp' }).nullable())
      .describe('timestamp'),
};

/**
 * Recover the SQL column type a cell builder stamped on its schema
 */
export function parseColumnType(description: string | undefined): ColumnType {
  if (description === 'int') return { kind: 'int' };
  if (description === 'date') return { kind: 'date' };
  if (description === 'timestamp') return { kind: 'timestamp' };

  const decimal = /^decimal\((\d+),(\d+)\)$/.exec(description ?? '');
  if (decimal) {
    return { kind: 'decimal', precision: Number(decimal[1]), scale: Number(decimal[2]) };
  }

  const text = /^text\((\d+|max)\)$/.exec(description ?? '');
  if (text) {
    return { kind: 'text', length: text[1] === 'max' ? 'max' : Number(text[1]) };
  }

  throw new Error(`Unknown column type: ${description ?? '(none)'}`);
}
