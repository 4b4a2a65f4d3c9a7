import { CellValue, TableRow } from '../model/cells';

export type KeyColumns<Row> = readonly (keyof Row & string)[];

/**
 * Composite key of a row, or null when any key column is null
 */
export function rowKey<Row extends TableRow>(row: Row, columns: KeyColumns<Row>): string | null {
  const parts: CellValue[] = columns.map(column => row[column]);
  if (parts.some(part => part === null)) {
    return null;
  }
  return JSON.stringify(parts);
}

/**
 * Rows whose key columns are all non-null, in source order
 */
export function withCompleteKey<Row extends TableRow>(rows: readonly Row[], columns: KeyColumns<Row>): Row[] {
  return rows.filter(row => rowKey(row, columns) !== null);
}

/**
 * Rows minus distinct keys, over rows with a complete key
 */
export function countDuplicates<Row extends TableRow>(rows: readonly Row[], columns: KeyColumns<Row>): number {
  const keyed = withCompleteKey(rows, columns);
  const distinct = new Set(keyed.map(row => rowKey(row, columns)));
  return keyed.length - distinct.size;
}

/**
 * First row per complete key, in source order
 */
export function firstPerKey<Row extends TableRow>(rows: readonly Row[], columns: KeyColumns<Row>): Row[] {
  const seen = new Set<string>();
  const kept: Row[] = [];

  for (const row of rows) {
    const key = rowKey(row, columns);
    if (key === null || seen.has(key)) continue;
    seen.add(key);
    kept.push(row);
  }
  return kept;
}
