import { TableDefinition } from '../model/tables';
import { TableRow } from '../model/cells';

/**
 * Storage seam for every stage.
 *
 * Stages only ever read a whole table, empty it, or append rows to it, which
 * is all truncate-and-reload needs. Reads return rows validated by the
 * table's schema.
 */
export interface TableStore {
  readRows<Row>(table: TableDefinition<Row>): Promise<Row[]>;
  truncate(table: TableDefinition<unknown>): Promise<void>;
  insertRows<Row extends TableRow>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<number>;
}

/**
 * Truncate then insert, returning the number of rows written
 */
export async function reloadTable<Row extends TableRow>(
  store: TableStore,
  table: TableDefinition<Row>,
  rows: readonly Row[]
): Promise<number> {
  await store.truncate(table);
  return store.insertRows(table, rows);
}
