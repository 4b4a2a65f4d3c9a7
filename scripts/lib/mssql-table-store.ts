import * as sql from 'mssql';
import { CellValue, ColumnType, TableRow } from '../model/cells';
import { Layer, TableDefinition } from '../model/tables';
import { TableStore } from './table-store';

export function sqlType(type: ColumnType): sql.ISqlType {
  switch (type.kind) {
    case 'int':
      return sql.Int();
    case 'decimal':
      return sql.Decimal(type.precision, type.scale);
    case 'text':
      return sql.NVarChar(type.length === 'max' ? sql.MAX : type.length);
    case 'date':
      return sql.Date();
    case 'timestamp':
      return sql.DateTime2();
  }
}

// The driver wants Date objects for DATE and DATETIME2 parameters
export function driverValue(type: ColumnType, value: CellValue): CellValue | Date {
  if (value === null) return null;
  if (type.kind === 'date') return new Date(`${value}T00:00:00Z`);
  if (type.kind === 'timestamp') return new Date(String(value));
  return value;
}

/**
 * SQL Server table store: SELECT to read, TRUNCATE TABLE to empty and the
 * TDS bulk-load protocol to append.
 */
export class MssqlTableStore implements TableStore {
  constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly schemas: Record<Layer, string>
  ) {}

  qualifiedName(table: TableDefinition<unknown>): string {
    return `[${this.schemas[table.layer]}].[${table.name}]`;
  }

  async readRows<Row>(table: TableDefinition<Row>): Promise<Row[]> {
    const columns = table.columns.map(column => `[${column.name}]`).join(', ');
    const result = await this.pool.request().query(`SELECT ${columns} FROM ${this.qualifiedName(table)}`);
    return result.recordset.map(record => table.parse(record));
  }

  async truncate(table: TableDefinition<unknown>): Promise<void> {
    await this.pool.request().batch(`TRUNCATE TABLE ${this.qualifiedName(table)}`);
  }

  async insertRows<Row extends TableRow>(table: TableDefinition<Row>, rows: readonly Row[]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }

    const bulkTable = new sql.Table(this.qualifiedName(table));
    bulkTable.create = false; // created by the setup scripts

    for (const column of table.columns) {
      bulkTable.columns.add(column.name, sqlType(column.type), { nullable: true });
    }

    for (const row of rows) {
      bulkTable.rows.add(...table.columns.map(column => driverValue(column.type, row[column.name])));
    }

    const result = await this.pool.request().bulk(bulkTable);
    return result.rowsAffected;
  }
}
