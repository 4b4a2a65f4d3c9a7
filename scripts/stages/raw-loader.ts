/**
 * Raw loader: one delimited file per raw table, truncate-and-reload.
 *
 * The header row is skipped and cells map to the table's columns by position,
 * so a file's header names do not need to match the column names.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse';
import { ETLConfig, SourceEntity } from '../lib/config-loader';
import { errorMessage } from '../lib/error-handler';
import { TableRow } from '../model/cells';
import {
  TableDefinition,
  rawBrands,
  rawCategories,
  rawCustomers,
  rawOrderItems,
  rawOrders,
  rawProducts,
  rawStaffs,
  rawStocks,
  rawStores,
} from '../model/tables';
import { StageOptions, StageResult, TableStep, runTableSteps } from './stage-runner';

export interface RawLoadOptions extends StageOptions {
  inputFiles: ETLConfig['inputFiles'];
}

/**
 * Map one parsed record onto the table's columns by position
 */
export function recordToRow<Row>(table: TableDefinition<Row>, record: unknown): Row {
  if (!Array.isArray(record)) {
    throw new Error('Expected a delimited record');
  }
  const cells: unknown[] = record;
  const shaped: Record<string, unknown> = {};
  table.columns.forEach((column, index) => {
    shaped[column.name] = cells[index];
  });
  return table.parse(shaped);
}

/**
 * Parse a CSV file (comma delimited, double-quote enclosed, header skipped) into table rows
 */
export async function readCsvRows<Row>(filePath: string, table: TableDefinition<Row>): Promise<Row[]> {
  const rows: Row[] = [];
  const source = fs.createReadStream(filePath);
  const parser = source.pipe(
    parse({
      bom: true,
      from_line: 2,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );
  // pipe() does not carry read errors (a missing file) over to the parser
  source.on('error', error => parser.destroy(error));

  let recordNumber = 0;
  try {
    for await (const record of parser) {
      recordNumber++;
      try {
        rows.push(recordToRow(table, record));
      } catch (error) {
        throw new Error(`Record ${recordNumber} (${path.basename(filePath)}): ${errorMessage(error)}`);
      }
    }
  } finally {
    source.destroy();
  }
  return rows;
}

function rawStep<Row extends TableRow>(
  table: TableDefinition<Row>,
  entity: SourceEntity,
  options: RawLoadOptions
): TableStep {
  return {
    tableName: table.name,
    async execute() {
      await options.store.truncate(table);
      const filePath = path.resolve(options.inputFiles.directory, options.inputFiles[entity]);
      const rows = await readCsvRows(filePath, table);
      return options.store.insertRows(table, rows);
    },
  };
}

/**
 * Load every raw table from its source file
 */
export async function runRawLoad(options: RawLoadOptions): Promise<StageResult> {
  const steps: TableStep[] = [
    rawStep(rawBrands, 'brands', options),
    rawStep(rawCategories, 'categories', options),
    rawStep(rawProducts, 'products', options),
    rawStep(rawCustomers, 'customers', options),
    rawStep(rawOrders, 'orders', options),
    rawStep(rawOrderItems, 'orderItems', options),
    rawStep(rawStores, 'stores', options),
    rawStep(rawStaffs, 'staffs', options),
    rawStep(rawStocks, 'stocks', options),
  ];

  return runTableSteps(
    'Raw Load',
    'RawBatch',
    steps,
    {
      success: rows => `Loaded successfully (${rows} rows)`,
      failure: message => `Load failed - check file path and format: ${message}`,
    },
    options
  );
}
