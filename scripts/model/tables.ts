/**
 * Table definitions for every layer of the warehouse.
 *
 * A definition carries the table's layer (which maps to a configured schema),
 * its name, its ordered column list and a parser that validates a row read
 * from storage or a CSV file. Row types are inferred from the definitions.
 */

import { z } from 'zod';
import { cells, parseColumnType, ColumnType } from './cells';

export type Layer = 'raw' | 'staging' | 'warehouse' | 'audit';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
}

export interface TableDefinition<Row> {
  layer: Layer;
  name: string;
  columns: readonly ColumnDefinition[];
  parse(input: unknown): Row;
}

export type RowOf<T> = T extends TableDefinition<infer Row> ? Row : never;

export function defineTable<S extends z.ZodRawShape>(
  layer: Layer,
  name: string,
  shape: S
): TableDefinition<z.infer<z.ZodObject<S>>> {
  const schema = z.object(shape);
  const entries: [string, z.ZodTypeAny][] = Object.entries(shape);
  const columns = entries.map(([column, cell]) => ({
    name: column,
    type: parseColumnType(cell.description),
  }));

  return {
    layer,
    name,
    columns,
    parse: (input: unknown) => schema.parse(input),
  };
}

// =============================================================================
// Raw layer: verbatim mirror of the source files
// =============================================================================

export const rawBrands = defineTable('raw', 'raw_brands', {
  brand_id: cells.int(),
  brand_name: cells.text(),
});

export const rawCategories = defineTable('raw', 'raw_categories', {
  category_id: cells.int(),
  category_name: cells.text(),
});

export const rawCustomers = defineTable('raw', 'raw_customers', {
  customer_id: cells.int(),
  first_name: cells.text(),
  last_name: cells.text(),
  phone: cells.text(),
  email: cells.text(),
  street: cells.text(),
  city: cells.text(),
  state: cells.text(),
  zipcode: cells.int(),
});

export const rawStores = defineTable('raw', 'raw_stores', {
  store_id: cells.int(),
  store_name: cells.text(),
  phone: cells.text(),
  email: cells.text(),
  street: cells.text(),
  city: cells.text(),
  state: cells.text(),
  zipcode: cells.int(),
});

export const rawOrders = defineTable('raw', 'raw_orders', {
  order_id: cells.int(),
  customer_id: cells.int(),
  order_status: cells.int(),
  order_date: cells.date(),
  required_date: cells.date(),
  shipped_date: cells.date(),
  store_id: cells.int(),
  staff_id: cells.int(),
});

export const rawStaffs = defineTable('raw', 'raw_staffs', {
  staff_id: cells.int(),
  first_name: cells.text(),
  last_name: cells.text(),
  email: cells.text(),
  phone: cells.text(),
  active: cells.int(),
  store_id: cells.int(),
  manager_id: cells.int(),
});

export const rawProducts = defineTable('raw', 'raw_products', {
  product_id: cells.int(),
  product_name: cells.text(255),
  brand_id: cells.int(),
  category_id: cells.int(),
  model_year: cells.int(),
  list_price: cells.decimal(),
});

export const rawOrderItems = defineTable('raw', 'raw_order_items', {
  order_id: cells.int(),
  item_id: cells.int(),
  product_id: cells.int(),
  quantity: cells.int(),
  list_price: cells.decimal(),
  discount: cells.decimal(),
});

export const rawStocks = defineTable('raw', 'raw_stocks', {
  store_id: cells.int(),
  product_id: cells.int(),
  quantity: cells.int(),
});

// =============================================================================
// Staging layer: cleaned, one row per natural key
// =============================================================================

export const stgBrands = defineTable('staging', 'stg_brands', {
  brand_id: cells.int(),
  brand_name: cells.text(),
});

export const stgCategories = defineTable('staging', 'stg_categories', {
  category_id: cells.int(),
  category_name: cells.text(),
});

export const stgProducts = defineTable('staging', 'stg_products', {
  product_id: cells.int(),
  product_name: cells.text(255),
  brand_id: cells.int(),
  category_id: cells.int(),
  list_price: cells.decimal(),
});

export const stgCustomers = defineTable('staging', 'stg_customers', {
  customer_id: cells.int(),
  customer_name: cells.text(101),
  city: cells.text(),
  state: cells.text(),
});

export const stgOrders = defineTable('staging', 'stg_orders', {
  order_id: cells.int(),
  customer_id: cells.int(),
  order_date: cells.date(),
  shipped_date: cells.date(),
  store_id: cells.int(),
  staff_id: cells.int(),
});

export const stgOrderItems = defineTable('staging', 'stg_order_items', {
  order_id: cells.int(),
  item_id: cells.int(),
  product_id: cells.int(),
  quantity: cells.int(),
  list_price: cells.decimal(),
  discount: cells.decimal(),
  sales: cells.decimal(),
});

export const stgStores = defineTable('staging', 'stg_stores', {
  store_id: cells.int(),
  store_name: cells.text(),
  city: cells.text(),
  state: cells.text(),
});

export const stgStaffs = defineTable('staging', 'stg_staffs', {
  staff_id: cells.int(),
  staff_name: cells.text(101),
  store_id: cells.int(),
  manager_id: cells.int(),
});

export const stgStocks = defineTable('staging', 'stg_stocks', {
  store_id: cells.int(),
  product_id: cells.int(),
  quantity: cells.int(),
});

// =============================================================================
// Warehouse layer: star schema
// =============================================================================

export const dimCustomers = defineTable('warehouse', 'dim_customers', {
  customer_id: cells.int(),
  customer_name: cells.text(101),
  city: cells.text(),
  state: cells.text(),
});

export const dimProducts = defineTable('warehouse', 'dim_products', {
  product_id: cells.int(),
  product_name: cells.text(255),
  brand_name: cells.text(),
  category_name: cells.text(),
  list_price: cells.decimal(),
});

export const dimStores = defineTable('warehouse', 'dim_stores', {
  store_id: cells.int(),
  store_name: cells.text(),
  city: cells.text(),
  state: cells.text(),
});

export const dimStaffs = defineTable('warehouse', 'dim_staffs', {
  staff_id: cells.int(),
  staff_name: cells.text(101),
  store_id: cells.int(),
  manager_id: cells.int(),
});

export const dimDates = defineTable('warehouse', 'dim_dates', {
  date_id: cells.int(),
  full_date: cells.date(),
  day: cells.int(),
  month: cells.int(),
  month_name: cells.text(20),
  quarter: cells.int(),
  year: cells.int(),
  week_of_year: cells.int(),
});

export const factSales = defineTable('warehouse', 'fact_sales', {
  sales_id: cells.int(),
  order_id: cells.int(),
  item_id: cells.int(),
  customer_id: cells.int(),
  product_id: cells.int(),
  store_id: cells.int(),
  staff_id: cells.int(),
  date_id: cells.int(),
  quantity: cells.int(),
  list_price: cells.decimal(),
  sales: cells.decimal(),
  discount: cells.decimal(),
  total_amount: cells.decimal(),
});

export const factInventory = defineTable('warehouse', 'fact_inventory', {
  inventory_id: cells.int(),
  store_id: cells.int(),
  product_id: cells.int(),
  stock_quantity: cells.int(),
  last_updated: cells.date(),
});

// =============================================================================
// Audit tables: append-only, grouped by batch tag
// =============================================================================

export const loadLog = defineTable('audit', 'load_log', {
  table_name: cells.text(),
  load_status: cells.text(20),
  message: cells.text('max'),
  batch_tag: cells.text(100),
  load_time: cells.timestamp(),
});

export const duplicateChecker = defineTable('audit', 'duplicate_checker', {
  table_name: cells.text(),
  duplicate_status: cells.text(),
  duplicate_count: cells.int(),
  batch_tag: cells.text(100),
  checked_at: cells.timestamp(),
});

export const qualityCheckResults = defineTable('audit', 'quality_check_results', {
  layer: cells.text(20),
  check_category: cells.text(),
  check_name: cells.text(100),
  table_name: cells.text(),
  test_result: cells.text(20),
  total_rows: cells.int(),
  issue_count: cells.int(),
  issue_percentage: cells.decimal(),
  message: cells.text('max'),
  batch_tag: cells.text(100),
  checked_at: cells.timestamp(),
});

export type RawBrand = RowOf<typeof rawBrands>;
export type RawCategory = RowOf<typeof rawCategories>;
export type RawCustomer = RowOf<typeof rawCustomers>;
export type RawStore = RowOf<typeof rawStores>;
export type RawOrder = RowOf<typeof rawOrders>;
export type RawStaff = RowOf<typeof rawStaffs>;
export type RawProduct = RowOf<typeof rawProducts>;
export type RawOrderItem = RowOf<typeof rawOrderItems>;
export type RawStock = RowOf<typeof rawStocks>;

export type StgBrand = RowOf<typeof stgBrands>;
export type StgCategory = RowOf<typeof stgCategories>;
export type StgProduct = RowOf<typeof stgProducts>;
export type StgCustomer = RowOf<typeof stgCustomers>;
export type StgOrder = RowOf<typeof stgOrders>;
export type StgOrderItem = RowOf<typeof stgOrderItems>;
export type StgStore = RowOf<typeof stgStores>;
export type StgStaff = RowOf<typeof stgStaffs>;
export type StgStock = RowOf<typeof stgStocks>;

export type DimCustomer = RowOf<typeof dimCustomers>;
export type DimProduct = RowOf<typeof dimProducts>;
export type DimStore = RowOf<typeof dimStores>;
export type DimStaff = RowOf<typeof dimStaffs>;
export type DimDate = RowOf<typeof dimDates>;
export type FactSale = RowOf<typeof factSales>;
export type FactInventory = RowOf<typeof factInventory>;

export type LoadLogEntry = RowOf<typeof loadLog>;
export type DuplicateCheckRecord = RowOf<typeof duplicateChecker>;
export type QualityCheckRow = RowOf<typeof qualityCheckResults>;
