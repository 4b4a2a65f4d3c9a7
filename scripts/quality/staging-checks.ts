/**
 * Staging quality battery. Every staging table gets a required-field null
 * check, a key duplicate check and a raw-versus-staging count validation;
 * stg_orders adds date range checks, and three completeness checks close the
 * battery.
 */

import { TableRow } from '../model/cells';
import {
  RawBrand,
  RawCategory,
  RawCustomer,
  RawOrder,
  RawOrderItem,
  RawProduct,
  RawStaff,
  RawStock,
  RawStore,
  StgBrand,
  StgCategory,
  StgCustomer,
  StgOrder,
  StgOrderItem,
  StgProduct,
  StgStaff,
  StgStock,
  StgStore,
  rawBrands,
  rawCategories,
  rawCustomers,
  rawOrderItems,
  rawOrders,
  rawProducts,
  rawStaffs,
  rawStocks,
  rawStores,
  stgBrands,
  stgCategories,
  stgCustomers,
  stgOrderItems,
  stgOrders,
  stgProducts,
  stgStaffs,
  stgStocks,
  stgStores,
} from '../model/tables';
import { TableStore } from '../lib/table-store';
import { KeyColumns, withCompleteKey } from '../transforms/dedupe';
import {
  QualityCheck,
  distinctValues,
  keyUniquenessCheck,
  nullColumnsCheck,
  rowRuleCheck,
} from './check-types';

export interface StagingSnapshot {
  raw: {
    brands: RawBrand[];
    categories: RawCategory[];
    products: RawProduct[];
    customers: RawCustomer[];
    orders: RawOrder[];
    orderItems: RawOrderItem[];
    stores: RawStore[];
    staffs: RawStaff[];
    stocks: RawStock[];
  };
  staging: {
    brands: StgBrand[];
    categories: StgCategory[];
    products: StgProduct[];
    customers: StgCustomer[];
    orders: StgOrder[];
    orderItems: StgOrderItem[];
    stores: StgStore[];
    staffs: StgStaff[];
    stocks: StgStock[];
  };
}

export interface StagingCheckOptions {
  /** Calendar date the future-date check compares against, YYYY-MM-DD */
  today: string;
  /** Allowed |raw - staging| as a fraction of the raw count */
  countVarianceThreshold: number;
}

export async function readStagingSnapshot(store: TableStore): Promise<StagingSnapshot> {
  return {
    raw: {
      brands: await store.readRows(rawBrands),
      categories: await store.readRows(rawCategories),
      products: await store.readRows(rawProducts),
      customers: await store.readRows(rawCustomers),
      orders: await store.readRows(rawOrders),
      orderItems: await store.readRows(rawOrderItems),
      stores: await store.readRows(rawStores),
      staffs: await store.readRows(rawStaffs),
      stocks: await store.readRows(rawStocks),
    },
    staging: {
      brands: await store.readRows(stgBrands),
      categories: await store.readRows(stgCategories),
      products: await store.readRows(stgProducts),
      customers: await store.readRows(stgCustomers),
      orders: await store.readRows(stgOrders),
      orderItems: await store.readRows(stgOrderItems),
      stores: await store.readRows(stgStores),
      staffs: await store.readRows(stgStaffs),
      stocks: await store.readRows(stgStocks),
    },
  };
}

type Check = QualityCheck<StagingSnapshot>;

interface TableBattery<Raw extends TableRow, Stg extends TableRow> {
  table: string;
  raw: (s: StagingSnapshot) => readonly Raw[];
  rawKey: KeyColumns<Raw>;
  staged: (s: StagingSnapshot) => readonly Stg[];
  key: KeyColumns<Stg>;
  required: KeyColumns<Stg>;
}

function describeColumns(columns: readonly string[]): string {
  return columns.length === 1 ? columns[0] : `(${columns.join(', ')})`;
}

/**
 * Null, duplicate and count checks for one staging table
 */
function tableChecks<Raw extends TableRow, Stg extends TableRow>(
  battery: TableBattery<Raw, Stg>,
  options: StagingCheckOptions
): Check[] {
  const requiredList = battery.required.join(', ');
  const keyLabel = describeColumns(battery.key);

  const countValidation: Check = {
    category: 'Count Validation',
    name: 'Raw vs staging row count',
    table: battery.table,
    severity: 'WARNING',
    evaluate(s) {
      const rawCount = withCompleteKey(battery.raw(s), battery.rawKey).length;
      const stagedCount = battery.staged(s).length;
      const difference = Math.abs(rawCount - stagedCount);
      return {
        totalRows: rawCount,
        issueCount: difference,
        result: difference <= rawCount * options.countVarianceThreshold ? 'PASS' : 'WARNING',
        message: `Raw count: ${rawCount}, Staging count: ${stagedCount}`,
      };
    },
  };

  return [
    nullColumnsCheck({
      category: 'Null Check',
      name: `Check for NULL in required fields (${requiredList})`,
      table: battery.table,
      severity: 'FAIL',
      rows: battery.staged,
      columns: battery.required,
      messages: {
        pass: 'No NULL values in required fields',
        fail: issues => `Found ${issues} rows with NULL in required fields`,
      },
    }),
    keyUniquenessCheck({
      category: 'Duplicate Check',
      name: `Check for duplicate ${keyLabel}`,
      table: battery.table,
      severity: 'FAIL',
      rows: battery.staged,
      key: battery.key,
      messages: {
        pass: `All ${keyLabel} values are unique`,
        fail: issues => `Found ${issues} duplicate ${keyLabel} values`,
      },
    }),
    countValidation,
  ];
}

function orderDateChecks(options: StagingCheckOptions): Check[] {
  const orders = (s: StagingSnapshot) => s.staging.orders;
  return [
    rowRuleCheck({
      category: 'Invalid Date Range',
      name: 'Check shipped_date is not before order_date',
      table: 'stg_orders',
      severity: 'FAIL',
      rows: orders,
      isIssue: row => row.shipped_date !== null && row.order_date !== null && row.shipped_date < row.order_date,
      messages: {
        pass: 'No orders shipped before they were placed',
        fail: issues => `Found ${issues} orders with shipped_date before order_date`,
      },
    }),
    rowRuleCheck({
      category: 'Invalid Date Range',
      name: 'Check for future order/shipped dates',
      table: 'stg_orders',
      severity: 'FAIL',
      rows: orders,
      isIssue: row =>
        (row.order_date !== null && row.order_date > options.today) ||
        (row.shipped_date !== null && row.shipped_date > options.today),
      messages: {
        pass: 'No future order or shipped dates',
        fail: issues => `Found ${issues} orders dated after ${options.today}`,
      },
    }),
  ];
}

function completenessChecks(): Check[] {
  const completeness = (
    name: string,
    table: string,
    parents: (s: StagingSnapshot) => Set<string | number>,
    children: (s: StagingSnapshot) => Set<string | number>
  ): Check => ({
    category: 'Completeness',
    name,
    table,
    severity: 'WARNING',
    evaluate(s) {
      const parentKeys = parents(s);
      const childKeys = children(s);
      const missing = [...parentKeys].filter(key => !childKeys.has(key)).length;
      return {
        totalRows: parentKeys.size,
        issueCount: missing,
        message: `${name}: ${missing} out of ${parentKeys.size}`,
      };
    },
  });

  return [
    completeness(
      'Products without stock info',
      'stg_products',
      s => distinctValues(s.staging.products, row => row.product_id),
      s => distinctValues(s.staging.stocks, row => row.product_id)
    ),
    completeness(
      'Orders without order items',
      'stg_orders',
      s => distinctValues(s.staging.orders, row => row.order_id),
      s => distinctValues(s.staging.orderItems, row => row.order_id)
    ),
    completeness(
      'Stores without staff',
      'stg_stores',
      s => distinctValues(s.staging.stores, row => row.store_id),
      s => distinctValues(s.staging.staffs, row => row.store_id)
    ),
  ];
}

/**
 * The full staging battery, in reporting order
 */
export function stagingChecks(options: StagingCheckOptions): Check[] {
  return [
    ...tableChecks(
      {
        table: 'stg_brands',
        raw: s => s.raw.brands,
        rawKey: ['brand_id'],
        staged: s => s.staging.brands,
        key: ['brand_id'],
        required: ['brand_id', 'brand_name'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_categories',
        raw: s => s.raw.categories,
        rawKey: ['category_id'],
        staged: s => s.staging.categories,
        key: ['category_id'],
        required: ['category_id', 'category_name'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_products',
        raw: s => s.raw.products,
        rawKey: ['product_id'],
        staged: s => s.staging.products,
        key: ['product_id'],
        required: ['product_id', 'product_name', 'brand_id', 'category_id'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_customers',
        raw: s => s.raw.customers,
        rawKey: ['customer_id'],
        staged: s => s.staging.customers,
        key: ['customer_id'],
        required: ['customer_id', 'customer_name'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_orders',
        raw: s => s.raw.orders,
        rawKey: ['order_id'],
        staged: s => s.staging.orders,
        key: ['order_id'],
        required: ['order_id', 'customer_id', 'order_date'],
      },
      options
    ),
    ...orderDateChecks(options),
    ...tableChecks(
      {
        table: 'stg_order_items',
        raw: s => s.raw.orderItems,
        rawKey: ['order_id', 'item_id', 'product_id'],
        staged: s => s.staging.orderItems,
        key: ['order_id', 'item_id', 'product_id'],
        required: ['order_id', 'product_id', 'quantity', 'list_price'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_stores',
        raw: s => s.raw.stores,
        rawKey: ['store_id'],
        staged: s => s.staging.stores,
        key: ['store_id'],
        required: ['store_id', 'store_name'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_staffs',
        raw: s => s.raw.staffs,
        rawKey: ['staff_id'],
        staged: s => s.staging.staffs,
        key: ['staff_id'],
        required: ['staff_id', 'staff_name', 'store_id'],
      },
      options
    ),
    ...tableChecks(
      {
        table: 'stg_stocks',
        raw: s => s.raw.stocks,
        rawKey: ['store_id', 'product_id'],
        staged: s => s.staging.stocks,
        key: ['store_id', 'product_id'],
        required: ['store_id', 'product_id', 'quantity'],
      },
      options
    ),
    ...completenessChecks(),
  ];
}
