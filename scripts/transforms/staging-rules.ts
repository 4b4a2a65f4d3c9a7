/**
 * Staging rules: one rule per raw table.
 *
 * A rule names its raw source, its staging target, the natural key used for
 * duplicate counting and first-per-key dedupe, and a pure clean function that
 * maps one raw row to one staging row.
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
import { TableStore, reloadTable } from '../lib/table-store';
import { KeyColumns, countDuplicates, firstPerKey } from './dedupe';
import { fullName, lineSales, standardizeState, trimText } from './cleaning';

export interface PreparedStaging {
  duplicateCount: number;
  /** Truncate the staging table and insert the cleaned rows */
  load(store: TableStore): Promise<number>;
}

export interface StagingRule {
  target: TableDefinition<unknown>;
  prepare(store: TableStore): Promise<PreparedStaging>;
}

interface StagingRuleSpec<Source extends TableRow, Target extends TableRow> {
  source: TableDefinition<Source>;
  target: TableDefinition<Target>;
  key: KeyColumns<Source>;
  clean(row: Source): Target;
}

/**
 * Deduplicate then clean, keeping the first row per key in source order
 */
export function stageRows<Source extends TableRow, Target extends TableRow>(
  rows: readonly Source[],
  key: KeyColumns<Source>,
  clean: (row: Source) => Target
): Target[] {
  return firstPerKey(rows, key).map(clean);
}

function stagingRule<Source extends TableRow, Target extends TableRow>(
  spec: StagingRuleSpec<Source, Target>
): StagingRule {
  return {
    target: spec.target,
    async prepare(store) {
      const rows = await store.readRows(spec.source);
      const staged = stageRows(rows, spec.key, spec.clean);
      return {
        duplicateCount: countDuplicates(rows, spec.key),
        load: destination => reloadTable(destination, spec.target, staged),
      };
    },
  };
}

// =============================================================================
// Clean functions
// =============================================================================

export function cleanBrand(row: RawBrand): StgBrand {
  return { brand_id: row.brand_id, brand_name: trimText(row.brand_name) };
}

export function cleanCategory(row: RawCategory): StgCategory {
  return { category_id: row.category_id, category_name: trimText(row.category_name) };
}

export function cleanProduct(row: RawProduct): StgProduct {
  return {
    product_id: row.product_id,
    product_name: trimText(row.product_name),
    brand_id: row.brand_id,
    category_id: row.category_id,
    list_price: row.list_price,
  };
}

export function cleanCustomer(row: RawCustomer): StgCustomer {
  return {
    customer_id: row.customer_id,
    customer_name: fullName(row.first_name, row.last_name),
    city: trimText(row.city),
    state: standardizeState(row.state),
  };
}

export function cleanOrder(row: RawOrder): StgOrder {
  return {
    order_id: row.order_id,
    customer_id: row.customer_id,
    order_date: row.order_date,
    // unshipped orders fall back to the required date
    shipped_date: row.shipped_date ?? row.required_date,
    store_id: row.store_id,
    staff_id: row.staff_id,
  };
}

export function cleanOrderItem(row: RawOrderItem): StgOrderItem {
  return {
    order_id: row.order_id,
    item_id: row.item_id,
    product_id: row.product_id,
    quantity: row.quantity,
    list_price: row.list_price,
    discount: row.discount,
    sales: lineSales(row.quantity, row.list_price, row.discount),
  };
}

export function cleanStore(row: RawStore): StgStore {
  return {
    store_id: row.store_id,
    store_name: trimText(row.store_name),
    city: trimText(row.city),
    state: standardizeState(row.state),
  };
}

export function cleanStaff(row: RawStaff): StgStaff {
  return {
    staff_id: row.staff_id,
    staff_name: fullName(row.first_name, row.last_name),
    store_id: row.store_id,
    manager_id: row.manager_id ?? 0,
  };
}

export function cleanStock(row: RawStock): StgStock {
  return { store_id: row.store_id, product_id: row.product_id, quantity: row.quantity };
}

// =============================================================================
// Rules, in load order
// =============================================================================

export const STAGING_RULES: readonly StagingRule[] = [
  stagingRule({ source: rawBrands, target: stgBrands, key: ['brand_id'], clean: cleanBrand }),
  stagingRule({ source: rawCategories, target: stgCategories, key: ['category_id'], clean: cleanCategory }),
  stagingRule({ source: rawProducts, target: stgProducts, key: ['product_id'], clean: cleanProduct }),
  stagingRule({ source: rawCustomers, target: stgCustomers, key: ['customer_id'], clean: cleanCustomer }),
  stagingRule({ source: rawOrders, target: stgOrders, key: ['order_id'], clean: cleanOrder }),
  stagingRule({
    source: rawOrderItems,
    target: stgOrderItems,
    key: ['order_id', 'item_id', 'product_id'],
    clean: cleanOrderItem,
  }),
  stagingRule({ source: rawStores, target: stgStores, key: ['store_id'], clean: cleanStore }),
  stagingRule({ source: rawStaffs, target: stgStaffs, key: ['staff_id'], clean: cleanStaff }),
  stagingRule({ source: rawStocks, target: stgStocks, key: ['store_id', 'product_id'], clean: cleanStock }),
];
