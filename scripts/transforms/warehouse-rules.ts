/**
 * Warehouse derivations: dimension projections, the generated date dimension
 * and the two fact tables. Builders are pure; WAREHOUSE_RULES wires them to
 * their staging inputs in load order.
 */

import {
  DimCustomer,
  DimDate,
  DimProduct,
  DimStaff,
  DimStore,
  FactInventory,
  FactSale,
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
  dimCustomers,
  dimDates,
  dimProducts,
  dimStaffs,
  dimStores,
  factInventory,
  factSales,
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
import { totalAmount } from './cleaning';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const DAY_MS = 24 * 60 * 60 * 1000;

export interface WarehouseContext {
  /** Calendar date of the run, YYYY-MM-DD */
  runDate: string;
}

export interface WarehouseRule {
  target: TableDefinition<unknown>;
  /** Read inputs, truncate the target and insert the derived rows */
  load(store: TableStore, context: WarehouseContext): Promise<number>;
}

/**
 * Group rows by a non-null key; rows with a null key are left out, as in an equi-join
 */
function indexBy<Row, Key>(rows: readonly Row[], keyOf: (row: Row) => Key | null): Map<Key, Row[]> {
  const index = new Map<Key, Row[]>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }
  return index;
}

// =============================================================================
// Dimensions
// =============================================================================

export function buildDimProducts(
  products: readonly StgProduct[],
  brands: readonly StgBrand[],
  categories: readonly StgCategory[]
): DimProduct[] {
  const brandsById = indexBy(brands, brand => brand.brand_id);
  const categoriesById = indexBy(categories, category => category.category_id);

  // LEFT JOIN: a product without a brand or category keeps a null name
  return products.flatMap(product => {
    const brandMatches: (StgBrand | null)[] =
      (product.brand_id !== null && brandsById.get(product.brand_id)) || [null];
    const categoryMatches: (StgCategory | null)[] =
      (product.category_id !== null && categoriesById.get(product.category_id)) || [null];

    return brandMatches.flatMap(brand =>
      categoryMatches.map(category => ({
        product_id: product.product_id,
        product_name: product.product_name,
        brand_name: brand?.brand_name ?? null,
        category_name: category?.category_name ?? null,
        list_price: product.list_price,
      }))
    );
  });
}

export function buildDimCustomers(customers: readonly StgCustomer[]): DimCustomer[] {
  return customers.map(customer => ({
    customer_id: customer.customer_id,
    customer_name: customer.customer_name,
    city: customer.city,
    state: customer.state,
  }));
}

export function buildDimStores(stores: readonly StgStore[]): DimStore[] {
  return stores.map(store => ({
    store_id: store.store_id,
    store_name: store.store_name,
    city: store.city,
    state: store.state,
  }));
}

export function buildDimStaffs(staffs: readonly StgStaff[]): DimStaff[] {
  return staffs.map(staff => ({
    staff_id: staff.staff_id,
    staff_name: staff.staff_name,
    store_id: staff.store_id,
    manager_id: staff.manager_id,
  }));
}

/**
 * Week number with weeks starting on Sunday; days before the year's first Sunday are week 0
 */
export function weekOfYear(isoDate: string): number {
  const date = new Date(`${isoDate}T00:00:00Z`);
  const januaryFirst = Date.UTC(date.getUTCFullYear(), 0, 1);
  const dayOfYear = Math.round((date.getTime() - januaryFirst) / DAY_MS);
  const firstSunday = (7 - new Date(januaryFirst).getUTCDay()) % 7;

  if (dayOfYear < firstSunday) {
    return 0;
  }
  return Math.floor((dayOfYear - firstSunday) / 7) + 1;
}

/**
 * One row per distinct order date, ascending, with date_id dense-ranked from 1
 */
export function buildDateDimension(orders: readonly StgOrder[]): DimDate[] {
  const distinct = new Set<string>();
  for (const order of orders) {
    if (order.order_date !== null) {
      distinct.add(order.order_date);
    }
  }

  return [...distinct].sort().map((fullDate, index) => {
    const date = new Date(`${fullDate}T00:00:00Z`);
    const month = date.getUTCMonth() + 1;
    return {
      date_id: index + 1,
      full_date: fullDate,
      day: date.getUTCDate(),
      month,
      month_name: MONTH_NAMES[month - 1],
      quarter: Math.ceil(month / 3),
      year: date.getUTCFullYear(),
      week_of_year: weekOfYear(fullDate),
    };
  });
}

// =============================================================================
// Facts
// =============================================================================

/**
 * Order items joined to their order and to the date dimension on order date
 */
export function buildFactSales(
  items: readonly StgOrderItem[],
  orders: readonly StgOrder[],
  dates: readonly DimDate[]
): FactSale[] {
  const ordersById = indexBy(orders, order => order.order_id);
  const datesByDay = indexBy(dates, date => date.full_date);
  const facts: FactSale[] = [];

  for (const item of items) {
    const matchingOrders = item.order_id === null ? undefined : ordersById.get(item.order_id);
    for (const order of matchingOrders ?? []) {
      const matchingDates = order.order_date === null ? undefined : datesByDay.get(order.order_date);
      for (const date of matchingDates ?? []) {
        facts.push({
          sales_id: facts.length + 1,
          order_id: item.order_id,
          item_id: item.item_id,
          customer_id: order.customer_id,
          product_id: item.product_id,
          store_id: order.store_id,
          staff_id: order.staff_id,
          date_id: date.date_id,
          quantity: item.quantity,
          list_price: item.list_price,
          sales: item.sales,
          discount: item.discount,
          total_amount: totalAmount(item.quantity, item.list_price, item.discount),
        });
      }
    }
  }
  return facts;
}

export function buildFactInventory(stocks: readonly StgStock[], runDate: string): FactInventory[] {
  return stocks.map((stock, index) => ({
    inventory_id: index + 1,
    store_id: stock.store_id,
    product_id: stock.product_id,
    stock_quantity: stock.quantity,
    last_updated: runDate,
  }));
}

// =============================================================================
// Rules, in load order
// =============================================================================

export const WAREHOUSE_RULES: readonly WarehouseRule[] = [
  {
    target: dimProducts,
    async load(store) {
      const products = await store.readRows(stgProducts);
      const brands = await store.readRows(stgBrands);
      const categories = await store.readRows(stgCategories);
      return reloadTable(store, dimProducts, buildDimProducts(products, brands, categories));
    },
  },
  {
    target: dimCustomers,
    async load(store) {
      return reloadTable(store, dimCustomers, buildDimCustomers(await store.readRows(stgCustomers)));
    },
  },
  {
    target: dimStores,
    async load(store) {
      return reloadTable(store, dimStores, buildDimStores(await store.readRows(stgStores)));
    },
  },
  {
    target: dimStaffs,
    async load(store) {
      return reloadTable(store, dimStaffs, buildDimStaffs(await store.readRows(stgStaffs)));
    },
  },
  {
    target: dimDates,
    async load(store) {
      return reloadTable(store, dimDates, buildDateDimension(await store.readRows(stgOrders)));
    },
  },
  {
    target: factSales,
    async load(store) {
      const items = await store.readRows(stgOrderItems);
      const orders = await store.readRows(stgOrders);
      // joined against the date dimension as loaded, not as re-derived
      const dates = await store.readRows(dimDates);
      return reloadTable(store, factSales, buildFactSales(items, orders, dates));
    },
  },
  {
    target: factInventory,
    async load(store, context) {
      return reloadTable(store, factInventory, buildFactInventory(await store.readRows(stgStocks), context.runDate));
    },
  },
];
