/**
 * Warehouse quality battery: surrogate keys, referential integrity,
 * model relationships and business rules over the star schema.
 */

import {
  DimCustomer,
  DimDate,
  DimProduct,
  DimStaff,
  DimStore,
  FactInventory,
  FactSale,
  dimCustomers,
  dimDates,
  dimProducts,
  dimStaffs,
  dimStores,
  factInventory,
  factSales,
} from '../model/tables';
import { TableStore } from '../lib/table-store';
import { round2 } from '../transforms/cleaning';
import {
  QualityCheck,
  countWhere,
  distinctValues,
  grainCheck,
  keyUniquenessCheck,
  nullColumnsCheck,
  orphanCheck,
  rowRuleCheck,
  unreferencedCheck,
} from './check-types';

export interface WarehouseSnapshot {
  dimCustomers: DimCustomer[];
  dimProducts: DimProduct[];
  dimStores: DimStore[];
  dimStaffs: DimStaff[];
  dimDates: DimDate[];
  factSales: FactSale[];
  factInventory: FactInventory[];
}

export interface WarehouseCheckOptions {
  totalAmountTolerance: number;
}

export async function readWarehouseSnapshot(store: TableStore): Promise<WarehouseSnapshot> {
  return {
    dimCustomers: await store.readRows(dimCustomers),
    dimProducts: await store.readRows(dimProducts),
    dimStores: await store.readRows(dimStores),
    dimStaffs: await store.readRows(dimStaffs),
    dimDates: await store.readRows(dimDates),
    factSales: await store.readRows(factSales),
    factInventory: await store.readRows(factInventory),
  };
}

type Check = QualityCheck<WarehouseSnapshot>;

// =============================================================================
// 1. Surrogate keys
// =============================================================================

function primaryKeyChecks(): Check[] {
  const dimensions = [
    keyUniquenessCheck({
      category: 'Surrogate Keys',
      name: 'Primary Key Uniqueness',
      table: 'dim_customers',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimCustomers,
      key: ['customer_id'],
      messages: uniqueMessages('customer_id'),
    }),
    keyUniquenessCheck({
      category: 'Surrogate Keys',
      name: 'Primary Key Uniqueness',
      table: 'dim_products',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimProducts,
      key: ['product_id'],
      messages: uniqueMessages('product_id'),
    }),
    keyUniquenessCheck({
      category: 'Surrogate Keys',
      name: 'Primary Key Uniqueness',
      table: 'dim_stores',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimStores,
      key: ['store_id'],
      messages: uniqueMessages('store_id'),
    }),
    keyUniquenessCheck({
      category: 'Surrogate Keys',
      name: 'Primary Key Uniqueness',
      table: 'dim_staffs',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimStaffs,
      key: ['staff_id'],
      messages: uniqueMessages('staff_id'),
    }),
    keyUniquenessCheck({
      category: 'Surrogate Keys',
      name: 'Primary Key Uniqueness',
      table: 'dim_dates',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimDates,
      key: ['date_id'],
      messages: uniqueMessages('date_id'),
    }),
  ];

  const nullKeys = [
    nullColumnsCheck({
      category: 'Surrogate Keys',
      name: 'NULL Primary Key Check',
      table: 'dim_customers',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimCustomers,
      columns: ['customer_id'],
      messages: nullKeyMessages('customer_id'),
    }),
    nullColumnsCheck({
      category: 'Surrogate Keys',
      name: 'NULL Primary Key Check',
      table: 'dim_products',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimProducts,
      columns: ['product_id'],
      messages: nullKeyMessages('product_id'),
    }),
    nullColumnsCheck({
      category: 'Surrogate Keys',
      name: 'NULL Primary Key Check',
      table: 'dim_stores',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimStores,
      columns: ['store_id'],
      messages: nullKeyMessages('store_id'),
    }),
    nullColumnsCheck({
      category: 'Surrogate Keys',
      name: 'NULL Primary Key Check',
      table: 'dim_staffs',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimStaffs,
      columns: ['staff_id'],
      messages: nullKeyMessages('staff_id'),
    }),
    nullColumnsCheck({
      category: 'Surrogate Keys',
      name: 'NULL Primary Key Check',
      table: 'dim_dates',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimDates,
      columns: ['date_id'],
      messages: nullKeyMessages('date_id'),
    }),
  ];

  return [...dimensions, ...nullKeys];
}

function uniqueMessages(column: string) {
  return {
    pass: `All ${column} values are unique`,
    fail: (issues: number) => `Found ${issues} duplicate ${column} values`,
  };
}

function nullKeyMessages(column: string) {
  return {
    pass: `No NULL ${column} values found`,
    fail: (issues: number) => `Found ${issues} NULL ${column} values`,
  };
}

// =============================================================================
// 2. Referential integrity
// =============================================================================

function orphanMessages(column: string, factLabel: string, dimension: string) {
  return {
    pass: `All ${column} values have matching dimension records`,
    fail: (issues: number) => `Found ${issues} ${factLabel} records with ${column} not in ${dimension}`,
  };
}

function referentialChecks(): Check[] {
  const sales = (s: WarehouseSnapshot) => s.factSales;
  const inventory = (s: WarehouseSnapshot) => s.factInventory;

  return [
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Customer Records',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      foreignKey: row => row.customer_id,
      parents: s => s.dimCustomers,
      parentKey: row => row.customer_id,
      messages: orphanMessages('customer_id', 'fact', 'dim_customers'),
    }),
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Product Records',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      foreignKey: row => row.product_id,
      parents: s => s.dimProducts,
      parentKey: row => row.product_id,
      messages: orphanMessages('product_id', 'fact', 'dim_products'),
    }),
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Store Records',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      foreignKey: row => row.store_id,
      parents: s => s.dimStores,
      parentKey: row => row.store_id,
      messages: orphanMessages('store_id', 'fact', 'dim_stores'),
    }),
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Staff Records',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      foreignKey: row => row.staff_id,
      parents: s => s.dimStaffs,
      parentKey: row => row.staff_id,
      messages: orphanMessages('staff_id', 'fact', 'dim_staffs'),
    }),
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Date Records',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      foreignKey: row => row.date_id,
      parents: s => s.dimDates,
      parentKey: row => row.date_id,
      messages: orphanMessages('date_id', 'fact', 'dim_dates'),
    }),
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Product Records',
      table: 'fact_inventory',
      severity: 'FAIL',
      rows: inventory,
      foreignKey: row => row.product_id,
      parents: s => s.dimProducts,
      parentKey: row => row.product_id,
      messages: orphanMessages('product_id', 'inventory', 'dim_products'),
    }),
    orphanCheck({
      category: 'Referential Integrity',
      name: 'Orphaned Store Records',
      table: 'fact_inventory',
      severity: 'FAIL',
      rows: inventory,
      foreignKey: row => row.store_id,
      parents: s => s.dimStores,
      parentKey: row => row.store_id,
      messages: orphanMessages('store_id', 'inventory', 'dim_stores'),
    }),
    {
      category: 'Referential Integrity',
      name: 'NULL Foreign Keys',
      table: 'fact_sales',
      severity: 'WARNING',
      evaluate(s) {
        const rows = s.factSales;
        const nulls = (value: (row: FactSale) => number | null) => countWhere(rows, row => value(row) === null);
        const issues = countWhere(
          rows,
          row =>
            row.customer_id === null ||
            row.product_id === null ||
            row.store_id === null ||
            row.staff_id === null ||
            row.date_id === null
        );
        return {
          totalRows: rows.length,
          issueCount: issues,
          message:
            `NULL FKs - Customer: ${nulls(row => row.customer_id)}, Product: ${nulls(row => row.product_id)}, ` +
            `Store: ${nulls(row => row.store_id)}, Staff: ${nulls(row => row.staff_id)}, Date: ${nulls(row => row.date_id)}`,
        };
      },
    },
  ];
}

// =============================================================================
// 3. Relationships
// =============================================================================

function relationshipChecks(): Check[] {
  return [
    {
      category: 'Relationships',
      name: 'Cardinality Check',
      table: 'fact_sales -> dim_customers',
      severity: 'WARNING',
      evaluate(s) {
        const withCustomer = s.factSales.filter(row => row.customer_id !== null);
        const customers = distinctValues(withCustomer, row => row.customer_id).size;
        const average = customers === 0 ? 'n/a' : String(round2(withCustomer.length / customers));
        return {
          totalRows: withCustomer.length,
          issueCount: null,
          // many facts per customer is the expected shape; one each is suspicious
          result: withCustomer.length > customers ? 'PASS' : 'WARNING',
          message: `Many-to-One relationship confirmed. Avg facts per customer: ${average}`,
        };
      },
    },
    unreferencedCheck({
      category: 'Relationships',
      name: 'Unused Dimension Records',
      table: 'dim_customers',
      severity: 'WARNING',
      parents: (s: WarehouseSnapshot) => s.dimCustomers,
      parentKey: row => row.customer_id,
      rows: s => s.factSales,
      foreignKey: row => row.customer_id,
      message: issues => `${issues} customers have no sales transactions`,
    }),
    unreferencedCheck({
      category: 'Relationships',
      name: 'Unused Products in Sales',
      table: 'dim_products',
      severity: 'WARNING',
      parents: (s: WarehouseSnapshot) => s.dimProducts,
      parentKey: row => row.product_id,
      rows: s => s.factSales,
      foreignKey: row => row.product_id,
      message: issues => `${issues} products have no sales transactions`,
    }),
    {
      category: 'Relationships',
      name: 'Date Dimension Continuity',
      table: 'dim_dates',
      severity: 'FAIL',
      evaluate(s) {
        const issues = s.dimDates.length - distinctValues(s.dimDates, row => row.full_date).size;
        return {
          totalRows: s.dimDates.length,
          issueCount: issues,
          message: issues === 0 ? 'All dates are unique, no duplicates found' : `Found ${issues} duplicate dates`,
        };
      },
    },
    orphanCheck({
      category: 'Relationships',
      name: 'Staff-Store Relationship',
      table: 'dim_staffs',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.dimStaffs,
      foreignKey: row => row.store_id,
      parents: s => s.dimStores,
      parentKey: row => row.store_id,
      messages: {
        pass: 'All staff members have valid store assignments',
        fail: issues => `Found ${issues} staff members with invalid store_id`,
      },
    }),
  ];
}

// =============================================================================
// 4. Data quality and business rules
// =============================================================================

function businessRuleChecks(options: WarehouseCheckOptions): Check[] {
  const sales = (s: WarehouseSnapshot) => s.factSales;
  const tolerance = options.totalAmountTolerance;

  return [
    rowRuleCheck({
      category: 'Data Quality',
      name: 'Negative Quantities',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      isIssue: row => row.quantity !== null && row.quantity < 0,
      messages: {
        pass: 'No negative quantities found',
        fail: issues => `Found ${issues} records with negative quantities`,
      },
    }),
    rowRuleCheck({
      category: 'Data Quality',
      name: 'Negative Prices',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      isIssue: row => row.list_price !== null && row.list_price < 0,
      messages: {
        pass: 'No negative prices found',
        fail: issues => `Found ${issues} records with negative list_price`,
      },
    }),
    rowRuleCheck({
      category: 'Data Quality',
      name: 'Invalid Discount Values',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      isIssue: row => row.discount !== null && (row.discount < 0 || row.discount > 1),
      messages: {
        pass: 'All discounts are in valid range (0-1)',
        fail: issues => `Found ${issues} records with discount outside 0-1 range`,
      },
    }),
    rowRuleCheck({
      category: 'Data Quality',
      name: 'Total Amount Calculation',
      table: 'fact_sales',
      severity: 'WARNING',
      rows: sales,
      isIssue: row => {
        if (row.total_amount === null || row.quantity === null || row.list_price === null || row.discount === null) {
          return false;
        }
        const expected = row.quantity * row.list_price - row.discount * row.quantity * row.list_price;
        return Math.abs(row.total_amount - expected) > tolerance;
      },
      messages: {
        pass: 'All total_amount calculations are accurate',
        fail: issues => `Found ${issues} records with total_amount calculation variance > ${tolerance}`,
      },
    }),
    rowRuleCheck({
      category: 'Data Quality',
      name: 'Negative Stock Quantities',
      table: 'fact_inventory',
      severity: 'WARNING',
      rows: (s: WarehouseSnapshot) => s.factInventory,
      isIssue: row => row.stock_quantity !== null && row.stock_quantity < 0,
      messages: {
        pass: 'No negative stock quantities found',
        fail: issues => `Found ${issues} records with negative stock_quantity`,
      },
    }),
    grainCheck({
      category: 'Data Quality',
      name: 'Fact Grain Validation',
      table: 'fact_sales',
      severity: 'FAIL',
      rows: sales,
      grain: ['order_id', 'product_id'],
      messages: {
        pass: 'No duplicate grain combinations found (order_id + product_id is unique)',
        fail: issues => `Found ${issues} duplicate combinations at fact grain level`,
      },
    }),
    grainCheck({
      category: 'Data Quality',
      name: 'Fact Grain Validation',
      table: 'fact_inventory',
      severity: 'FAIL',
      rows: (s: WarehouseSnapshot) => s.factInventory,
      grain: ['store_id', 'product_id'],
      messages: {
        pass: 'No duplicate grain combinations found (store_id + product_id is unique)',
        fail: issues => `Found ${issues} duplicate combinations at fact grain level`,
      },
    }),
  ];
}

/**
 * The full warehouse battery, in reporting order
 */
export function warehouseChecks(options: WarehouseCheckOptions): Check[] {
  return [
    ...primaryKeyChecks(),
    ...referentialChecks(),
    ...relationshipChecks(),
    ...businessRuleChecks(options),
  ];
}
