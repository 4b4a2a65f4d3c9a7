/**
 * End-to-end run over small CSV files: raw load, staging, staging checks,
 * warehouse load and warehouse checks against the in-memory store.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MemoryTableStore } from '../../__tests__/support/memory-table-store';
import { silentReporter } from '../../lib/progress-reporter';
import {
  dimDates,
  duplicateChecker,
  factSales,
  loadLog,
  qualityCheckResults,
  stgCustomers,
  stgOrders,
} from '../../model/tables';
import { runPipeline } from '../pipeline';

const SOURCE_FILES: Record<string, string[]> = {
  'brands.csv': ['brand_id,brand_name', '1,Electra', '2,Trek'],
  'categories.csv': ['category_id,category_name', '1,Cruisers', '2,Mountain Bikes'],
  'products.csv': [
    'product_id,product_name,brand_id,category_id,model_year,list_price',
    '10,Electra Townie,1,1,2016,599.99',
    '11,Trek 820,2,2,2016,379.99',
  ],
  'customers.csv': [
    'customer_id,first_name,last_name,phone,email,street,city,state,zipcode',
    '1,Debra,Burks,NULL,debra@example.com,9273 Thorne Ave.,Orchard Park,NY,14127',
    '1,Debra,Burks,NULL,debra@example.com,9273 Thorne Ave.,Orchard Park,NY,14127',
    ',Nobody,Known,,,,,,',
    '2,Kasha,Todd,,kasha@example.com,910 Vine St.,Campbell,CA,95008',
  ],
  'orders.csv': [
    'order_id,customer_id,order_status,order_date,required_date,shipped_date,store_id,staff_id',
    '1,1,4,2016-01-01,2016-01-03,2016-01-03,1,2',
    '2,2,4,2016-01-01,2016-01-04,2016-01-03,1,2',
    '3,3,4,2016-01-02,2016-01-05,NULL,1,2',
  ],
  'order_items.csv': [
    'order_id,item_id,product_id,quantity,list_price,discount',
    '1,1,10,1,599.99,0.2',
    '1,2,11,2,379.99,0.07',
    '2,1,10,1,599.99,0.05',
    '3,1,11,1,379.99,0',
  ],
  'stores.csv': [
    'store_id,store_name,phone,email,street,city,state,zipcode',
    '1,Santa Cruz Bikes,(831) 476-4321,santacruz@example.com,3700 Portola Drive,Santa Cruz,CA,95060',
  ],
  'staffs.csv': [
    'staff_id,first_name,last_name,email,phone,active,store_id,manager_id',
    '1,Fabiola,Jackson,fabiola@example.com,(831) 555-5554,1,1,NULL',
    '2,Mireya,Copeland,mireya@example.com,(831) 555-5555,1,1,1',
  ],
  'stocks.csv': ['store_id,product_id,quantity', '1,10,27', '1,11,5'],
};

describe('runPipeline', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'etl-pipeline-'));
    for (const [file, lines] of Object.entries(SOURCE_FILES)) {
      fs.writeFileSync(path.join(dataDir, file), `${lines.join('\n')}\n`);
    }
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  async function run(store: MemoryTableStore) {
    return runPipeline({
      store,
      reporter: silentReporter(),
      now: () => new Date('2024-03-05T09:30:00Z'),
      config: {
        inputFiles: {
          directory: dataDir,
          brands: 'brands.csv',
          categories: 'categories.csv',
          customers: 'customers.csv',
          products: 'products.csv',
          orders: 'orders.csv',
          orderItems: 'order_items.csv',
          stores: 'stores.csv',
          staffs: 'staffs.csv',
          stocks: 'stocks.csv',
        },
        quality: { countVarianceThreshold: 0.05, totalAmountTolerance: 0.01 },
      },
    });
  }

  test('should run every stage and log every table', async () => {
    const store = new MemoryTableStore();

    const result = await run(store);

    expect(result.hasErrors).toBe(false);
    expect(result.raw.entries).toHaveLength(9);
    expect(result.staging.entries).toHaveLength(9);
    expect(result.warehouse.entries).toHaveLength(7);
    expect(store.rows(loadLog)).toHaveLength(25);
    expect(store.rows(loadLog).every(entry => entry.load_status === 'SUCCESS')).toBe(true);
    expect(store.rows(qualityCheckResults)).toHaveLength(62);
  });

  test('should stage deduplicated customers and record one duplicate', async () => {
    const store = new MemoryTableStore();

    await run(store);

    expect(store.rows(stgCustomers)).toEqual([
      { customer_id: 1, customer_name: 'Debra Burks', city: 'Orchard Park', state: 'New York' },
      { customer_id: 2, customer_name: 'Kasha Todd', city: 'Campbell', state: 'California' },
    ]);
    expect(store.rows(duplicateChecker).find(row => row.table_name === 'stg_customers')).toMatchObject({
      duplicate_status: 'DUPLICATE FOUND',
      duplicate_count: 1,
      batch_tag: 'StgBatch_20240305_0930',
    });
  });

  test('should fill a missing shipped date from the required date', async () => {
    const store = new MemoryTableStore();

    await run(store);

    expect(store.rows(stgOrders).find(order => order.order_id === 3)?.shipped_date).toBe('2016-01-05');
  });

  test('should build the star schema', async () => {
    const store = new MemoryTableStore();

    await run(store);

    expect(store.rows(dimDates).map(date => [date.date_id, date.full_date])).toEqual([
      [1, '2016-01-01'],
      [2, '2016-01-02'],
    ]);
    expect(store.rows(factSales).map(fact => [fact.sales_id, fact.order_id, fact.customer_id, fact.date_id, fact.total_amount])).toEqual([
      [1, 1, 1, 1, 479.99],
      [2, 1, 1, 1, 706.78],
      [3, 2, 2, 1, 569.99],
      [4, 3, 3, 2, 379.99],
    ]);
  });

  test('should report the order whose customer never reached staging', async () => {
    const store = new MemoryTableStore();

    const result = await run(store);

    const orphans = result.warehouseQuality.results.find(
      check => check.checkName === 'Orphaned Customer Records' && check.tableName === 'fact_sales'
    );
    expect(orphans).toMatchObject({
      result: 'FAIL',
      totalRows: 4,
      issueCount: 1,
      issuePercentage: 25,
      message: 'Found 1 fact records with customer_id not in dim_customers',
    });
  });

  test('should warn that staging customers drifted from the raw count', async () => {
    const store = new MemoryTableStore();

    const result = await run(store);

    const count = result.stagingQuality.results.find(
      check => check.checkName === 'Raw vs staging row count' && check.tableName === 'stg_customers'
    );
    expect(count).toMatchObject({ result: 'WARNING', totalRows: 3, issueCount: 1, message: 'Raw count: 3, Staging count: 2' });
  });
});
