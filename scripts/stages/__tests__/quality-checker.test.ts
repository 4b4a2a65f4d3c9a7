import { MemoryTableStore } from '../../__tests__/support/memory-table-store';
import { ProgressReporter, silentReporter } from '../../lib/progress-reporter';
import { factSales, qualityCheckResults, rawBrands, stgBrands } from '../../model/tables';
import { runStagingQualityChecks, runWarehouseQualityChecks } from '../quality-checker';

const now = () => new Date('2024-03-05T09:30:00Z');

describe('runStagingQualityChecks', () => {
  test('should store one result row per check under the batch tag', async () => {
    const store = new MemoryTableStore()
      .seed(rawBrands, [{ brand_id: 1, brand_name: 'Electra' }])
      .seed(stgBrands, [{ brand_id: 1, brand_name: null }]);

    const run = await runStagingQualityChecks({ store, reporter: silentReporter(), now });

    expect(run.batchTag).toBe('StgQualityCheck_20240305_0930');
    expect(run.results).toHaveLength(32);
    expect(store.rows(qualityCheckResults)).toHaveLength(32);
    expect(store.rows(qualityCheckResults)[0]).toEqual({
      layer: 'staging',
      check_category: 'Null Check',
      check_name: 'Check for NULL in required fields (brand_id, brand_name)',
      table_name: 'stg_brands',
      test_result: 'FAIL',
      total_rows: 1,
      issue_count: 1,
      issue_percentage: 100,
      message: 'Found 1 rows with NULL in required fields',
      batch_tag: 'StgQualityCheck_20240305_0930',
      checked_at: '2024-03-05T09:30:00.000Z',
    });
    expect(run.tableSummary[0]).toMatchObject({ tableName: 'stg_brands', failed: 1, status: 'NEEDS ATTENTION' });
  });

  test('should use the configured count variance threshold', async () => {
    const store = new MemoryTableStore().seed(rawBrands, [
      { brand_id: 1, brand_name: 'a' },
      { brand_id: 2, brand_name: 'b' },
    ]);
    store.seed(stgBrands, [{ brand_id: 1, brand_name: 'a' }]);

    const run = await runStagingQualityChecks({
      store,
      reporter: silentReporter(),
      now,
      quality: { countVarianceThreshold: 0.5 },
    });

    expect(run.results[2]).toMatchObject({ checkName: 'Raw vs staging row count', result: 'PASS', issueCount: 1 });
  });
});

describe('runWarehouseQualityChecks', () => {
  test('should record every check as FAIL when the tables cannot be read', async () => {
    const store = new MemoryTableStore().failOn(factSales.name, 'read', new Error('Invalid object name'));
    const lines: string[] = [];

    const run = await runWarehouseQualityChecks({ store, reporter: new ProgressReporter(line => lines.push(line)), now });

    expect(run.batchTag).toBe('DWQualityCheck_20240305_0930');
    expect(run.results).toHaveLength(30);
    expect(run.results.every(result => result.result === 'FAIL')).toBe(true);
    expect(run.results[0].message).toBe('Check could not run: Invalid object name');
    expect(store.rows(qualityCheckResults)).toHaveLength(30);
    expect(lines).toContain('  ⚠️  Could not read warehouse tables: Invalid object name');
  });

  test('should pass on an empty warehouse except the cardinality check', async () => {
    const run = await runWarehouseQualityChecks({ store: new MemoryTableStore(), reporter: silentReporter(), now });

    expect(run.results.filter(result => result.result !== 'PASS').map(result => result.checkName)).toEqual([
      'Cardinality Check',
    ]);
    expect(run.categorySummary.map(summary => summary.category)).toEqual([
      'Surrogate Keys',
      'Referential Integrity',
      'Relationships',
      'Data Quality',
    ]);
  });
});
