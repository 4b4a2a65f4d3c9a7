import * as sql from 'mssql';
import { BatchPrefix, latestBatch } from './lib/batch-tag';
import { getSqlConfig, loadConfig } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { MssqlTableStore } from './lib/mssql-table-store';
import { loadLog, qualityCheckResults } from './model/tables';

const LOAD_STAGES: BatchPrefix[] = ['RawBatch', 'StgBatch', 'DWBatch'];
const QUALITY_STAGES: BatchPrefix[] = ['StgQualityCheck', 'DWQualityCheck'];

async function main() {
  const config = loadConfig();
  const pool = await sql.connect(getSqlConfig(config));
  const store = new MssqlTableStore(pool, config.database.schemas);

  try {
    const entries = await store.readRows(loadLog);
    for (const prefix of LOAD_STAGES) {
      const batch = latestBatch(entries, prefix);
      if (batch.length === 0) {
        console.log(`\n${prefix}: no runs logged`);
        continue;
      }
      console.log(`\n${batch[0].batch_tag}:`);
      batch.forEach(entry => {
        const status = entry.load_status === 'SUCCESS' ? '✅' : '❌';
        console.log(`  ${status} ${entry.table_name}: ${entry.message}`);
      });
    }

    const results = await store.readRows(qualityCheckResults);
    for (const prefix of QUALITY_STAGES) {
      const batch = latestBatch(results, prefix);
      if (batch.length === 0) {
        console.log(`\n${prefix}: no checks recorded`);
        continue;
      }
      const failed = batch.filter(row => row.test_result === 'FAIL');
      const warnings = batch.filter(row => row.test_result === 'WARNING');
      console.log(`\n${batch[0].batch_tag}: ${batch.length} checks, ${failed.length} failed, ${warnings.length} warnings`);
      [...failed, ...warnings].forEach(row => {
        console.log(`  ${row.test_result === 'FAIL' ? '❌' : '⚠️ '} ${row.check_name} (${row.table_name}): ${row.message}`);
      });
    }
    console.log('');
  } finally {
    await pool.close();
  }
}

main().catch(error => {
  console.error(formatError(error));
  process.exitCode = 1;
});
