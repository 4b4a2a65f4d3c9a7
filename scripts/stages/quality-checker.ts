/**
 * Quality checker: evaluates a check battery over one snapshot of the layer,
 * appends one quality_check_results row per check and summarizes the run.
 */

import { BatchPrefix, calendarDate, createBatchTag } from '../lib/batch-tag';
import { ETLConfig } from '../lib/config-loader';
import { errorMessage } from '../lib/error-handler';
import { ProgressReporter } from '../lib/progress-reporter';
import { TableStore } from '../lib/table-store';
import { QualityCheckRow, qualityCheckResults } from '../model/tables';
import {
  QualityCheck,
  QualityCheckResult,
  QualityLayer,
  failedCheck,
  runCheck,
  toQualityRow,
} from '../quality/check-types';
import { readStagingSnapshot, stagingChecks } from '../quality/staging-checks';
import {
  CategorySummary,
  TableSummary,
  summarizeByCategory,
  summarizeByTable,
} from '../quality/summary';
import { readWarehouseSnapshot, warehouseChecks } from '../quality/warehouse-checks';
import { StageOptions } from './stage-runner';

export interface QualityOptions extends StageOptions {
  quality?: Partial<ETLConfig['quality']>;
}

export interface QualityRunResult {
  batchTag: string;
  results: QualityCheckResult[];
  rows: QualityCheckRow[];
  tableSummary: TableSummary[];
  categorySummary: CategorySummary[];
}

interface Battery<Snapshot> {
  title: string;
  layer: QualityLayer;
  prefix: BatchPrefix;
  checks: readonly QualityCheck<Snapshot>[];
  read(store: TableStore): Promise<Snapshot>;
}

async function runBattery<Snapshot>(
  battery: Battery<Snapshot>,
  options: StageOptions,
  now: () => Date
): Promise<QualityRunResult> {
  const reporter = options.reporter ?? new ProgressReporter();
  const startedAt = now();
  const batchTag = createBatchTag(battery.prefix, startedAt);

  reporter.logRunStart(battery.title, batchTag, battery.checks.length);

  let results: QualityCheckResult[];
  try {
    const snapshot = await battery.read(options.store);
    results = battery.checks.map(check => runCheck(battery.layer, check, snapshot));
  } catch (error) {
    reporter.logWarning(`Could not read ${battery.layer} tables: ${errorMessage(error)}`);
    results = battery.checks.map(check => failedCheck(battery.layer, check, error));
  }

  results.forEach(result => reporter.logQualityResult(result));

  const checkedAt = now().toISOString();
  const rows = results.map(result => toQualityRow(result, batchTag, checkedAt));
  if (rows.length > 0) {
    await options.store.insertRows(qualityCheckResults, rows);
  }

  const tableSummary = summarizeByTable(results);
  const categorySummary = summarizeByCategory(results);
  reporter.logTableSummary(tableSummary);
  reporter.logCategorySummary(categorySummary);

  return { batchTag, results, rows, tableSummary, categorySummary };
}

export async function runStagingQualityChecks(options: QualityOptions): Promise<QualityRunResult> {
  const now = options.now ?? (() => new Date());
  const checks = stagingChecks({
    today: calendarDate(now()),
    countVarianceThreshold: options.quality?.countVarianceThreshold ?? 0.05,
  });

  return runBattery(
    {
      title: 'Staging Quality Checks',
      layer: 'staging',
      prefix: 'StgQualityCheck',
      checks,
      read: readStagingSnapshot,
    },
    options,
    now
  );
}

export async function runWarehouseQualityChecks(options: QualityOptions): Promise<QualityRunResult> {
  const now = options.now ?? (() => new Date());
  const checks = warehouseChecks({
    totalAmountTolerance: options.quality?.totalAmountTolerance ?? 0.01,
  });

  return runBattery(
    {
      title: 'Warehouse Quality Checks',
      layer: 'warehouse',
      prefix: 'DWQualityCheck',
      checks,
      read: readWarehouseSnapshot,
    },
    options,
    now
  );
}
