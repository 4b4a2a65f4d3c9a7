import { calendarDate } from '../lib/batch-tag';
import { WAREHOUSE_RULES, WarehouseRule } from '../transforms/warehouse-rules';
import { StageOptions, StageResult, TableStep, runTableSteps } from './stage-runner';

/**
 * Rebuild the star schema from staging: dimensions first, then facts
 */
export async function runWarehouseLoad(
  options: StageOptions,
  rules: readonly WarehouseRule[] = WAREHOUSE_RULES
): Promise<StageResult> {
  const now = options.now ?? (() => new Date());
  const context = { runDate: calendarDate(now()) };

  const steps: TableStep[] = rules.map(rule => ({
    tableName: rule.target.name,
    execute: () => rule.load(options.store, context),
  }));

  return runTableSteps(
    'Warehouse Load',
    'DWBatch',
    steps,
    {
      success: rows => `Loaded into DW (${rows} rows)`,
      failure: message => `Load failed: ${message}`,
    },
    { ...options, now }
  );
}
