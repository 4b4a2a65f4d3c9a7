import { DuplicateCheckRecord, duplicateChecker } from '../model/tables';
import { STAGING_RULES, StagingRule } from '../transforms/staging-rules';
import { StageOptions, StageResult, TableStep, runTableSteps } from './stage-runner';

export interface StagingResult extends StageResult {
  duplicates: DuplicateCheckRecord[];
}

function duplicateRecord(tableName: string, count: number, batchTag: string, at: Date): DuplicateCheckRecord {
  return {
    table_name: tableName,
    duplicate_status: count > 0 ? 'DUPLICATE FOUND' : 'NO DUPLICATE',
    duplicate_count: count,
    batch_tag: batchTag,
    checked_at: at.toISOString(),
  };
}

/**
 * Dedupe and clean every raw table into staging.
 *
 * Duplicate counts are collected per table and appended to duplicate_checker
 * once the stage finishes, tagged with the stage's batch.
 */
export async function runStagingTransform(
  options: StageOptions,
  rules: readonly StagingRule[] = STAGING_RULES
): Promise<StagingResult> {
  const now = options.now ?? (() => new Date());
  const counted: { tableName: string; count: number; at: Date }[] = [];

  const steps: TableStep[] = rules.map(rule => ({
    tableName: rule.target.name,
    async execute() {
      const prepared = await rule.prepare(options.store);
      counted.push({ tableName: rule.target.name, count: prepared.duplicateCount, at: now() });
      return prepared.load(options.store);
    },
  }));

  const result = await runTableSteps(
    'Staging Transform',
    'StgBatch',
    steps,
    {
      success: rows => `Transformed successfully (${rows} rows)`,
      failure: message => `Transformation failed: ${message}`,
    },
    { ...options, now }
  );

  const duplicates = counted.map(entry => duplicateRecord(entry.tableName, entry.count, result.batchTag, entry.at));
  if (duplicates.length > 0) {
    await options.store.insertRows(duplicateChecker, duplicates);
  }

  return { ...result, duplicates };
}
