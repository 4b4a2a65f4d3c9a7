import { QualityCheckResult } from './check-types';

export type TableHealth = 'HEALTHY' | 'NEEDS ATTENTION' | 'CRITICAL';

interface Tally {
  totalChecks: number;
  passed: number;
  failed: number;
  warnings: number;
}

export interface TableSummary extends Tally {
  tableName: string;
  status: TableHealth;
}

export interface CategorySummary extends Tally {
  category: string;
  /** Passed checks as a percentage of all checks, one decimal */
  passRate: number;
}

function tally(results: readonly QualityCheckResult[], groupOf: (result: QualityCheckResult) => string): Map<string, Tally> {
  const groups = new Map<string, Tally>();
  for (const result of results) {
    const group = groupOf(result);
    const counts = groups.get(group) ?? { totalChecks: 0, passed: 0, failed: 0, warnings: 0 };
    counts.totalChecks++;
    if (result.result === 'PASS') counts.passed++;
    if (result.result === 'FAIL') counts.failed++;
    if (result.result === 'WARNING') counts.warnings++;
    groups.set(group, counts);
  }
  return groups;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function tableHealth(failed: number): TableHealth {
  if (failed === 0) return 'HEALTHY';
  if (failed <= 2) return 'NEEDS ATTENTION';
  return 'CRITICAL';
}

/**
 * Per-table tallies, most failures first, then by table name
 */
export function summarizeByTable(results: readonly QualityCheckResult[]): TableSummary[] {
  return [...tally(results, result => result.tableName)]
    .map(([tableName, counts]) => ({ tableName, ...counts, status: tableHealth(counts.failed) }))
    .sort((a, b) => b.failed - a.failed || compareText(a.tableName, b.tableName));
}

/**
 * Per-category tallies in the order categories first appear
 */
export function summarizeByCategory(results: readonly QualityCheckResult[]): CategorySummary[] {
  return [...tally(results, result => result.category)].map(([category, counts]) => ({
    category,
    ...counts,
    passRate: Math.round((1000 * counts.passed) / counts.totalChecks) / 10,
  }));
}
