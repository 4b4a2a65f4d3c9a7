/**
 * Declarative quality checks.
 *
 * A check is a named evaluation over a snapshot of table contents. It reports
 * total rows, an issue count and a message; the runner turns that into a
 * PASS / FAIL / WARNING result. Checks never throw into the stage: an
 * evaluation error becomes a FAIL result carrying the error message.
 */

import { CellValue, TableRow } from '../model/cells';
import { QualityCheckRow } from '../model/tables';
import { errorMessage } from '../lib/error-handler';
import { round2 } from '../transforms/cleaning';
import { KeyColumns, rowKey } from '../transforms/dedupe';

export type TestResult = 'PASS' | 'FAIL' | 'WARNING';
export type QualityLayer = 'staging' | 'warehouse';
export type Severity = Exclude<TestResult, 'PASS'>;

export interface CheckOutcome {
  totalRows: number;
  issueCount: number | null;
  message: string;
  /** Set when the check classifies itself instead of issues > 0 => severity */
  result?: TestResult;
}

export interface QualityCheck<Snapshot> {
  category: string;
  name: string;
  table: string;
  severity: Severity;
  evaluate(snapshot: Snapshot): CheckOutcome;
}

export interface QualityCheckResult {
  layer: QualityLayer;
  category: string;
  checkName: string;
  tableName: string;
  result: TestResult;
  totalRows: number;
  issueCount: number | null;
  issuePercentage: number | null;
  message: string;
}

interface CheckHeader {
  category: string;
  name: string;
  table: string;
  severity: Severity;
}

interface CheckMessages {
  pass: string;
  fail: (issues: number) => string;
}

export function issuePercentage(issueCount: number | null, totalRows: number): number | null {
  if (issueCount === null || totalRows === 0) {
    return null;
  }
  return round2((100 * issueCount) / totalRows);
}

export function runCheck<Snapshot>(
  layer: QualityLayer,
  check: QualityCheck<Snapshot>,
  snapshot: Snapshot
): QualityCheckResult {
  try {
    const outcome = check.evaluate(snapshot);
    const result = outcome.result ?? (outcome.issueCount ? check.severity : 'PASS');
    return {
      layer,
      category: check.category,
      checkName: check.name,
      tableName: check.table,
      result,
      totalRows: outcome.totalRows,
      issueCount: outcome.issueCount,
      issuePercentage: issuePercentage(outcome.issueCount, outcome.totalRows),
      message: outcome.message,
    };
  } catch (error) {
    return failedCheck(layer, check, error);
  }
}

/**
 * Result recorded for a check that could not be evaluated
 */
export function failedCheck<Snapshot>(
  layer: QualityLayer,
  check: QualityCheck<Snapshot>,
  error: unknown
): QualityCheckResult {
  return {
    layer,
    category: check.category,
    checkName: check.name,
    tableName: check.table,
    result: 'FAIL',
    totalRows: 0,
    issueCount: null,
    issuePercentage: null,
    message: `Check could not run: ${errorMessage(error)}`,
  };
}

export function toQualityRow(result: QualityCheckResult, batchTag: string, checkedAt: string): QualityCheckRow {
  return {
    layer: result.layer,
    check_category: result.category,
    check_name: result.checkName,
    table_name: result.tableName,
    test_result: result.result,
    total_rows: result.totalRows,
    issue_count: result.issueCount,
    issue_percentage: result.issuePercentage,
    message: result.message,
    batch_tag: batchTag,
    checked_at: checkedAt,
  };
}

// =============================================================================
// Counting helpers (SQL COUNT / COUNT DISTINCT semantics: nulls never count)
// =============================================================================

export function distinctValues<Row>(rows: readonly Row[], value: (row: Row) => CellValue): Set<string | number> {
  const values = new Set<string | number>();
  for (const row of rows) {
    const cell = value(row);
    if (cell !== null) values.add(cell);
  }
  return values;
}

export function countWhere<Row>(rows: readonly Row[], predicate: (row: Row) => boolean): number {
  return rows.reduce((count, row) => (predicate(row) ? count + 1 : count), 0);
}

// =============================================================================
// Check builders
// =============================================================================

/**
 * Rows minus distinct complete keys
 */
export function keyUniquenessCheck<Snapshot, Row extends TableRow>(
  header: CheckHeader & {
    rows: (snapshot: Snapshot) => readonly Row[];
    key: KeyColumns<Row>;
    messages: CheckMessages;
  }
): QualityCheck<Snapshot> {
  const { rows, key, messages, ...rest } = header;
  return {
    ...rest,
    evaluate(snapshot) {
      const tableRows = rows(snapshot);
      const keys = new Set<string>();
      for (const row of tableRows) {
        const value = rowKey(row, key);
        if (value !== null) keys.add(value);
      }
      const issues = tableRows.length - keys.size;
      return {
        totalRows: tableRows.length,
        issueCount: issues,
        message: issues === 0 ? messages.pass : messages.fail(issues),
      };
    },
  };
}

/**
 * Rows with a null in any of the given columns
 */
export function nullColumnsCheck<Snapshot, Row extends TableRow>(
  header: CheckHeader & {
    rows: (snapshot: Snapshot) => readonly Row[];
    columns: KeyColumns<Row>;
    messages: CheckMessages;
  }
): QualityCheck<Snapshot> {
  const { rows, columns, messages, ...rest } = header;
  return {
    ...rest,
    evaluate(snapshot) {
      const tableRows = rows(snapshot);
      const issues = countWhere(tableRows, row => columns.some(column => row[column] === null));
      return {
        totalRows: tableRows.length,
        issueCount: issues,
        message: issues === 0 ? messages.pass : messages.fail(issues),
      };
    },
  };
}

/**
 * Rows matching an issue predicate, out of all rows of the table
 */
export function rowRuleCheck<Snapshot, Row>(
  header: CheckHeader & {
    rows: (snapshot: Snapshot) => readonly Row[];
    isIssue: (row: Row, snapshot: Snapshot) => boolean;
    messages: CheckMessages;
  }
): QualityCheck<Snapshot> {
  const { rows, isIssue, messages, ...rest } = header;
  return {
    ...rest,
    evaluate(snapshot) {
      const tableRows = rows(snapshot);
      const issues = countWhere(tableRows, row => isIssue(row, snapshot));
      return {
        totalRows: tableRows.length,
        issueCount: issues,
        message: issues === 0 ? messages.pass : messages.fail(issues),
      };
    },
  };
}

/**
 * Non-null foreign keys with no matching parent key
 */
export function orphanCheck<Snapshot, Child, Parent>(
  header: CheckHeader & {
    rows: (snapshot: Snapshot) => readonly Child[];
    foreignKey: (row: Child) => CellValue;
    parents: (snapshot: Snapshot) => readonly Parent[];
    parentKey: (row: Parent) => CellValue;
    messages: CheckMessages;
  }
): QualityCheck<Snapshot> {
  const { rows, foreignKey, parents, parentKey, messages, ...rest } = header;
  return {
    ...rest,
    evaluate(snapshot) {
      const tableRows = rows(snapshot);
      const known = distinctValues(parents(snapshot), parentKey);
      const issues = countWhere(tableRows, row => {
        const value = foreignKey(row);
        return value !== null && !known.has(value);
      });
      return {
        totalRows: tableRows.length,
        issueCount: issues,
        message: issues === 0 ? messages.pass : messages.fail(issues),
      };
    },
  };
}

/**
 * Distinct parent keys never referenced by a child row
 */
export function unreferencedCheck<Snapshot, Parent, Child>(
  header: CheckHeader & {
    parents: (snapshot: Snapshot) => readonly Parent[];
    parentKey: (row: Parent) => CellValue;
    rows: (snapshot: Snapshot) => readonly Child[];
    foreignKey: (row: Child) => CellValue;
    message: (issues: number, total: number) => string;
  }
): QualityCheck<Snapshot> {
  const { parents, parentKey, rows, foreignKey, message, ...rest } = header;
  return {
    ...rest,
    evaluate(snapshot) {
      const parentKeys = distinctValues(parents(snapshot), parentKey);
      const referenced = distinctValues(rows(snapshot), foreignKey);
      const issues = [...parentKeys].filter(key => !referenced.has(key)).length;
      return {
        totalRows: parentKeys.size,
        issueCount: issues,
        message: message(issues, parentKeys.size),
      };
    },
  };
}

/**
 * Number of grain groups holding more than one row; nulls group together as in GROUP BY
 */
export function grainCheck<Snapshot, Row extends TableRow>(
  header: CheckHeader & {
    rows: (snapshot: Snapshot) => readonly Row[];
    grain: KeyColumns<Row>;
    messages: CheckMessages;
  }
): QualityCheck<Snapshot> {
  const { rows, grain, messages, ...rest } = header;
  return {
    ...rest,
    evaluate(snapshot) {
      const tableRows = rows(snapshot);
      const groups = new Map<string, number>();
      for (const row of tableRows) {
        const key = JSON.stringify(grain.map(column => row[column]));
        groups.set(key, (groups.get(key) ?? 0) + 1);
      }
      const issues = [...groups.values()].filter(count => count > 1).length;
      return {
        totalRows: tableRows.length,
        issueCount: issues,
        message: issues === 0 ? messages.pass : messages.fail(issues),
      };
    },
  };
}
