import {
  QualityCheck,
  failedCheck,
  grainCheck,
  issuePercentage,
  keyUniquenessCheck,
  orphanCheck,
  runCheck,
  toQualityRow,
  unreferencedCheck,
} from '../check-types';

type Row = { id: number | null; parent_id: number | null };
type Snapshot = { rows: Row[]; parents: { id: number | null }[] };

const snapshot: Snapshot = {
  rows: [
    { id: 1, parent_id: 10 },
    { id: 1, parent_id: 20 },
    { id: null, parent_id: null },
    { id: 2, parent_id: 30 },
  ],
  parents: [{ id: 10 }, { id: 20 }, { id: 40 }],
};

const messages = { pass: 'ok', fail: (issues: number) => `${issues} issues` };

describe('issuePercentage', () => {
  test('should round to two decimals', () => {
    expect(issuePercentage(1, 3)).toBe(33.33);
    expect(issuePercentage(2, 3)).toBe(66.67);
  });

  test('should be null for an empty table or a missing count', () => {
    expect(issuePercentage(0, 0)).toBeNull();
    expect(issuePercentage(null, 10)).toBeNull();
  });
});

describe('runCheck', () => {
  test('should classify issues with the check severity', () => {
    const check = keyUniquenessCheck<Snapshot, Row>({
      category: 'Keys',
      name: 'Unique id',
      table: 't',
      severity: 'FAIL',
      rows: s => s.rows,
      key: ['id'],
      messages,
    });

    // four rows, two distinct non-null ids
    expect(runCheck('warehouse', check, snapshot)).toEqual({
      layer: 'warehouse',
      category: 'Keys',
      checkName: 'Unique id',
      tableName: 't',
      result: 'FAIL',
      totalRows: 4,
      issueCount: 2,
      issuePercentage: 50,
      message: '2 issues',
    });
  });

  test('should pass when there are no issues', () => {
    const check = orphanCheck<Snapshot, Row, { id: number | null }>({
      category: 'RI',
      name: 'Orphans',
      table: 't',
      severity: 'WARNING',
      rows: s => s.rows.slice(0, 2),
      foreignKey: row => row.parent_id,
      parents: s => s.parents,
      parentKey: row => row.id,
      messages,
    });

    expect(runCheck('staging', check, snapshot)).toMatchObject({ result: 'PASS', issueCount: 0, message: 'ok' });
  });

  test('should record a throwing check as FAIL', () => {
    const check: QualityCheck<Snapshot> = {
      category: 'Broken',
      name: 'Throws',
      table: 't',
      severity: 'WARNING',
      evaluate() {
        throw new Error('bad column');
      },
    };

    expect(runCheck('staging', check, snapshot)).toMatchObject({
      result: 'FAIL',
      totalRows: 0,
      issueCount: null,
      issuePercentage: null,
      message: 'Check could not run: bad column',
    });
  });
});

describe('check builders', () => {
  test('should not count null foreign keys as orphans', () => {
    const check = orphanCheck<Snapshot, Row, { id: number | null }>({
      category: 'RI',
      name: 'Orphans',
      table: 't',
      severity: 'FAIL',
      rows: s => s.rows,
      foreignKey: row => row.parent_id,
      parents: s => s.parents,
      parentKey: row => row.id,
      messages,
    });

    expect(check.evaluate(snapshot)).toEqual({ totalRows: 4, issueCount: 1, message: '1 issues' });
  });

  test('should count parents that no row references', () => {
    const check = unreferencedCheck<Snapshot, { id: number | null }, Row>({
      category: 'Rel',
      name: 'Unused',
      table: 'parents',
      severity: 'WARNING',
      parents: s => s.parents,
      parentKey: row => row.id,
      rows: s => s.rows,
      foreignKey: row => row.parent_id,
      message: (issues, total) => `${issues} of ${total}`,
    });

    expect(check.evaluate(snapshot)).toEqual({ totalRows: 3, issueCount: 1, message: '1 of 3' });
  });

  test('should count duplicated grain groups, grouping nulls together', () => {
    const check = grainCheck<Snapshot, Row>({
      category: 'DQ',
      name: 'Grain',
      table: 't',
      severity: 'FAIL',
      rows: s => [...s.rows, { id: null, parent_id: null }, { id: 1, parent_id: 10 }],
      grain: ['id'],
      messages,
    });

    // id 1 three times, id null twice
    expect(check.evaluate(snapshot)).toEqual({ totalRows: 6, issueCount: 2, message: '2 issues' });
  });
});

describe('failedCheck and toQualityRow', () => {
  test('should produce an audit row for a check that could not run', () => {
    const check: QualityCheck<Snapshot> = {
      category: 'Null Check',
      name: 'Required fields',
      table: 'stg_brands',
      severity: 'FAIL',
      evaluate: () => ({ totalRows: 0, issueCount: 0, message: '' }),
    };
    const result = failedCheck('staging', check, new Error('table missing'));

    expect(toQualityRow(result, 'StgQualityCheck_20240305_0930', '2024-03-05T09:30:00.000Z')).toEqual({
      layer: 'staging',
      check_category: 'Null Check',
      check_name: 'Required fields',
      table_name: 'stg_brands',
      test_result: 'FAIL',
      total_rows: 0,
      issue_count: null,
      issue_percentage: null,
      message: 'Check could not run: table missing',
      batch_tag: 'StgQualityCheck_20240305_0930',
      checked_at: '2024-03-05T09:30:00.000Z',
    });
  });
});
