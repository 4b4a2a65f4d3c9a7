import { ProgressReporter } from '../progress-reporter';

function capture(): { lines: string[]; reporter: ProgressReporter } {
  const lines: string[] = [];
  return { lines, reporter: new ProgressReporter(line => lines.push(line)) };
}

describe('ProgressReporter', () => {
  test('should print step progress with a percentage', () => {
    const { lines, reporter } = capture();
    reporter.logStep('raw_brands', 1, 4);

    expect(lines).toEqual(['  [1/4] raw_brands (25.0%)']);
  });

  test('should print completion with the record count', () => {
    const { lines, reporter } = capture();
    reporter.logStepComplete('stg_orders', 1.25, 1615);

    expect(lines).toEqual(['    ✅ stg_orders completed (1,615 records) in 1.3s']);
  });

  test('should print failures with their message', () => {
    const { lines, reporter } = capture();
    reporter.logStepFailure('raw_stocks', '[file] missing');

    expect(lines).toEqual(['    ❌ raw_stocks FAILED', '       Error: [file] missing']);
  });

  test('should show the message only for checks that did not pass', () => {
    const { lines, reporter } = capture();
    const base = {
      layer: 'warehouse' as const,
      category: 'Data Quality',
      checkName: 'Negative Prices',
      tableName: 'fact_sales',
      totalRows: 10,
      issueCount: 0,
      issuePercentage: 0,
      message: 'No negative prices found',
    };
    reporter.logQualityResult({ ...base, result: 'PASS' });
    reporter.logQualityResult({ ...base, result: 'FAIL', message: 'Found 2 records with negative list_price' });

    expect(lines).toEqual([
      '    ✅ PASS    Negative Prices (fact_sales)',
      '    ❌ FAIL    Negative Prices (fact_sales)',
      '       Found 2 records with negative list_price',
    ]);
  });

  test('should print debug lines only in debug mode', () => {
    const { lines, reporter } = capture();
    reporter.logDebug('hidden');
    reporter.logDebug('shown', true);

    expect(lines).toEqual(['  🐛 DEBUG: shown']);
  });
});
