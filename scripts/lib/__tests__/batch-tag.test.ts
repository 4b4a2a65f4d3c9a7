import { calendarDate, createBatchTag, latestBatch } from '../batch-tag';

describe('createBatchTag', () => {
  test('should stamp the prefix with the UTC date and minute', () => {
    expect(createBatchTag('StgBatch', new Date('2024-01-15T09:30:59Z'))).toBe('StgBatch_20240115_0930');
  });

  test('should zero-pad single digit fields', () => {
    expect(createBatchTag('RawBatch', new Date('2024-03-05T04:07:00Z'))).toBe('RawBatch_20240305_0407');
  });
});

describe('calendarDate', () => {
  test('should return the UTC calendar date', () => {
    expect(calendarDate(new Date('2023-12-31T23:59:00Z'))).toBe('2023-12-31');
  });
});

describe('latestBatch', () => {
  const rows = [
    { batch_tag: 'RawBatch_20240101_0800', table_name: 'raw_brands' },
    { batch_tag: 'RawBatch_20240102_0800', table_name: 'raw_brands' },
    { batch_tag: 'RawBatch_20240102_0800', table_name: 'raw_stocks' },
    { batch_tag: 'StgBatch_20240103_0800', table_name: 'stg_brands' },
    { batch_tag: null, table_name: 'unknown' },
  ];

  test('should return every row of the greatest tag for the prefix', () => {
    expect(latestBatch(rows, 'RawBatch').map(row => row.table_name)).toEqual(['raw_brands', 'raw_stocks']);
  });

  test('should return nothing when the prefix has no batches', () => {
    expect(latestBatch(rows, 'DWBatch')).toEqual([]);
  });
});
