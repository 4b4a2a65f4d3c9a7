export type BatchPrefix = 'RawBatch' | 'StgBatch' | 'DWBatch' | 'StgQualityCheck' | 'DWQualityCheck';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Build a batch tag such as `StgBatch_20240115_0930` (UTC, minute precision)
 */
export function createBatchTag(prefix: BatchPrefix, at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}`;
  return `${prefix}_${date}_${time}`;
}

/**
 * Calendar date of an instant as YYYY-MM-DD (UTC)
 */
export function calendarDate(at: Date): string {
  return at.toISOString().slice(0, 10);
}

/**
 * Rows of the most recent batch for a prefix. Tags sort chronologically as
 * text, so the latest batch is the greatest tag.
 */
export function latestBatch<Row extends { batch_tag: string | null }>(
  rows: readonly Row[],
  prefix: BatchPrefix
): Row[] {
  let latest: string | null = null;
  for (const row of rows) {
    const tag = row.batch_tag;
    if (tag !== null && tag.startsWith(`${prefix}_`) && (latest === null || tag > latest)) {
      latest = tag;
    }
  }
  return latest === null ? [] : rows.filter(row => row.batch_tag === latest);
}
