import { LoadLogEntry, loadLog } from '../model/tables';
import { TableStore } from './table-store';

export type LoadStatus = 'SUCCESS' | 'FAILED';

/**
 * Per-run log buffer.
 *
 * Entries are collected while a stage walks its tables and written to
 * load_log in one append at the end, all carrying the stage's batch tag.
 * A FAILED entry raises the run's error flag; the stage keeps going.
 */
export class BatchLog {
  private readonly entries: LoadLogEntry[] = [];
  private failures = 0;

  constructor(
    readonly batchTag: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  succeed(tableName: string, message: string): void {
    this.record(tableName, 'SUCCESS', message);
  }

  fail(tableName: string, message: string): void {
    this.failures++;
    this.record(tableName, 'FAILED', message);
  }

  get hasErrors(): boolean {
    return this.failures > 0;
  }

  get failedCount(): number {
    return this.failures;
  }

  getEntries(): LoadLogEntry[] {
    return [...this.entries];
  }

  /**
   * Append the collected entries to load_log
   */
  async flush(store: TableStore): Promise<LoadLogEntry[]> {
    const entries = this.getEntries();
    if (entries.length > 0) {
      await store.insertRows(loadLog, entries);
    }
    return entries;
  }

  private record(tableName: string, status: LoadStatus, message: string): void {
    this.entries.push({
      table_name: tableName,
      load_status: status,
      message,
      batch_tag: this.batchTag,
      load_time: this.now().toISOString(),
    });
  }
}
