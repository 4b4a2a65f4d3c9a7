import { BatchLog } from '../lib/batch-log';
import { BatchPrefix, createBatchTag } from '../lib/batch-tag';
import { classifyError, errorMessage } from '../lib/error-handler';
import { ProgressReporter } from '../lib/progress-reporter';
import { TableStore } from '../lib/table-store';
import { LoadLogEntry } from '../model/tables';

export interface StageOptions {
  store: TableStore;
  reporter?: ProgressReporter;
  now?: () => Date;
  debugMode?: boolean;
}

export interface StageResult {
  batchTag: string;
  entries: LoadLogEntry[];
  hasErrors: boolean;
}

export interface TableStep {
  tableName: string;
  /** Runs the table's work and returns the number of rows written */
  execute(): Promise<number>;
}

interface StageMessages {
  success: (rows: number) => string;
  failure: (message: string) => string;
}

/**
 * Walk a stage's tables in order. A failing table is logged FAILED and the
 * stage moves on to the next one; the log is appended to load_log at the end.
 */
export async function runTableSteps(
  stageName: string,
  prefix: BatchPrefix,
  steps: readonly TableStep[],
  messages: StageMessages,
  options: StageOptions
): Promise<StageResult> {
  const reporter = options.reporter ?? new ProgressReporter();
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const log = new BatchLog(createBatchTag(prefix, startedAt), now);

  reporter.logRunStart(stageName, log.batchTag, steps.length);

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    const stepStart = Date.now();
    reporter.logStep(step.tableName, i + 1, steps.length);

    try {
      const rows = await step.execute();
      log.succeed(step.tableName, messages.success(rows));
      reporter.logStepComplete(step.tableName, (Date.now() - stepStart) / 1000, rows);
    } catch (error) {
      const message = errorMessage(error);
      log.fail(step.tableName, messages.failure(message));
      reporter.logStepFailure(step.tableName, `[${classifyError(error).category}] ${message}`);
      reporter.logDebug(error instanceof Error && error.stack ? error.stack : message, options.debugMode);
    }
  }

  const entries = await log.flush(options.store);
  reporter.logRunComplete(steps.length, log.failedCount, (now().getTime() - startedAt.getTime()) / 1000);

  return { batchTag: log.batchTag, entries, hasErrors: log.hasErrors };
}
