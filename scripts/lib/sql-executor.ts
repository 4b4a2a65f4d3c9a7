import * as sql from 'mssql';
import * as fs from 'fs';
import * as path from 'path';
import { ETLConfig } from './config-loader';
import { ProgressReporter } from './progress-reporter';

export interface SQLExecutionOptions {
  config: ETLConfig;
  pool: sql.ConnectionPool;
  scriptPath: string;
  reporter?: ProgressReporter;
}

export interface SQLExecutionResult {
  success: boolean;
  recordsAffected?: number;
  duration: number;
  error?: unknown;
}

/**
 * Execute SQL script with schema variable substitution
 * Replaces $(SCHEMA_NAME) variables with actual schema names from config
 */
export async function executeSQLScript(options: SQLExecutionOptions): Promise<SQLExecutionResult> {
  const startTime = Date.now();
  const reporter = options.reporter ?? new ProgressReporter();

  try {
    const scriptContent = fs.readFileSync(options.scriptPath, 'utf-8');
    const processedSQL = substituteSchemaVariables(scriptContent, options.config);

    reporter.logDebug(`Processed SQL (first 500 chars):\n${processedSQL.substring(0, 500)}`, options.config.debugMode);

    // SQL Server batches cannot span a GO separator
    const batches = splitBatches(processedSQL);
    reporter.logInfo(`Executing ${path.basename(options.scriptPath)} (${batches.length} batches)...`);

    let totalRowsAffected = 0;
    for (const batch of batches) {
      const result = await options.pool.request().batch(batch);
      totalRowsAffected += result.rowsAffected.reduce((sum, count) => sum + count, 0);
    }

    return {
      success: true,
      recordsAffected: totalRowsAffected,
      duration: (Date.now() - startTime) / 1000,
    };
  } catch (error) {
    return {
      success: false,
      duration: (Date.now() - startTime) / 1000,
      error,
    };
  }
}

/**
 * Substitute schema variable placeholders with actual schema names
 */
export function substituteSchemaVariables(script: string, config: ETLConfig): string {
  const { schemas } = config.database;
  return script
    .replace(/\$\(RAW_SCHEMA\)/g, schemas.raw)
    .replace(/\$\(STAGING_SCHEMA\)/g, schemas.staging)
    .replace(/\$\(WAREHOUSE_SCHEMA\)/g, schemas.warehouse)
    .replace(/\$\(AUDIT_SCHEMA\)/g, schemas.audit);
}

/**
 * Split a script on lines holding only GO, dropping empty batches
 */
export function splitBatches(script: string): string[] {
  return script
    .split(/^\s*GO\s*$/gim)
    .map(batch => batch.trim())
    .filter(batch => batch.length > 0);
}

/**
 * Execute multiple SQL scripts in sequence, stopping at the first failure
 */
export async function executeSQLScripts(
  scripts: string[],
  pool: sql.ConnectionPool,
  config: ETLConfig,
  reporter: ProgressReporter = new ProgressReporter()
): Promise<SQLExecutionResult[]> {
  const results: SQLExecutionResult[] = [];

  for (let i = 0; i < scripts.length; i++) {
    const scriptPath = scripts[i];
    reporter.logStep(path.basename(scriptPath), i + 1, scripts.length);

    const result = await executeSQLScript({ config, pool, scriptPath, reporter });
    results.push(result);

    if (!result.success) {
      throw result.error;
    }
    reporter.logStepComplete(path.basename(scriptPath), result.duration);
  }

  return results;
}
