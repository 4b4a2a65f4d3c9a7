/**
 * Sales Warehouse ETL Pipeline
 * ============================
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts <command>
 *
 * Commands:
 *   setup      Create the raw, staging, warehouse and audit schemas and tables
 *   raw        Load the source CSV files into the raw tables
 *   staging    Dedupe and clean raw into staging
 *   warehouse  Rebuild the dimensions and facts from staging
 *   quality    Run the staging and warehouse quality batteries
 *   all        raw -> staging -> staging checks -> warehouse -> warehouse checks
 *
 * Exits with code 1 when any table of a stage is logged FAILED.
 */

import * as path from 'path';
import * as sql from 'mssql';
import { ETLConfig, getSqlConfig, loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { MssqlTableStore } from './lib/mssql-table-store';
import { ProgressReporter } from './lib/progress-reporter';
import { executeSQLScripts } from './lib/sql-executor';
import { StageOptions } from './stages/stage-runner';
import { runPipeline } from './stages/pipeline';
import { runStagingQualityChecks, runWarehouseQualityChecks } from './stages/quality-checker';
import { runRawLoad } from './stages/raw-loader';
import { runStagingTransform } from './stages/stager';
import { runWarehouseLoad } from './stages/warehouse-loader';

const COMMANDS = ['setup', 'raw', 'staging', 'warehouse', 'quality', 'all'] as const;
type Command = (typeof COMMANDS)[number];

const SETUP_SCRIPTS = [
  '00-schema-setup.sql',
  '01-raw-tables.sql',
  '02-staging-tables.sql',
  '03-warehouse-tables.sql',
  '04-audit-tables.sql',
];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function usage(): string {
  return `Usage: run-pipeline <${COMMANDS.join('|')}>`;
}

/**
 * Run one command; resolves to true when every table it touched loaded
 */
async function runCommand(
  command: Command,
  pool: sql.ConnectionPool,
  config: ETLConfig,
  reporter: ProgressReporter
): Promise<boolean> {
  const options: StageOptions = {
    store: new MssqlTableStore(pool, config.database.schemas),
    reporter,
    debugMode: config.debugMode,
  };

  switch (command) {
    case 'setup': {
      const sqlDir = path.resolve(process.cwd(), 'sql');
      await executeSQLScripts(
        SETUP_SCRIPTS.map(script => path.join(sqlDir, script)),
        pool,
        config,
        reporter
      );
      return true;
    }
    case 'raw':
      return !(await runRawLoad({ ...options, inputFiles: config.inputFiles })).hasErrors;
    case 'staging':
      return !(await runStagingTransform(options)).hasErrors;
    case 'warehouse':
      return !(await runWarehouseLoad(options)).hasErrors;
    case 'quality':
      await runStagingQualityChecks({ ...options, quality: config.quality });
      await runWarehouseQualityChecks({ ...options, quality: config.quality });
      return true;
    case 'all':
      return !(await runPipeline({ ...options, config })).hasErrors;
  }
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'all';
  if (!isCommand(command)) {
    console.error(usage());
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Invalid configuration:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    process.exitCode = 1;
    return;
  }
  if (config.debugMode) {
    printConfig(config);
  }

  const reporter = new ProgressReporter();
  let pool: sql.ConnectionPool | null = null;

  try {
    reporter.logInfo('Connecting to SQL Server...');
    pool = await sql.connect(getSqlConfig(config));

    const succeeded = await runCommand(command, pool, config, reporter);
    if (!succeeded) {
      reporter.logWarning('One or more tables failed to load; see load_log for details');
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(formatError(error));
    process.exitCode = 1;
  } finally {
    if (pool) {
      await pool.close();
      reporter.logInfo('Connection closed');
    }
  }
}

main().catch(error => {
  console.error(formatError(error));
  process.exitCode = 1;
});
