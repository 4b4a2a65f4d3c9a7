import { ETLConfig } from '../lib/config-loader';
import { ProgressReporter } from '../lib/progress-reporter';
import { QualityRunResult, runStagingQualityChecks, runWarehouseQualityChecks } from './quality-checker';
import { runRawLoad } from './raw-loader';
import { StageOptions, StageResult } from './stage-runner';
import { StagingResult, runStagingTransform } from './stager';
import { runWarehouseLoad } from './warehouse-loader';

export interface PipelineOptions extends StageOptions {
  config: Pick<ETLConfig, 'inputFiles' | 'quality'>;
}

export interface PipelineResult {
  raw: StageResult;
  staging: StagingResult;
  stagingQuality: QualityRunResult;
  warehouse: StageResult;
  warehouseQuality: QualityRunResult;
  /** True when any stage logged a FAILED table */
  hasErrors: boolean;
}

const PHASES = 5;

/**
 * Run every stage in order. A stage with failed tables does not stop the
 * stages after it; each works from whatever the previous one left behind.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const reporter = options.reporter ?? new ProgressReporter();
  const stageOptions: StageOptions = { ...options, reporter };

  reporter.logPhase('Raw Load', 1, PHASES);
  const raw = await runRawLoad({ ...stageOptions, inputFiles: options.config.inputFiles });

  reporter.logPhase('Staging Transform', 2, PHASES);
  const staging = await runStagingTransform(stageOptions);

  reporter.logPhase('Staging Quality Checks', 3, PHASES);
  const stagingQuality = await runStagingQualityChecks({ ...stageOptions, quality: options.config.quality });

  reporter.logPhase('Warehouse Load', 4, PHASES);
  const warehouse = await runWarehouseLoad(stageOptions);

  reporter.logPhase('Warehouse Quality Checks', 5, PHASES);
  const warehouseQuality = await runWarehouseQualityChecks({ ...stageOptions, quality: options.config.quality });

  return {
    raw,
    staging,
    stagingQuality,
    warehouse,
    warehouseQuality,
    hasErrors: raw.hasErrors || staging.hasErrors || warehouse.hasErrors,
  };
}
