/**
 * Progress Reporter for ETL Pipeline
 * Provides formatted console output for tracking ETL progress
 */

import { QualityCheckResult, TestResult } from '../quality/check-types';
import { CategorySummary, TableSummary } from '../quality/summary';

export type OutputSink = (line: string) => void;

const RESULT_ICONS: Record<TestResult, string> = {
  PASS: '✅',
  FAIL: '❌',
  WARNING: '⚠️ ',
};

export class ProgressReporter {
  private startTime: Date | null = null;

  constructor(private readonly output: OutputSink = console.log) {}

  /**
   * Log the start of a stage run
   */
  logRunStart(stageName: string, batchTag: string, totalSteps: number): void {
    this.startTime = new Date();
    this.output('\n╔════════════════════════════════════════════════════════════════╗');
    this.output(`║  ${stageName.padEnd(62)}║`);
    this.output('╚════════════════════════════════════════════════════════════════╝');
    this.output(`  Batch Tag:   ${batchTag}`);
    this.output(`  Total Steps: ${totalSteps}`);
    this.output(`  Started:     ${this.startTime.toISOString()}`);
    this.output('');
  }

  /**
   * Log the start of a phase
   */
  logPhase(phase: string, phaseNumber: number, totalPhases: number): void {
    this.output('');
    this.output('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    this.output(`📦 Phase ${phaseNumber}/${totalPhases}: ${phase}`);
    this.output('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    this.output('');
  }

  /**
   * Log the start of a step
   */
  logStep(step: string, currentStep: number, totalSteps: number): void {
    const percent = ((currentStep / totalSteps) * 100).toFixed(1);
    this.output(`  [${currentStep}/${totalSteps}] ${step} (${percent}%)`);
  }

  /**
   * Log step completion
   */
  logStepComplete(stepName: string, duration: number, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName} completed`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }

    message += ` in ${this.formatDuration(duration)}`;
    this.output(message);
  }

  /**
   * Log step failure
   */
  logStepFailure(stepName: string, message: string): void {
    this.output(`    ❌ ${stepName} FAILED`);
    this.output(`       Error: ${message}`);
  }

  /**
   * Log stage completion
   */
  logRunComplete(totalSteps: number, failedSteps: number, totalDuration: number): void {
    const title = failedSteps === 0 ? 'Completed' : `Completed with ${failedSteps} failed table(s)`;
    this.output('\n╔════════════════════════════════════════════════════════════════╗');
    this.output(`║  ${title.padEnd(62)}║`);
    this.output('╚════════════════════════════════════════════════════════════════╝');
    this.output(`  Steps Completed: ${totalSteps - failedSteps}/${totalSteps}`);
    this.output(`  Total Duration:  ${this.formatDuration(totalDuration)}`);
    if (this.startTime) {
      this.output(`  Started:         ${this.startTime.toISOString()}`);
      this.output(`  Completed:       ${new Date().toISOString()}`);
    }
    this.output('');
  }

  /**
   * Log one quality check result line
   */
  logQualityResult(result: QualityCheckResult): void {
    const icon = RESULT_ICONS[result.result];
    this.output(`    ${icon} ${result.result.padEnd(7)} ${result.checkName} (${result.tableName})`);
    if (result.result !== 'PASS') {
      this.output(`       ${result.message}`);
    }
  }

  logTableSummary(summaries: readonly TableSummary[]): void {
    this.output('');
    this.output('  Summary by table:');
    for (const summary of summaries) {
      this.output(
        `    ${summary.tableName.padEnd(28)} ${String(summary.totalChecks).padStart(3)} checks | ` +
          `${summary.passed} passed, ${summary.failed} failed, ${summary.warnings} warnings | ${summary.status}`
      );
    }
  }

  logCategorySummary(summaries: readonly CategorySummary[]): void {
    this.output('');
    this.output('  Summary by category:');
    for (const summary of summaries) {
      this.output(
        `    ${summary.category.padEnd(28)} ${String(summary.totalChecks).padStart(3)} checks | ` +
          `${summary.passed} passed, ${summary.failed} failed, ${summary.warnings} warnings | ${summary.passRate}% pass rate`
      );
    }
    this.output('');
  }

  /**
   * Log warning message
   */
  logWarning(message: string): void {
    this.output(`  ⚠️  ${message}`);
  }

  /**
   * Log info message
   */
  logInfo(message: string): void {
    this.output(`  ℹ️  ${message}`);
  }

  /**
   * Log debug message (only if debug mode enabled)
   */
  logDebug(message: string, debugMode: boolean = false): void {
    if (debugMode) {
      this.output(`  🐛 DEBUG: ${message}`);
    }
  }

  /**
   * Format a number with thousand separators
   */
  private formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  private formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}

/**
 * Reporter that discards everything, for callers that only want the returned rows
 */
export function silentReporter(): ProgressReporter {
  return new ProgressReporter(() => undefined);
}
