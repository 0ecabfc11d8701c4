/**
 * Debug Logger - step-by-step logging for the ingestion and query paths
 *
 * Usage:
 *   Set DEBUG=true in environment variables to enable debug logging
 *   Each operation logs START and FINISH (or ERROR) so slow steps stand out
 */

import chalk from 'chalk';

interface StepTimer {
  category: string;
  description: string;
  startTime: number;
}

type LogData = Record<string, unknown>;

const categoryColors: Record<string, chalk.Chalk> = {
  // Query path
  QUERY: chalk.bgCyan.black.bold,
  STREAM: chalk.bgBlue.white.bold,
  CONDENSE: chalk.bgMagenta.white.bold,
  RETRIEVAL: chalk.bgBlue.white.bold,
  GENERATION: chalk.bgRed.white.bold,
  SESSION: chalk.bgGreen.black.bold,

  // Ingestion path
  PIPELINE: chalk.bgMagenta.white.bold,
  SCRAPER: chalk.bgCyan.black.bold,
  SECTION: chalk.bgCyan.black.bold,
  ARTICLE: chalk.bgBlue.white.bold,
  CHUNKER: chalk.bgYellow.black.bold,
  EMBED: chalk.bgBlue.white.bold,
  INDEX: chalk.bgGreen.black.bold,
  JOB: chalk.bgMagenta.white.bold,

  // System
  CONFIG: chalk.bgWhite.black.bold,
  CONCURRENCY: chalk.bgWhite.black.bold,
  ERROR: chalk.bgRed.white.bold,
};

function getCategoryLabel(category: string): string {
  const colorFn = categoryColors[category] || chalk.bgGray.white.bold;
  return colorFn(` ${category} `);
}

function formatData(data?: LogData): string {
  return data && Object.keys(data).length > 0
    ? chalk.dim(` │ ${JSON.stringify(data)}`)
    : '';
}

export class DebugLogger {
  private isDebugMode: boolean;
  private activeSteps: Map<string, StepTimer> = new Map();
  private stepCounter = 0;

  constructor(enabled = process.env.DEBUG === 'true' || process.env.DEBUG === '1') {
    this.isDebugMode = enabled;
  }

  isEnabled(): boolean {
    return this.isDebugMode;
  }

  /**
   * Log the start of an operation step
   * @returns stepId for tracking this specific step, '' when disabled
   */
  stepStart(category: string, description: string, metadata?: LogData): string {
    if (!this.isDebugMode) return '';

    const stepId = `${category}_${++this.stepCounter}`;

    this.activeSteps.set(stepId, {
      category,
      description,
      startTime: Date.now()
    });

    console.log(`${chalk.cyan('▶')} ${getCategoryLabel(category)} ${chalk.white(description)}${formatData(metadata)}`);

    return stepId;
  }

  stepFinish(stepId: string, result?: LogData): void {
    if (!this.isDebugMode || !stepId) return;

    const step = this.activeSteps.get(stepId);
    if (!step) {
      console.warn(chalk.yellow(`⚠ Unknown step: ${stepId}`));
      return;
    }

    const duration = Date.now() - step.startTime;
    const durationColor = duration > 1000 ? chalk.yellow : duration > 500 ? chalk.cyan : chalk.green;
    console.log(`${chalk.green('✓')} ${getCategoryLabel(step.category)} ${chalk.white(step.description)} ${durationColor(`(${duration}ms)`)}${formatData(result)}`);

    this.activeSteps.delete(stepId);
  }

  /**
   * Log an error that occurred during a step
   * @param stepId - The ID returned from stepStart (null if the step wasn't started)
   */
  stepError(stepId: string | null, category: string, description: string, error: unknown): void {
    if (!this.isDebugMode) return;

    let step: StepTimer | undefined;
    let duration = 0;

    if (stepId) {
      step = this.activeSteps.get(stepId);
      if (step) {
        duration = Date.now() - step.startTime;
        this.activeSteps.delete(stepId);
      }
    }

    const durationStr = duration > 0 ? chalk.dim(` (${duration}ms)`) : '';
    const errorMsg = error instanceof Error ? error.message : String(error);

    console.log(`${chalk.red('✗')} ${getCategoryLabel(step?.category || category)} ${chalk.white(description)}${durationStr} ${chalk.red('│')} ${chalk.red(errorMsg)}`);

    if (error instanceof Error && error.stack) {
      console.log(chalk.dim(`  └─ ${error.stack.split('\n')[1]?.trim() || error.stack}`));
    }
  }

  info(category: string, message: string, data?: LogData): void {
    if (!this.isDebugMode) return;
    console.log(`${chalk.blue('ℹ')} ${getCategoryLabel(category)} ${chalk.white(message)}${formatData(data)}`);
  }

  warn(category: string, message: string, data?: LogData): void {
    if (!this.isDebugMode) return;
    console.log(`${chalk.yellow('⚠')} ${getCategoryLabel(category)} ${chalk.yellow(message)}${formatData(data)}`);
  }
}

export const debugLogger = new DebugLogger();
