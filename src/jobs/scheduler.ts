/**
 * Background job scheduler using node-cron
 */

import * as cron from 'node-cron';
import type { IngestionJob } from './ingestion-job';
import { ConfigurationError } from '../utils/errors';
import { sleep } from '../utils/html';

export interface SchedulerStatus {
  isRunning: boolean;
  cronExpression: string;
  isJobCurrentlyExecuting: boolean;
}

export class JobScheduler {
  private scheduledTask: cron.ScheduledTask | null = null;

  constructor(
    private readonly job: IngestionJob,
    private readonly cronExpression: string
  ) {
    if (!cron.validate(cronExpression)) {
      throw new ConfigurationError(`Invalid cron expression: ${cronExpression}`);
    }
  }

  start(options: { runImmediately?: boolean } = {}): void {
    if (this.scheduledTask) {
      console.warn('Job scheduler is already running');
      return;
    }

    this.scheduledTask = cron.schedule(this.cronExpression, () => this.job.run());
    console.log(`🤖 Background job scheduler started (${this.cronExpression})`);

    if (options.runImmediately) {
      void this.job.run();
    }
  }

  stop(): void {
    if (!this.scheduledTask) return;
    this.scheduledTask.stop();
    this.scheduledTask = null;
    console.log('Background job scheduler stopped');
  }

  /**
   * Stop scheduling and wait (bounded) for the current run to finish
   */
  async shutdown(maxWaitMs = 30_000): Promise<void> {
    this.stop();

    const startWait = Date.now();
    while (this.job.isRunning() && Date.now() - startWait < maxWaitMs) {
      await sleep(100);
    }

    if (this.job.isRunning()) {
      console.warn('Background job did not finish within timeout period');
    }
  }

  getStatus(): SchedulerStatus {
    return {
      isRunning: this.scheduledTask !== null,
      cronExpression: this.cronExpression,
      isJobCurrentlyExecuting: this.job.isRunning(),
    };
  }
}
