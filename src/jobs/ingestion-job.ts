/**
 * Background job that runs the ingestion pipeline through the queue
 */

import type { IngestionQueue } from '../ingestion/queue';
import { MetricsTracker } from './metrics-tracker';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export class IngestionJob {
  private running = false;

  constructor(
    private readonly queue: IngestionQueue,
    readonly metrics: MetricsTracker = new MetricsTracker()
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run once. Overlapping ticks are skipped; failures are recorded, never thrown.
   */
  async run(): Promise<void> {
    if (this.running) {
      debugLogger.info('JOB', 'Job already running, skipping this execution');
      return;
    }

    this.running = true;
    const startTime = Date.now();
    this.metrics.recordJobStart();

    try {
      const report = await this.queue.run();
      const durationMs = Date.now() - startTime;
      this.metrics.recordJobSuccess({ ...report, durationMs });

      if (report.articlesScraped > 0) {
        console.log(
          `🎉 Background job: Ingested ${report.articlesScraped} articles, ` +
          `${report.chunksCreated} chunks (${durationMs}ms)`
        );
      } else if (debugLogger.isEnabled()) {
        console.log(`😴 Background job: No articles passed validation (${durationMs}ms)`);
      }
    } catch (error) {
      const message = errorMessage(error);
      this.metrics.recordJobFailure(message);
      console.error(`❌ Background job failed: ${message} (${Date.now() - startTime}ms)`);

      if (this.metrics.isCriticalFailureState()) {
        console.error(
          `🚨 CRITICAL: Background job has failed ${this.metrics.getStats().consecutiveFailures} times consecutively!`
        );
      }
    } finally {
      this.running = false;
    }
  }
}
