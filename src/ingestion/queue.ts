import type { IngestionReport } from '../types';
import { debugLogger } from '../utils/debug-logger';

/**
 * Serializes ingestion runs. A run requested while another is in flight
 * does not start a second one; the caller gets the in-flight run's report.
 */
export class IngestionQueue {
  private current: Promise<IngestionReport> | null = null;
  private waiting = 0;

  constructor(private readonly task: () => Promise<IngestionReport>) {}

  get isIngesting(): boolean {
    return this.current !== null;
  }

  run(): Promise<IngestionReport> {
    if (this.current) {
      this.waiting++;
      debugLogger.info('PIPELINE', 'Ingestion already in progress, sharing its result', {
        waitingRequests: this.waiting,
      });
      return this.current;
    }

    const run = this.task().finally(() => {
      if (this.waiting > 0) {
        debugLogger.info('PIPELINE', 'Notifying waiting requests', { waitingCount: this.waiting });
      }
      this.current = null;
      this.waiting = 0;
    });
    this.current = run;
    return run;
  }
}
