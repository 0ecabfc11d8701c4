/**
 * Tracks metrics for background job execution
 */

export interface JobMetrics {
  articlesScraped: number;
  chunksCreated: number;
  durationMs: number;
}

export interface JobStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  lastRun: JobMetrics | null;
  consecutiveFailures: number;
  averageDurationMs: number;
  totalArticlesScraped: number;
  totalChunksCreated: number;
}

export class MetricsTracker {
  private stats: JobStats = {
    totalRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    lastRunAt: null,
    lastSuccessAt: null,
    lastError: null,
    lastRun: null,
    consecutiveFailures: 0,
    averageDurationMs: 0,
    totalArticlesScraped: 0,
    totalChunksCreated: 0,
  };

  recordJobStart(): void {
    this.stats.lastRunAt = new Date();
    this.stats.totalRuns++;
  }

  recordJobSuccess(metrics: JobMetrics): void {
    this.stats.successfulRuns++;
    this.stats.consecutiveFailures = 0;
    this.stats.lastSuccessAt = new Date();
    this.stats.lastError = null;
    this.stats.lastRun = { ...metrics };

    this.stats.totalArticlesScraped += metrics.articlesScraped;
    this.stats.totalChunksCreated += metrics.chunksCreated;

    // Running average over successful runs
    const totalDuration = this.stats.averageDurationMs * (this.stats.successfulRuns - 1);
    this.stats.averageDurationMs = (totalDuration + metrics.durationMs) / this.stats.successfulRuns;
  }

  recordJobFailure(error: string): void {
    this.stats.failedRuns++;
    this.stats.consecutiveFailures++;
    this.stats.lastError = error;
  }

  getStats(): JobStats {
    return { ...this.stats, lastRun: this.stats.lastRun ? { ...this.stats.lastRun } : null };
  }

  /**
   * 3+ consecutive failures
   */
  isCriticalFailureState(): boolean {
    return this.stats.consecutiveFailures >= 3;
  }
}
