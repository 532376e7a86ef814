import { ResultAggregator } from './result-aggregator';
import { ErrorCount, StatusCount, Summary } from './types';
import { WorkerOutcome } from '../core/work-distributor';
import { logger } from '../utils/logger';

export interface SummaryBuilderDependencies {
  aggregator: ResultAggregator;
  /** Worker tasks; awaited here, after the aggregator has drained */
  workers: Promise<WorkerOutcome>[];
  /** `performance.now()` at dispatch */
  startTime: number;
}

export class SummaryBuilder {
  async build(deps: SummaryBuilderDependencies): Promise<Summary> {
    const { aggregator, workers, startTime } = deps;

    const outcomes = await Promise.all(workers);
    for (const outcome of outcomes) {
      if (outcome.error === undefined) continue;

      const missing = outcome.assigned - outcome.delivered;
      logger.warn(`Worker ${outcome.worker_index + 1} failed with ${missing} undelivered units: ${outcome.error}`);
      aggregator.recordWorkerFailure(outcome.error, missing);
    }

    const totalDurationMs = performance.now() - startTime;
    return this.fromAggregate(aggregator, totalDurationMs);
  }

  fromAggregate(aggregator: ResultAggregator, totalDurationMs: number): Summary {
    const snapshot = aggregator.getSnapshot();
    const totalRequests = snapshot.successful_requests + snapshot.failed_requests;
    const totalDurationSec = totalDurationMs / 1000;

    return {
      total_duration: totalDurationMs,
      total_requests: totalRequests,
      successful_requests: snapshot.successful_requests,
      failed_requests: snapshot.failed_requests,
      requests_per_second: totalDurationSec > 0 ? totalRequests / totalDurationSec : null,
      latency: aggregator.getLatencyStats(),
      status_distribution: this.sortStatuses(snapshot.status_counts),
      error_distribution: this.sortErrors(snapshot.error_counts)
    };
  }

  private sortStatuses(counts: Map<number, number>): StatusCount[] {
    return Array.from(counts.entries())
      .map(([status, count]) => ({ status, count }))
      .sort((a, b) => a.status - b.status);
  }

  private sortErrors(counts: Map<string, number>): ErrorCount[] {
    // Array.prototype.sort is stable, so ties keep first-seen order
    return Array.from(counts.entries())
      .map(([error, count]) => ({ error, count }))
      .sort((a, b) => b.count - a.count);
  }
}
