import { build, Histogram } from 'hdr-histogram-js';
import { RequestResult } from '../protocols/base';
import { AggregateSnapshot, LatencyStats } from './types';
import { logger } from '../utils/logger';

export const UNKNOWN_ERROR = 'Unknown error';

// The histogram cannot distinguish sub-millisecond samples; they record as 1ms
const MIN_RECORDABLE_MS = 1;

/**
 * Sole owner of the run's statistics. Workers never touch this state: they
 * push results into a channel and `consume()` is the only writer.
 */
export class ResultAggregator {
  private histogram: Histogram;
  private statusCounts: Map<number, number> = new Map();
  private errorCounts: Map<string, number> = new Map();
  private successfulRequests: number = 0;
  private failedRequests: number = 0;

  constructor() {
    this.histogram = build({
      lowestDiscernibleValue: 1,
      numberOfSignificantValueDigits: 3,
      autoResize: true
    });
  }

  /**
   * Records every result until the source ends, i.e. until all producers
   * have released the channel.
   */
  async consume(source: AsyncIterable<RequestResult>): Promise<number> {
    let received = 0;
    for await (const result of source) {
      this.record(result);
      received++;
    }
    logger.debug(`📊 Aggregator drained ${received} results`);
    return received;
  }

  record(result: RequestResult): void {
    if (result.success) {
      this.successfulRequests++;
      this.histogram.recordValue(toHistogramValue(result.duration));
    } else {
      this.failedRequests++;
      this.increment(this.errorCounts, result.error || UNKNOWN_ERROR);
    }

    if (result.status !== undefined) {
      this.increment(this.statusCounts, result.status);
    }
  }

  /**
   * Accounts for units a crashed worker never delivered. They count as
   * failures but have no latency.
   */
  recordWorkerFailure(error: string, missingUnits: number): void {
    if (missingUnits <= 0) return;
    this.failedRequests += missingUnits;
    this.increment(this.errorCounts, `Worker task failed: ${error}`, missingUnits);
  }

  getSnapshot(): AggregateSnapshot {
    return {
      successful_requests: this.successfulRequests,
      failed_requests: this.failedRequests,
      status_counts: new Map(this.statusCounts),
      error_counts: new Map(this.errorCounts)
    };
  }

  getLatencyStats(): LatencyStats | null {
    if (this.histogram.totalCount === 0) {
      return null;
    }

    return {
      mean: this.histogram.mean,
      min: this.histogram.minNonZeroValue,
      max: this.histogram.maxValue,
      p50: this.histogram.getValueAtPercentile(50),
      p90: this.histogram.getValueAtPercentile(90),
      p95: this.histogram.getValueAtPercentile(95),
      p99: this.histogram.getValueAtPercentile(99)
    };
  }

  getRecordedSampleCount(): number {
    return this.histogram.totalCount;
  }

  private increment<K>(counts: Map<K, number>, key: K, by: number = 1): void {
    counts.set(key, (counts.get(key) || 0) + by);
  }
}

export function toHistogramValue(durationMs: number): number {
  if (!Number.isFinite(durationMs)) return MIN_RECORDABLE_MS;
  return Math.max(MIN_RECORDABLE_MS, Math.floor(durationMs));
}
