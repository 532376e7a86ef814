export interface LatencyStats {
  mean: number;
  min: number;
  max: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface StatusCount {
  status: number;
  count: number;
}

export interface ErrorCount {
  error: string;
  count: number;
}

export interface AggregateSnapshot {
  successful_requests: number;
  failed_requests: number;
  status_counts: Map<number, number>;
  error_counts: Map<string, number>;
}

export interface Summary {
  /** Wall-clock milliseconds from dispatch to the last worker joining */
  total_duration: number;
  total_requests: number;
  successful_requests: number;
  failed_requests: number;
  /** null when the elapsed time is zero */
  requests_per_second: number | null;
  /** Milliseconds; null when no request succeeded */
  latency: LatencyStats | null;
  /** Ascending by status code */
  status_distribution: StatusCount[];
  /** Count descending, ties in first-seen order */
  error_distribution: ErrorCount[];
}
