export interface RequestResult {
  /** Elapsed milliseconds, fractional */
  duration: number;
  success: boolean;
  /** HTTP status; only set when a server response was received */
  status?: number;
  error?: string;
}

/**
 * Performs exactly one work unit per `execute()` call. A handler is shared by
 * every worker of a run and must not keep per-call state.
 */
export interface ProtocolHandler {
  execute(): Promise<RequestResult>;
  cleanup?(): Promise<void>;
}

export function elapsedSince(start: number): number {
  return performance.now() - start;
}
