/**
 * Unresolved run input, as it arrives from command-line flags or a run file.
 * Numbers may still be strings and headers are still "Key:Value" pairs.
 */
export interface RawRunOptions {
  url?: string;
  method?: string;
  concurrency?: string | number;
  requests?: string | number;
  data?: string;
  headers?: string[] | Record<string, string>;
  ws_message?: string;
  ws_duration?: string | number;
  timeout?: string | number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
