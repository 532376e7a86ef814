/**
 * Raised before any work is dispatched when the run cannot start:
 * zero work units, zero workers, or input that does not resolve.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ChannelClosedError extends Error {
  constructor(message: string = 'Result channel is closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
