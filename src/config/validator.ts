import { RawRunOptions, ValidationResult } from './types';
import { parseCount, parseHeader, resolveProtocol } from './parser';
import { parseTime } from '../utils/time';

const BODYLESS_METHODS = ['GET', 'HEAD'];

export class ConfigValidator {
  validate(options: RawRunOptions): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!options.url) {
      errors.push('Target URL is required');
    } else if (!this.isParsableURL(options.url)) {
      warnings.push(`Target URL "${options.url}" does not parse; every request will fail`);
    }

    this.validateCounts(options, errors, warnings);
    this.validateProtocol(options, errors, warnings);
    this.validateHeaders(options, errors);
    this.validateDurations(options, errors);

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  private validateCounts(options: RawRunOptions, errors: string[], warnings: string[]): void {
    // Zero is left to the runner, which reports it as a ConfigurationError
    const concurrency = parseCount(options.concurrency, 1);
    const requests = parseCount(options.requests, 1);

    if (!Number.isInteger(concurrency) || concurrency < 0) {
      errors.push(`Invalid concurrency: ${options.concurrency}. Expected a non-negative integer`);
    }
    if (!Number.isInteger(requests) || requests < 0) {
      errors.push(`Invalid request count: ${options.requests}. Expected a non-negative integer`);
    }

    if (Number.isInteger(concurrency) && Number.isInteger(requests) && requests > 0 && concurrency > requests) {
      warnings.push(`Concurrency (${concurrency}) exceeds request count (${requests}); only ${requests} workers will run`);
    }
  }

  private validateProtocol(options: RawRunOptions, errors: string[], warnings: string[]): void {
    const protocol = resolveProtocol(options.method);

    switch (protocol.type) {
      case 'unsupported':
        warnings.push(`Unsupported method "${protocol.method}"; every request will fail without a network call`);
        break;

      case 'http':
        if (options.ws_message !== undefined || options.ws_duration !== undefined) {
          warnings.push('WebSocket options are ignored for HTTP requests');
        }
        if (options.data !== undefined && BODYLESS_METHODS.includes(protocol.method)) {
          warnings.push(`Request body sent with ${protocol.method}; many servers ignore it`);
        }
        break;

      case 'websocket':
        if (options.data !== undefined) {
          warnings.push('Request body is ignored for WebSocket sessions; use --ws-message');
        }
        if (options.url && this.isParsableURL(options.url) && !/^(wss?|https?):/i.test(options.url)) {
          errors.push(`WebSocket URL must use ws://, wss://, http:// or https://, got ${options.url}`);
        }
        break;
    }
  }

  private validateHeaders(options: RawRunOptions, errors: string[]): void {
    if (!options.headers || !Array.isArray(options.headers)) return;

    for (const header of options.headers) {
      if (!parseHeader(header)) {
        errors.push(`Invalid header format: "${header}". Expected "Key:Value"`);
      }
    }
  }

  private validateDurations(options: RawRunOptions, errors: string[]): void {
    if (options.timeout !== undefined) {
      const timeout = this.tryParseSeconds(options.timeout);
      if (timeout === undefined || timeout <= 0) {
        errors.push(`Invalid timeout: ${options.timeout}. Expected a positive number of seconds`);
      }
    }

    if (options.ws_duration !== undefined) {
      const hold = this.tryParseSeconds(options.ws_duration);
      if (hold === undefined || hold < 0) {
        errors.push(`Invalid WebSocket duration: ${options.ws_duration}. Expected a non-negative number of seconds`);
      }
    }
  }

  private tryParseSeconds(value: string | number): number | undefined {
    try {
      const ms = parseTime(value, 's');
      return Number.isFinite(ms) ? ms : undefined;
    } catch {
      return undefined;
    }
  }

  private isParsableURL(url: string): boolean {
    try {
      new URL(url);
      return true;
    } catch {
      return false;
    }
  }
}
