import * as YAML from 'yaml';
import * as fs from 'fs';
import {
  HTTP_METHODS,
  HttpMethod,
  LoadConfiguration,
  ProtocolSelector,
  RawRunOptions,
  RunOptions,
  WEBSOCKET_METHOD
} from './types';
import { ConfigurationError } from '../core/errors';
import { parseTime } from '../utils/time';

export const DEFAULT_TIMEOUT_SECONDS = 30;

const RAW_OPTION_KEYS: (keyof RawRunOptions)[] = [
  'url', 'method', 'concurrency', 'requests', 'data', 'headers', 'ws_message', 'ws_duration', 'timeout'
];

export interface ResolvedRun {
  config: LoadConfiguration;
  run: RunOptions;
}

/**
 * Splits "Key:Value" at the first colon. Returns undefined when there is no
 * colon or the key is empty.
 */
export function parseHeader(header: string): [string, string] | undefined {
  const separator = header.indexOf(':');
  if (separator === -1) return undefined;

  const key = header.slice(0, separator).trim();
  const value = header.slice(separator + 1).trim();
  return key ? [key, value] : undefined;
}

export function parseCount(value: string | number | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  return typeof value === 'number' ? value : Number(value.trim());
}

export function resolveProtocol(method: string | undefined): ProtocolSelector {
  const normalized = (method || 'GET').trim().toUpperCase();

  if (normalized === WEBSOCKET_METHOD) {
    return { type: 'websocket' };
  }

  const httpMethod: HttpMethod | undefined = HTTP_METHODS.find(candidate => candidate === normalized);
  if (httpMethod) {
    return { type: 'http', method: httpMethod };
  }

  return { type: 'unsupported', method: method || '' };
}

export class ConfigParser {
  async parse(configPath: string): Promise<RawRunOptions> {
    if (!fs.existsSync(configPath)) {
      throw new Error(`Configuration file not found: ${configPath}`);
    }

    const configContent = await fs.promises.readFile(configPath, 'utf8');
    return this.parseContent(configContent, configPath);
  }

  parseContent(content: string, source: string = 'configuration'): RawRunOptions {
    const trimmed = content.trim();
    const parsed: unknown = trimmed.startsWith('{') ? JSON.parse(content) : YAML.parse(content);

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new Error(`Invalid run file ${source}: expected a mapping of options`);
    }

    return this.pickOptions(parsed);
  }

  /**
   * Values from `overrides` win wherever they are defined; headers are
   * concatenated so command-line headers overwrite file headers of the same name.
   */
  merge(base: RawRunOptions, overrides: RawRunOptions): RawRunOptions {
    const merged: RawRunOptions = { ...base };

    for (const key of RAW_OPTION_KEYS) {
      if (key === 'headers') continue;
      const value = overrides[key];
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }

    const headers = [...this.headerList(base.headers), ...this.headerList(overrides.headers)];
    if (headers.length > 0) {
      merged.headers = headers;
    }

    return merged;
  }

  /**
   * Turns validated raw options into the immutable configuration handed to
   * the runner. Throws ConfigurationError on input the validator would reject.
   */
  resolve(raw: RawRunOptions): ResolvedRun {
    if (!raw.url) {
      throw new ConfigurationError('Target URL is required');
    }

    const headers: Record<string, string> = {};
    for (const header of this.headerList(raw.headers)) {
      const parsed = parseHeader(header);
      if (!parsed) {
        throw new ConfigurationError(`Invalid header format: "${header}". Expected "Key:Value"`);
      }
      // Later duplicates overwrite earlier ones
      headers[parsed[0]] = parsed[1];
    }

    const timeout = parseTime(raw.timeout ?? DEFAULT_TIMEOUT_SECONDS, 's');
    const wsHold = raw.ws_duration !== undefined && raw.ws_duration !== ''
      ? parseTime(raw.ws_duration, 's') / 1000
      : undefined;

    const config: LoadConfiguration = Object.freeze({
      url: raw.url,
      protocol: resolveProtocol(raw.method),
      body: raw.data,
      headers: Object.freeze(headers),
      ws_message: raw.ws_message,
      ws_hold_duration: wsHold,
      timeout
    });

    return {
      config,
      run: {
        concurrency: parseCount(raw.concurrency, 1),
        requests: parseCount(raw.requests, 1)
      }
    };
  }

  private headerList(headers: RawRunOptions['headers']): string[] {
    if (!headers) return [];
    if (Array.isArray(headers)) return headers.map(String);
    return Object.entries(headers).map(([key, value]) => `${key}:${value}`);
  }

  private pickOptions(source: object): RawRunOptions {
    const options: RawRunOptions = {};
    const entries = new Map<string, unknown>(Object.entries(source));

    for (const key of ['url', 'method', 'data', 'ws_message'] as const) {
      const value = entries.get(key);
      if (value !== undefined && value !== null) {
        options[key] = String(value);
      }
    }

    for (const key of ['concurrency', 'requests', 'ws_duration', 'timeout'] as const) {
      const value = entries.get(key);
      if (typeof value === 'number' || typeof value === 'string') {
        options[key] = value;
      }
    }

    const headers = entries.get('headers');
    if (Array.isArray(headers)) {
      options.headers = headers.map(String);
    } else if (headers && typeof headers === 'object') {
      options.headers = Object.fromEntries(
        Object.entries(headers).map(([key, value]) => [key, String(value)])
      );
    }

    return options;
  }
}
