import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigParser, parseCount, parseHeader, resolveProtocol } from '../../../src/config/parser';
import { ConfigurationError } from '../../../src/core/errors';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('parseHeader()', () => {
  it('should split at the first colon and trim', () => {
    expect(parseHeader('Content-Type: application/json')).toEqual(['Content-Type', 'application/json']);
    expect(parseHeader('X-Time:12:30:00')).toEqual(['X-Time', '12:30:00']);
  });

  it('should allow an empty value', () => {
    expect(parseHeader('X-Empty:')).toEqual(['X-Empty', '']);
  });

  it('should reject headers without a colon or key', () => {
    expect(parseHeader('InvalidHeader')).toBeUndefined();
    expect(parseHeader(': value')).toBeUndefined();
  });
});

describe('parseCount()', () => {
  it('should fall back when the value is missing', () => {
    expect(parseCount(undefined, 1)).toBe(1);
    expect(parseCount('', 1)).toBe(1);
  });

  it('should convert numeric strings', () => {
    expect(parseCount('12', 1)).toBe(12);
    expect(parseCount(7, 1)).toBe(7);
    expect(parseCount('abc', 1)).toBeNaN();
  });
});

describe('resolveProtocol()', () => {
  it('should default to GET', () => {
    expect(resolveProtocol(undefined)).toEqual({ type: 'http', method: 'GET' });
    expect(resolveProtocol('')).toEqual({ type: 'http', method: 'GET' });
  });

  it('should match HTTP methods case-insensitively', () => {
    expect(resolveProtocol('post')).toEqual({ type: 'http', method: 'POST' });
    expect(resolveProtocol('Options')).toEqual({ type: 'http', method: 'OPTIONS' });
  });

  it('should select WebSocket for the WS pseudo-method', () => {
    expect(resolveProtocol('ws')).toEqual({ type: 'websocket' });
    expect(resolveProtocol('WS')).toEqual({ type: 'websocket' });
  });

  it('should keep the method text as given when unsupported', () => {
    expect(resolveProtocol('fetch')).toEqual({ type: 'unsupported', method: 'fetch' });
    expect(resolveProtocol('CONNECT')).toEqual({ type: 'unsupported', method: 'CONNECT' });
  });
});

describe('ConfigParser', () => {
  let parser: ConfigParser;
  let tempDir: string;

  beforeEach(() => {
    parser = new ConfigParser();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'parser-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('parse()', () => {
    it('should read a YAML run file', async () => {
      const configPath = path.join(tempDir, 'run.yml');
      fs.writeFileSync(configPath, `
url: http://127.0.0.1:8080/health
method: post
concurrency: 4
requests: 100
data: '{"ping":true}'
timeout: 5s
headers:
  Content-Type: application/json
  X-Test-Token: test-secret
`);

      const options = await parser.parse(configPath);

      expect(options).toEqual({
        url: 'http://127.0.0.1:8080/health',
        method: 'post',
        concurrency: 4,
        requests: 100,
        data: '{"ping":true}',
        timeout: '5s',
        headers: { 'Content-Type': 'application/json', 'X-Test-Token': 'test-secret' }
      });
    });

    it('should read a JSON run file', async () => {
      const configPath = path.join(tempDir, 'run.json');
      fs.writeFileSync(configPath, JSON.stringify({
        url: 'ws://127.0.0.1:9000',
        method: 'WS',
        ws_message: 'hello',
        ws_duration: 2,
        headers: ['X-Trace: 1']
      }));

      const options = await parser.parse(configPath);

      expect(options).toEqual({
        url: 'ws://127.0.0.1:9000',
        method: 'WS',
        ws_message: 'hello',
        ws_duration: 2,
        headers: ['X-Trace: 1']
      });
    });

    it('should throw for a missing file', async () => {
      const configPath = path.join(tempDir, 'missing.yml');

      await expect(parser.parse(configPath)).rejects.toThrow(`Configuration file not found: ${configPath}`);
    });
  });

  describe('parseContent()', () => {
    it('should treat an empty document as no options', () => {
      expect(parser.parseContent('')).toEqual({});
    });

    it('should reject documents that are not a mapping', () => {
      expect(() => parser.parseContent('- a\n- b', 'list.yml'))
        .toThrow('Invalid run file list.yml: expected a mapping of options');
    });

    it('should drop unknown keys', () => {
      expect(parser.parseContent('url: http://127.0.0.1/\nname: ignored')).toEqual({ url: 'http://127.0.0.1/' });
    });
  });

  describe('merge()', () => {
    it('should let defined overrides win and append headers', () => {
      const merged = parser.merge(
        { url: 'http://127.0.0.1/a', concurrency: 2, headers: { 'X-Env': 'file' } },
        { url: 'http://127.0.0.1/b', concurrency: undefined, headers: ['X-Env: cli'] }
      );

      expect(merged.url).toBe('http://127.0.0.1/b');
      expect(merged.concurrency).toBe(2);
      expect(merged.headers).toEqual(['X-Env:file', 'X-Env: cli']);
    });
  });

  describe('resolve()', () => {
    it('should apply defaults', () => {
      const { config, run } = parser.resolve({ url: 'http://127.0.0.1/' });

      expect(run).toEqual({ concurrency: 1, requests: 1 });
      expect(config.protocol).toEqual({ type: 'http', method: 'GET' });
      expect(config.timeout).toBe(30000);
      expect(config.headers).toEqual({});
      expect(config.ws_hold_duration).toBeUndefined();
    });

    it('should resolve counts, durations and headers', () => {
      const { config, run } = parser.resolve({
        url: 'ws://127.0.0.1:9000',
        method: 'ws',
        concurrency: '3',
        requests: '9',
        ws_duration: '1.5',
        timeout: '250ms',
        headers: ['X-Env: one', 'X-Other:two', 'X-Env: three']
      });

      expect(run).toEqual({ concurrency: 3, requests: 9 });
      expect(config.protocol).toEqual({ type: 'websocket' });
      expect(config.ws_hold_duration).toBe(1.5);
      expect(config.timeout).toBe(250);
      expect(config.headers).toEqual({ 'X-Env': 'three', 'X-Other': 'two' });
    });

    it('should freeze the resolved configuration', () => {
      const { config } = parser.resolve({ url: 'http://127.0.0.1/' });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.headers)).toBe(true);
    });

    it('should throw ConfigurationError without a URL', () => {
      expect(() => parser.resolve({})).toThrow(ConfigurationError);
    });

    it('should throw ConfigurationError for a malformed header', () => {
      expect(() => parser.resolve({ url: 'http://127.0.0.1/', headers: ['NoColon'] }))
        .toThrow('Invalid header format: "NoColon". Expected "Key:Value"');
    });
  });
});
