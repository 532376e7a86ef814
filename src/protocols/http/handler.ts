import axios, { AxiosError, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { Readable } from 'stream';
import { finished } from 'stream/promises';
import { ProtocolHandler, RequestResult, elapsedSince } from '../base';
import { HttpMethod } from '../../config/types';
import { logger } from '../../utils/logger';

const DEFAULT_TIMEOUT_MS = 30000;

export interface HTTPHandlerOptions {
  url: string;
  method: HttpMethod;
  body?: string;
  headers?: Readonly<Record<string, string>>;
  timeout?: number;
  /** Upper bound on pooled sockets per origin; normally the worker count */
  maxSockets?: number;
}

export class HTTPHandler implements ProtocolHandler {
  private axiosInstance: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private requestConfig: AxiosRequestConfig;
  private method: HttpMethod;
  private url: string;
  private timeout: number;

  constructor(options: HTTPHandlerOptions) {
    this.method = options.method;
    this.url = options.url;
    this.timeout = options.timeout || DEFAULT_TIMEOUT_MS;

    const maxSockets = options.maxSockets && options.maxSockets > 0 ? options.maxSockets : Infinity;
    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets });
    this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets });

    // One pooled client per run, shared by every worker
    this.axiosInstance = axios.create({
      timeout: this.timeout,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      // Non-2xx responses are results, not exceptions
      validateStatus: () => true,
      decompress: true,
      // Bodies are drained, never buffered
      responseType: 'stream',
    });

    this.requestConfig = {
      method: options.method,
      url: options.url,
      headers: { ...options.headers },
      data: options.body,
    };
  }

  async execute(): Promise<RequestResult> {
    const startTime = performance.now();

    let response: AxiosResponse<Readable>;
    try {
      response = await this.axiosInstance.request<Readable>(this.requestConfig);
    } catch (error: unknown) {
      return this.handleError(error, elapsedSince(startTime));
    }

    try {
      await this.drain(response.data, this.timeout - elapsedSince(startTime));
    } catch (error: unknown) {
      const message = `Network error: ${error instanceof Error ? error.message : String(error)}`;
      logger.debug(`❌ ${this.method} ${this.url} - ${response.status} body: ${message}`);
      return { duration: elapsedSince(startTime), success: false, status: response.status, error: message };
    }

    return this.createResult(response, elapsedSince(startTime));
  }

  async cleanup(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  /**
   * Reads the body to its end without keeping it. The request timeout stays
   * in force while the body streams in.
   */
  private async drain(body: Readable, remainingMs: number): Promise<void> {
    const timer = setTimeout(() => {
      body.destroy(new Error(`timeout of ${this.timeout}ms exceeded`));
    }, Math.max(remainingMs, 0));

    try {
      await finished(body.resume());
    } finally {
      clearTimeout(timer);
    }
  }

  private createResult(response: AxiosResponse, duration: number): RequestResult {
    const isSuccess = response.status >= 200 && response.status < 300;

    if (!isSuccess) {
      const error = response.statusText ? `HTTP ${response.status} ${response.statusText}` : `HTTP ${response.status}`;
      logger.debug(`❌ ${this.method} ${this.url} - ${error}`);
      return { duration, success: false, status: response.status, error };
    }

    return { duration, success: true, status: response.status };
  }

  // Every response resolves, so only transport failures arrive here
  private handleError(error: unknown, duration: number): RequestResult {
    if (axios.isAxiosError(error)) {
      const axiosError: AxiosError = error;
      const message = `Network error: ${axiosError.message}`;
      logger.debug(`❌ ${axiosError.code || 'NETWORK_ERROR'}: ${this.method} ${this.url} - ${message}`);
      return { duration, success: false, error: message };
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.debug(`❌ UNKNOWN_ERROR: ${this.method} ${this.url} - ${message}`);
    return { duration, success: false, error: message };
  }
}
