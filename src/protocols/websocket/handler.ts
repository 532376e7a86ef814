import { WebSocket } from 'ws';
import { ProtocolHandler, RequestResult, elapsedSince } from '../base';
import { holdFor } from '../../utils/time';
import { logger } from '../../utils/logger';

export interface WebSocketHandlerOptions {
  url: string;
  message?: string;
  /** Seconds to keep the session open before closing */
  holdDuration?: number;
  /** Handshake timeout in milliseconds */
  timeout?: number;
}

const SUPPORTED_SCHEMES = ['ws:', 'wss:', 'http:', 'https:'];
const NORMAL_CLOSURE = 1000;

/**
 * One session per `execute()`: open, send at most one text frame, optionally
 * hold the connection, then close. Inbound frames are ignored and the whole
 * session counts as a single result.
 */
export class WebSocketHandler implements ProtocolHandler {
  private options: WebSocketHandlerOptions;

  constructor(options: WebSocketHandlerOptions) {
    this.options = options;
  }

  async execute(): Promise<RequestResult> {
    const startTime = performance.now();

    const urlError = this.validateURL(this.options.url);
    if (urlError) {
      return { duration: elapsedSince(startTime), success: false, error: `Invalid WebSocket URL: ${urlError}` };
    }

    let ws: WebSocket;
    try {
      ws = await this.connect();
    } catch (error: unknown) {
      const message = `WebSocket connection failed: ${error instanceof Error ? error.message : String(error)}`;
      logger.debug(`❌ ${this.options.url} - ${message}`);
      return { duration: elapsedSince(startTime), success: false, error: message };
    }

    if (this.options.message !== undefined) {
      try {
        await this.send(ws, this.options.message);
      } catch (error: unknown) {
        const duration = elapsedSince(startTime);
        const message = `WebSocket send failed: ${error instanceof Error ? error.message : String(error)}`;
        logger.debug(`❌ ${this.options.url} - ${message}`);
        await this.close(ws);
        return { duration, success: false, error: message };
      }
    }

    if (this.options.holdDuration !== undefined) {
      await holdFor(this.options.holdDuration * 1000);
      const duration = elapsedSince(startTime);
      await this.close(ws);
      return { duration, success: true };
    }

    await this.close(ws);
    return { duration: elapsedSince(startTime), success: true };
  }

  private validateURL(url: string): string | undefined {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error: unknown) {
      return error instanceof Error ? error.message : String(error);
    }

    if (!SUPPORTED_SCHEMES.includes(parsed.protocol)) {
      return `unsupported scheme "${parsed.protocol}"`;
    }
    return undefined;
  }

  private connect(): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.options.url, {
        handshakeTimeout: this.options.timeout || 30000,
      });

      // Errors after the handshake surface through send/close; keep the socket from throwing
      ws.on('error', (error) => logger.debug(`WebSocket error on ${this.options.url}: ${error.message}`));

      const onOpen = () => {
        ws.off('error', onError);
        resolve(ws);
      };
      const onError = (error: Error) => {
        ws.off('open', onOpen);
        reject(error);
      };

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  private send(ws: WebSocket, message: string): Promise<void> {
    return new Promise((resolve, reject) => {
      ws.send(message, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Starts the closing handshake and waits for it, falling back to a hard
   * terminate if the peer does not answer within the handshake timeout.
   */
  private close(ws: WebSocket): Promise<void> {
    if (ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        ws.terminate();
      }, this.options.timeout || 30000);

      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (ws.readyState === WebSocket.OPEN) {
        ws.close(NORMAL_CLOSURE);
      }
    });
  }
}
