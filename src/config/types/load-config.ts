export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

// Pseudo-method accepted on the command line to select WebSocket sessions
export const WEBSOCKET_METHOD = 'WS';

export type ProtocolSelector =
  | { type: 'http'; method: HttpMethod }
  | { type: 'websocket' }
  | { type: 'unsupported'; method: string };

export interface LoadConfiguration {
  readonly url: string;
  readonly protocol: ProtocolSelector;
  readonly body?: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly ws_message?: string;
  /** Seconds a WebSocket session stays open after the optional send */
  readonly ws_hold_duration?: number;
  /** Milliseconds; bounds each HTTP call and each WebSocket handshake */
  readonly timeout: number;
}

export interface RunOptions {
  concurrency: number;
  requests: number;
}
