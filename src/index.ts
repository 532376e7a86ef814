export { LoadRunner, WorkDistributor, ResultChannel, ConfigurationError, ChannelClosedError, ProtocolHandlerFactory } from './core';
export type { WorkAssignment, WorkerOutcome, ChannelSender } from './core';

export { ResultAggregator } from './metrics/result-aggregator';
export { SummaryBuilder } from './metrics/summary-builder';
export type { Summary, LatencyStats, StatusCount, ErrorCount } from './metrics/types';

export { HTTPHandler } from './protocols/http/handler';
export { WebSocketHandler } from './protocols/websocket/handler';
export { UnsupportedMethodHandler } from './protocols/unsupported/handler';
export type { ProtocolHandler, RequestResult } from './protocols/base';

export { ConfigParser } from './config/parser';
export { ConfigValidator } from './config/validator';
export { HTTP_METHODS } from './config/types';
export type { LoadConfiguration, ProtocolSelector, HttpMethod, RunOptions, RawRunOptions } from './config/types';

export { ConsoleReporter } from './reporting/console-reporter';
export { JSONOutput } from './outputs/json';
