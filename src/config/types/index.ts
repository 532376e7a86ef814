export { HTTP_METHODS, WEBSOCKET_METHOD } from './load-config';
export type { HttpMethod, ProtocolSelector, LoadConfiguration, RunOptions } from './load-config';
export type { RawRunOptions, ValidationResult } from './raw-options';
