export { LoadRunner } from './load-runner';
export { WorkDistributor } from './work-distributor';
export type { WorkAssignment, WorkerOutcome } from './work-distributor';
export { ResultChannel } from './result-channel';
export type { ChannelSender } from './result-channel';
export { ConfigurationError, ChannelClosedError } from './errors';
export { ProtocolHandlerFactory } from './factories/protocol-handler-factory';
