import { LoadConfiguration, RunOptions } from '../config/types';
import { ProtocolHandler, RequestResult } from '../protocols/base';
import { ProtocolHandlerFactory } from './factories/protocol-handler-factory';
import { ResultChannel } from './result-channel';
import { WorkDistributor } from './work-distributor';
import { ResultAggregator } from '../metrics/result-aggregator';
import { SummaryBuilder } from '../metrics/summary-builder';
import { Summary } from '../metrics/types';
import { logger } from '../utils/logger';

// Channel slots per worker
const CHANNEL_CAPACITY_FACTOR = 2;

export class LoadRunner {
  private config: LoadConfiguration;
  private options: RunOptions;
  private injectedHandler?: ProtocolHandler;
  private distributor = new WorkDistributor();
  private summaryBuilder = new SummaryBuilder();

  /**
   * @param handler - replaces the handler built from `config.protocol`; the
   * caller keeps ownership and is responsible for its cleanup
   */
  constructor(config: LoadConfiguration, options: RunOptions, handler?: ProtocolHandler) {
    this.config = config;
    this.options = options;
    this.injectedHandler = handler;
  }

  async run(): Promise<Summary> {
    const { concurrency, requests } = this.options;

    // Throws ConfigurationError before any handler or socket exists
    const assignments = this.distributor.computeAssignments(requests, concurrency);

    const handler = this.injectedHandler
      ?? new ProtocolHandlerFactory(this.config, concurrency).createHandler();
    const channel = new ResultChannel<RequestResult>(concurrency * CHANNEL_CAPACITY_FACTOR);
    const aggregator = new ResultAggregator();

    // Held until every worker has its own sender, so the channel cannot close early
    const dispatcher = channel.sender();

    logger.info(`🚀 Starting load: ${requests} units over ${concurrency} workers against ${this.config.url}`);
    const startTime = performance.now();

    try {
      const workers = this.distributor.spawn(assignments, handler, channel);
      dispatcher.release();

      await aggregator.consume(channel);
      const summary = await this.summaryBuilder.build({ aggregator, workers, startTime });

      logger.info(`✅ Completed ${summary.total_requests} units in ${(summary.total_duration / 1000).toFixed(3)}s`);
      return summary;
    } finally {
      dispatcher.release();
      if (!this.injectedHandler) {
        await ProtocolHandlerFactory.cleanupHandler(handler);
      }
    }
  }
}
