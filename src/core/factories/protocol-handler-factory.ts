import { LoadConfiguration } from '../../config/types';
import { ProtocolHandler } from '../../protocols/base';
import { HTTPHandler } from '../../protocols/http/handler';
import { WebSocketHandler } from '../../protocols/websocket/handler';
import { UnsupportedMethodHandler } from '../../protocols/unsupported/handler';
import { logger } from '../../utils/logger';

export class ProtocolHandlerFactory {
  private config: LoadConfiguration;
  private concurrency: number;

  constructor(config: LoadConfiguration, concurrency: number) {
    this.config = config;
    this.concurrency = concurrency;
  }

  createHandler(): ProtocolHandler {
    const protocol = this.config.protocol;

    switch (protocol.type) {
      case 'http':
        logger.debug(`HTTP handler initialized (${protocol.method}, pool size ${this.concurrency})`);
        return new HTTPHandler({
          url: this.config.url,
          method: protocol.method,
          body: this.config.body,
          headers: this.config.headers,
          timeout: this.config.timeout,
          maxSockets: this.concurrency
        });

      case 'websocket':
        logger.debug('WebSocket handler initialized');
        return new WebSocketHandler({
          url: this.config.url,
          message: this.config.ws_message,
          holdDuration: this.config.ws_hold_duration,
          timeout: this.config.timeout
        });

      case 'unsupported':
        logger.warn(`Unsupported method "${protocol.method}": every request will fail without a network call`);
        return new UnsupportedMethodHandler(protocol.method);
    }
  }

  static async cleanupHandler(handler: ProtocolHandler): Promise<void> {
    if (!handler.cleanup) return;

    try {
      await handler.cleanup();
    } catch (error) {
      logger.warn('Error cleaning up protocol handler:', error);
    }
  }
}
