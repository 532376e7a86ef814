import { ProtocolHandler, RequestResult } from '../base';

/**
 * Stands in for a method string that resolved to no known protocol.
 * Every call fails at once without touching the network.
 */
export class UnsupportedMethodHandler implements ProtocolHandler {
  private method: string;

  constructor(method: string) {
    this.method = method;
  }

  async execute(): Promise<RequestResult> {
    return {
      duration: 0,
      success: false,
      error: `Unsupported HTTP method: ${this.method}`
    };
  }
}
