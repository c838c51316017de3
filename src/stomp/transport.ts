/**
 * TCP implementation of the broker transport contract.
 *
 * @module stomp/transport
 */

import { StompConnection } from './connection.js';
import type { BrokerConnection, BrokerTransport, ConnectOptions } from './types.js';

/**
 * Options applied to every connection the transport opens.
 */
export interface StompTransportOptions {
  readonly connectTimeoutMs?: number;
  readonly closeTimeoutMs?: number;
  readonly maxFrameSize?: number;
  readonly virtualHost?: string;
}

/**
 * Opens `StompConnection`s.
 *
 * @example
 * ```typescript
 * const transport = new StompTransport({ connectTimeoutMs: 5000 });
 * const connection = await transport.connect({ host: '127.0.0.1', port: 61613 });
 * ```
 */
export class StompTransport implements BrokerTransport {
  constructor(private readonly options: StompTransportOptions = {}) {}

  async connect(options: ConnectOptions): Promise<BrokerConnection> {
    const connection = new StompConnection({
      host: options.host,
      port: options.port,
      login: options.login,
      passcode: options.passcode,
      virtualHost: this.options.virtualHost,
      connectTimeoutMs: this.options.connectTimeoutMs,
      closeTimeoutMs: this.options.closeTimeoutMs,
      maxFrameSize: this.options.maxFrameSize,
    });
    await connection.connect();
    return connection;
  }
}
