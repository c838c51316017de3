/**
 * Transport contract and error types for the STOMP layer.
 *
 * The load clients depend only on `BrokerTransport` and `BrokerConnection`;
 * `StompTransport` is the TCP implementation, tests plug in fakes.
 *
 * @module stomp/types
 */

import type { StompFrame } from './frame.js';

// =============================================================================
// Transport Contract
// =============================================================================

/**
 * Where and as whom to connect.
 */
export interface ConnectOptions {
  readonly host: string;
  readonly port: number;
  readonly login?: string | undefined;
  readonly passcode?: string | undefined;
}

/**
 * A live broker connection.
 *
 * Connections start with inbound delivery suspended: received MESSAGE
 * frames are held until `resume()` is called.
 */
export interface BrokerConnection {
  /** Writes a frame; resolves once it is flushed to the socket. */
  send(frame: StompFrame): Promise<void>;

  /** Writes a frame with a receipt request; resolves with the RECEIPT frame. */
  request(frame: StompFrame): Promise<StompFrame>;

  /**
   * Registers the inbound handlers, replacing any previous ones.
   * `onError` is invoked at most once, when the connection fails.
   */
  receive(onFrame: (frame: StompFrame) => void, onError: (error: Error) => void): void;

  /** Stops inbound delivery. Idempotent. */
  suspend(): void;

  /** Restarts inbound delivery. Idempotent. */
  resume(): void;

  /** Closes the connection. Never rejects. */
  close(): Promise<void>;
}

/**
 * Opens broker connections.
 */
export interface BrokerTransport {
  connect(options: ConnectOptions): Promise<BrokerConnection>;
}

// =============================================================================
// Constants
// =============================================================================

export const STOMP_DEFAULTS = {
  PORT: 61613,
  CONNECT_TIMEOUT_MS: 10000,
  CLOSE_TIMEOUT_MS: 1000,
  MAX_FRAME_SIZE: 16 * 1024 * 1024,
  ACCEPT_VERSION: '1.0,1.1,1.2',
} as const;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown when the broker cannot be reached or the handshake fails.
 */
export class BrokerNotReachableError extends Error {
  override readonly name = 'BrokerNotReachableError' as const;

  constructor(
    readonly host: string,
    readonly port: number,
    readonly reason: string,
  ) {
    super(`Broker ${host}:${port} is not reachable: ${reason}`);
  }
}

/**
 * Error raised when the broker answers with an ERROR frame.
 */
export class StompErrorFrameError extends Error {
  override readonly name = 'StompErrorFrameError' as const;

  constructor(
    readonly brokerMessage: string,
    readonly details: string,
  ) {
    super(details.length > 0 ? `Broker error: ${brokerMessage}\n${details}` : `Broker error: ${brokerMessage}`);
  }
}

/**
 * Error raised for operations on, or pending at the loss of, a connection.
 */
export class ConnectionClosedError extends Error {
  override readonly name = 'ConnectionClosedError' as const;

  constructor(readonly reason: string) {
    super(`Connection closed: ${reason}`);
  }
}

/**
 * Error thrown when inbound bytes are not a valid STOMP frame.
 */
export class FrameDecodeError extends Error {
  override readonly name = 'FrameDecodeError' as const;

  constructor(readonly reason: string) {
    super(`Failed to decode STOMP frame: ${reason}`);
  }
}
