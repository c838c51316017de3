/**
 * STOMP frames, codec and TCP transport.
 *
 * @module stomp
 */

// =============================================================================
// Frames
// =============================================================================

export {
  StompFrame,
  FrameDecoder,
  encodeFrame,
  parseHeader,
  type StompHeader,
} from './frame.js';

// =============================================================================
// Transport
// =============================================================================

export {
  StompConnection,
  type StompConnectionState,
  type StompConnectionConfig,
  type StompConnectionEvents,
  type StompConnectionStats,
} from './connection.js';

export { StompTransport, type StompTransportOptions } from './transport.js';

export {
  type BrokerConnection,
  type BrokerTransport,
  type ConnectOptions,
  BrokerNotReachableError,
  StompErrorFrameError,
  ConnectionClosedError,
  FrameDecodeError,
  STOMP_DEFAULTS,
} from './types.js';
