/**
 * TCP connection to a STOMP broker.
 *
 * Provides:
 * - CONNECT/CONNECTED handshake with optional credentials
 * - Incremental frame decoding
 * - Receipt-correlated requests
 * - Inbound flow control (suspend/resume)
 * - Graceful DISCONNECT with a forced close after a timeout
 *
 * Unlike a cluster link, a broker connection does not reconnect by itself:
 * the load client owning it decides when to open a new one.
 *
 * @module stomp/connection
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';

import { StompFrame, FrameDecoder, encodeFrame } from './frame.js';
import {
  type BrokerConnection,
  BrokerNotReachableError,
  ConnectionClosedError,
  StompErrorFrameError,
  STOMP_DEFAULTS,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Connection state.
 */
export type StompConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closing';

/**
 * Configuration for a connection.
 */
export interface StompConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly login?: string | undefined;
  readonly passcode?: string | undefined;

  /** Value of the CONNECT `host` header (defaults to `host`) */
  readonly virtualHost?: string | undefined;

  /** Connection and handshake timeout in milliseconds */
  readonly connectTimeoutMs?: number | undefined;

  /** How long close() waits for the DISCONNECT receipt before destroying the socket */
  readonly closeTimeoutMs?: number | undefined;

  readonly maxFrameSize?: number | undefined;
}

/**
 * Events emitted by StompConnection.
 */
export interface StompConnectionEvents {
  /** Emitted once the broker answered CONNECTED */
  connected: [version: string | undefined];

  /** Emitted for every frame handed to the receive handler */
  frame: [frame: StompFrame];

  /** Emitted when the connection is gone */
  disconnected: [reason: string];
}

/**
 * Statistics for a connection.
 */
export interface StompConnectionStats {
  readonly state: StompConnectionState;
  readonly framesSent: number;
  readonly framesReceived: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly pendingReceipts: number;
  readonly heldFrames: number;
  readonly connectedAt: number | null;
}

interface PendingReceipt {
  readonly receiptId: string;
  readonly resolve: (frame: StompFrame) => void;
  readonly reject: (error: Error) => void;
}

interface Handshake {
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
}

let connectionCounter = 0;

// =============================================================================
// Connection Class
// =============================================================================

/**
 * Manages a TCP connection to a STOMP broker.
 *
 * @example
 * ```typescript
 * const connection = new StompConnection({ host: '127.0.0.1', port: 61613 });
 * await connection.connect();
 *
 * connection.receive(
 *   (frame) => console.log(frame.command),
 *   (error) => console.error(error),
 * );
 * connection.resume();
 *
 * await connection.send(new StompFrame('SEND', [['destination', '/queue/a']], Buffer.from('hi')));
 * await connection.close();
 * ```
 */
export class StompConnection extends EventEmitter<StompConnectionEvents> implements BrokerConnection {
  readonly id: string;

  private socket: net.Socket | null = null;
  private state: StompConnectionState = 'disconnected';
  private readonly decoder: FrameDecoder;

  private readonly config: {
    readonly host: string;
    readonly port: number;
    readonly login: string | undefined;
    readonly passcode: string | undefined;
    readonly virtualHost: string;
    readonly connectTimeoutMs: number;
    readonly closeTimeoutMs: number;
  };

  private handshake: Handshake | null = null;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private closeTimer: ReturnType<typeof setTimeout> | null = null;
  private closePromise: Promise<void> | null = null;
  private onClosed: (() => void) | null = null;
  private closeReceiptId: string | null = null;

  private suspended = true;
  private readonly held: StompFrame[] = [];
  private readonly pendingReceipts: PendingReceipt[] = [];
  private receiptCounter = 0;

  private frameHandler: ((frame: StompFrame) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;
  private failure: Error | null = null;
  private failureReported = false;
  private lastSocketError: Error | null = null;

  // Statistics
  private framesSent = 0;
  private framesReceived = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private connectedAt: number | null = null;

  constructor(config: StompConnectionConfig) {
    super();

    this.id = `stomp_${++connectionCounter}`;
    this.config = {
      host: config.host,
      port: config.port,
      login: config.login,
      passcode: config.passcode,
      virtualHost: config.virtualHost ?? config.host,
      connectTimeoutMs: config.connectTimeoutMs ?? STOMP_DEFAULTS.CONNECT_TIMEOUT_MS,
      closeTimeoutMs: config.closeTimeoutMs ?? STOMP_DEFAULTS.CLOSE_TIMEOUT_MS,
    };
    this.decoder = new FrameDecoder(config.maxFrameSize ?? STOMP_DEFAULTS.MAX_FRAME_SIZE);
  }

  getState(): StompConnectionState {
    return this.state;
  }

  getStats(): StompConnectionStats {
    return {
      state: this.state,
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      pendingReceipts: this.pendingReceipts.length,
      heldFrames: this.held.length,
      connectedAt: this.connectedAt,
    };
  }

  /**
   * Opens the socket and performs the STOMP handshake.
   *
   * @throws {BrokerNotReachableError} If the socket fails or the handshake times out
   * @throws {StompErrorFrameError} If the broker rejects the CONNECT frame
   */
  connect(): Promise<void> {
    if (this.state !== 'disconnected') {
      return Promise.reject(new Error(`Cannot connect while ${this.state}`));
    }

    return new Promise((resolve, reject) => {
      this.state = 'connecting';
      let settled = false;

      const settle = (error: Error | null) => {
        if (settled) return;
        settled = true;
        this.handshake = null;
        this.clearConnectTimer();
        if (error) {
          this.cleanup();
          reject(error);
        } else {
          resolve();
        }
      };

      this.handshake = {
        resolve: () => settle(null),
        reject: (error) => settle(error),
      };

      this.connectTimer = setTimeout(() => {
        settle(new BrokerNotReachableError(this.config.host, this.config.port, 'connection timeout'));
      }, this.config.connectTimeoutMs);

      const socket = new net.Socket();
      this.socket = socket;
      this.setupSocketHandlers(socket);

      socket.once('connect', () => {
        socket.setNoDelay(true);
        this.write(this.buildConnectFrame()).catch((err: unknown) => {
          settle(
            new BrokerNotReachableError(
              this.config.host,
              this.config.port,
              err instanceof Error ? err.message : String(err),
            ),
          );
        });
      });

      socket.connect(this.config.port, this.config.host);
    });
  }

  send(frame: StompFrame): Promise<void> {
    if (this.state !== 'connected') {
      return Promise.reject(new ConnectionClosedError(`cannot send while ${this.state}`));
    }
    return this.write(frame);
  }

  request(frame: StompFrame): Promise<StompFrame> {
    if (this.state !== 'connected') {
      return Promise.reject(new ConnectionClosedError(`cannot send while ${this.state}`));
    }

    let receiptId = frame.getHeader('receipt');
    let outbound = frame;
    if (receiptId === undefined) {
      receiptId = `${this.id}-receipt-${++this.receiptCounter}`;
      outbound = frame.withHeader('receipt', receiptId);
    }

    const id = receiptId;
    return new Promise((resolve, reject) => {
      const pending: PendingReceipt = { receiptId: id, resolve, reject };
      this.pendingReceipts.push(pending);

      this.write(outbound).catch((err: unknown) => {
        const idx = this.pendingReceipts.indexOf(pending);
        if (idx !== -1) {
          this.pendingReceipts.splice(idx, 1);
        }
        reject(err instanceof Error ? err : new Error(String(err)));
      });
    });
  }

  receive(onFrame: (frame: StompFrame) => void, onError: (error: Error) => void): void {
    this.frameHandler = onFrame;
    this.errorHandler = onError;

    // A failure that happened before anyone was listening is still reported.
    if (this.failure && !this.failureReported) {
      this.failureReported = true;
      onError(this.failure);
    }
  }

  suspend(): void {
    if (this.suspended) return;
    this.suspended = true;
    this.socket?.pause();
  }

  resume(): void {
    if (!this.suspended) return;
    this.suspended = false;

    while (!this.suspended && this.held.length > 0) {
      const frame = this.held.shift();
      if (frame) {
        this.deliver(frame);
      }
    }

    if (!this.suspended) {
      this.socket?.resume();
    }
  }

  /**
   * Sends DISCONNECT and closes the socket once the broker acknowledges it,
   * or after `closeTimeoutMs`.
   */
  close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    if (this.state === 'disconnected') {
      return Promise.resolve();
    }

    this.closePromise = new Promise((resolve) => {
      const wasConnected = this.state === 'connected';
      this.state = 'closing';

      if (this.handshake) {
        this.handshake.reject(new ConnectionClosedError('closed during handshake'));
      }

      const socket = this.socket;
      if (!socket || !wasConnected) {
        this.cleanup();
        resolve();
        return;
      }

      this.onClosed = () => {
        this.onClosed = null;
        this.cleanup();
        resolve();
      };

      this.closeTimer = setTimeout(() => {
        socket.destroy();
        this.onClosed?.();
      }, this.config.closeTimeoutMs);

      // Read again so the receipt gets through; MESSAGE frames stay held.
      socket.resume();
      this.closeReceiptId = `${this.id}-disconnect`;
      this.write(new StompFrame('DISCONNECT', [['receipt', this.closeReceiptId]])).catch(() => {
        socket.destroy();
      });
    });

    return this.closePromise;
  }

  /**
   * Destroys the connection immediately without the DISCONNECT exchange.
   */
  destroy(): void {
    this.socket?.destroy();
    this.cleanup();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private buildConnectFrame(): StompFrame {
    const headers: [string, string][] = [
      ['accept-version', STOMP_DEFAULTS.ACCEPT_VERSION],
      ['host', this.config.virtualHost],
    ];
    if (this.config.login !== undefined) {
      headers.push(['login', this.config.login]);
    }
    if (this.config.passcode !== undefined) {
      headers.push(['passcode', this.config.passcode]);
    }
    return new StompFrame('CONNECT', headers);
  }

  private write(frame: StompFrame): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new ConnectionClosedError('no socket'));
    }

    const data = encodeFrame(frame);
    return new Promise((resolve, reject) => {
      socket.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.framesSent++;
        this.bytesSent += data.length;
        resolve();
      });
    });
  }

  private setupSocketHandlers(socket: net.Socket): void {
    socket.on('data', (data) => this.handleData(data));
    socket.on('error', (err) => {
      // The 'close' event that follows reports the failure.
      this.lastSocketError = err;
    });
    socket.on('close', () => this.handleSocketClose());
  }

  private handleData(data: Buffer): void {
    this.bytesReceived += data.length;

    let frames: StompFrame[];
    try {
      frames = this.decoder.push(data);
    } catch (err) {
      this.fail(err instanceof Error ? err : new Error(String(err)));
      this.socket?.destroy();
      return;
    }

    for (const frame of frames) {
      this.framesReceived++;
      this.dispatch(frame);
    }
  }

  private dispatch(frame: StompFrame): void {
    switch (frame.command) {
      case 'CONNECTED': {
        if (this.handshake && this.state === 'connecting') {
          this.state = 'connected';
          this.connectedAt = Date.now();
          // Held until the owner opts in via resume().
          this.socket?.pause();
          this.handshake.resolve();
          this.emit('connected', frame.getHeader('version'));
        }
        return;
      }

      case 'RECEIPT': {
        const receiptId = frame.getHeader('receipt-id');
        if (receiptId !== undefined && receiptId === this.closeReceiptId) {
          this.socket?.end();
          return;
        }
        const idx = this.pendingReceipts.findIndex((p) => p.receiptId === receiptId);
        if (idx !== -1) {
          const [pending] = this.pendingReceipts.splice(idx, 1);
          pending?.resolve(frame);
        }
        return;
      }

      case 'ERROR': {
        const error = new StompErrorFrameError(frame.getHeader('message') ?? 'unknown', frame.bodyText());
        if (this.handshake) {
          this.handshake.reject(error);
        } else {
          this.fail(error);
        }
        return;
      }

      default: {
        if (this.suspended) {
          this.held.push(frame);
        } else {
          this.deliver(frame);
        }
      }
    }
  }

  private deliver(frame: StompFrame): void {
    this.emit('frame', frame);
    this.frameHandler?.(frame);
  }

  /**
   * Records a connection failure: rejects pending receipts and reports to
   * the error handler once.
   */
  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.rejectPending(error);

    if (this.errorHandler) {
      this.failureReported = true;
      this.errorHandler(error);
    }
  }

  private handleSocketClose(): void {
    if (this.onClosed) {
      this.onClosed();
      return;
    }

    if (this.handshake) {
      const reason = this.lastSocketError?.message ?? 'socket closed during handshake';
      this.handshake.reject(new BrokerNotReachableError(this.config.host, this.config.port, reason));
      return;
    }

    if (this.state === 'connected') {
      const reason = this.lastSocketError?.message ?? 'socket closed by peer';
      this.fail(new ConnectionClosedError(reason));
      this.cleanup();
      this.emit('disconnected', reason);
    }
  }

  private rejectPending(error: Error): void {
    const pending = this.pendingReceipts.splice(0, this.pendingReceipts.length);
    for (const p of pending) {
      p.reject(error);
    }
  }

  private cleanup(): void {
    this.clearConnectTimer();
    if (this.closeTimer) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
    }

    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.destroy();
      this.socket = null;
    }

    this.rejectPending(new ConnectionClosedError('connection closed'));
    this.held.length = 0;
    this.decoder.reset();
    this.state = 'disconnected';
    this.connectedAt = null;
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }
}
