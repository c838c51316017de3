/**
 * LoadClient - the per-client connection state machine.
 *
 * A client owns one DispatchQueue. Every state read and write happens in a
 * task of that queue; transport completions are re-enqueued through
 * `DispatchQueue.bind` before they touch the client. Subclasses provide the
 * reconnect action (the producer and consumer loops) and may react to
 * inbound frames.
 *
 * ```
 * INIT ──start──▶ DISCONNECTED ──open──▶ CONNECTING ──success──▶ CONNECTED
 *                      ▲                     │                      │
 *                      └──────close/failure──┘        close/failure │
 *                      ▲                                            ▼
 *                      └───────────────close complete────────── CLOSING
 * ```
 */

import { DispatchQueue, type DispatchQueueRef, type QueueTask } from '../core/dispatch-queue.js';
import { Latch } from '../core/latch.js';
import type { StompFrame } from '../stomp/frame.js';
import type { BrokerConnection, BrokerTransport } from '../stomp/types.js';
import {
  ClientStates,
  type ClientState,
  type ClientStateKind,
  type ConnectingState,
} from './client-state.js';
import type { ScenarioConfig } from './config.js';
import type { DoneSignal, SharedCounters } from './counters.js';
import { toError, type ScenarioLogger } from './logger.js';

/**
 * Delay before every reconnect attempt that follows a failure.
 */
export const RECONNECT_BACKOFF_MS = 1000;

/**
 * Everything a client shares with the rest of its scenario.
 */
export interface ClientEnvironment {
  readonly config: ScenarioConfig;
  readonly transport: BrokerTransport;
  readonly counters: SharedCounters;
  readonly done: DoneSignal;
  readonly logger: ScenarioLogger;
}

/**
 * Error thrown when an operation is not valid in the client's current state.
 */
export class InvalidStateError extends Error {
  override readonly name = 'InvalidStateError' as const;

  constructor(
    readonly clientName: string,
    readonly operation: string,
    readonly stateKind: ClientStateKind,
  ) {
    super(`Client '${clientName}' cannot ${operation} while ${stateKind}`);
  }
}

/**
 * Error thrown when `shutdown()` is called before the done signal is set.
 */
export class ShutdownNotRequestedError extends Error {
  override readonly name = 'ShutdownNotRequestedError' as const;

  constructor(readonly clientName: string) {
    super(`Client '${clientName}' cannot shut down before the done signal is set`);
  }
}

export abstract class LoadClient {
  private state: ClientState = ClientStates.init();
  private delay = 0;
  private readonly hasShutdown = new Latch();

  /** Messages handled since the current connection cycle began */
  protected messageCounter = 0;

  protected constructor(
    readonly id: number,
    readonly name: string,
    protected readonly env: ClientEnvironment,
    protected readonly queue: DispatchQueueRef,
  ) {}

  /**
   * Runs when the client enters DISCONNECTED and the done signal is not set.
   */
  protected abstract reconnectAction(): void;

  /**
   * Inbound frame from the current connection.
   */
  protected onReceive(_frame: StompFrame): void {
    // Producers ignore inbound frames.
  }

  get currentState(): ClientState {
    return this.state;
  }

  get reconnectDelay(): number {
    return this.delay;
  }

  get messagesThisCycle(): number {
    return this.messageCounter;
  }

  /** Id of the GenServer behind the client's queue */
  get queueId(): string {
    return this.queue.id;
  }

  get isShutdown(): boolean {
    return this.hasShutdown.isReleased;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Enqueues the INIT to DISCONNECTED transition.
   */
  start(): void {
    this.dispatch(() => {
      if (this.state.kind !== 'INIT') {
        throw new InvalidStateError(this.name, 'start', this.state.kind);
      }
      this.transition(ClientStates.disconnected());
    });
  }

  /**
   * Asks the client to close and stop reconnecting.
   *
   * @returns Promise resolved once the client has reached DISCONNECTED for good
   * @throws {ShutdownNotRequestedError} If the done signal is not set
   */
  shutdown(): Promise<void> {
    if (!this.env.done.isSet) {
      throw new ShutdownNotRequestedError(this.name);
    }
    if (!DispatchQueue.isRunning(this.queue)) {
      return Promise.resolve();
    }
    this.dispatch(() => {
      switch (this.state.kind) {
        case 'INIT':
        case 'DISCONNECTED':
          this.hasShutdown.countDown();
          break;
        case 'CONNECTING':
        case 'CONNECTED':
        case 'CLOSING':
          this.close();
          break;
      }
    });
    return this.shutdownOrTermination();
  }

  /**
   * Stops the client's queue. Pending timers and completions are dropped.
   */
  async dispose(): Promise<void> {
    if (DispatchQueue.isRunning(this.queue)) {
      await DispatchQueue.stop(this.queue);
    }
  }

  /**
   * Resolves on the shutdown latch, or when the queue terminates first (a
   * crashed queue never releases the latch).
   */
  private async shutdownOrTermination(): Promise<void> {
    let unsubscribe: () => void = () => undefined;
    const terminated = new Promise<void>((resolve) => {
      unsubscribe = DispatchQueue.onTerminated(this.queue, resolve);
    });
    try {
      await Promise.race([this.hasShutdown.wait(), terminated]);
    } finally {
      unsubscribe();
    }
  }

  // ===========================================================================
  // State machine
  // ===========================================================================

  /**
   * Starts a connection attempt, delayed by the reconnect backoff once the
   * client has seen a failure.
   */
  open(host: string, port: number, onComplete: () => void): void {
    this.assertExecuting();
    if (this.state.kind !== 'DISCONNECTED') {
      throw new InvalidStateError(this.name, 'open', this.state.kind);
    }
    const connecting = ClientStates.connecting(host, port, onComplete);
    this.transition(connecting);

    if (this.delay === 0) {
      this.attemptConnect(connecting);
    } else {
      DispatchQueue.after(this.queue, this.delay, () => {
        if (this.state === connecting) {
          this.attemptConnect(connecting);
        }
      });
    }
  }

  close(): void {
    this.assertExecuting();
    const current = this.state;
    switch (current.kind) {
      case 'CONNECTING':
        this.transition(ClientStates.disconnected());
        break;
      case 'CONNECTED': {
        const closing = ClientStates.closing();
        this.transition(closing);
        void current.connection.close().then(
          this.bind(() => this.onCloseComplete(closing)),
          this.bind((error: unknown) => {
            this.recordError(toError(error));
            this.onCloseComplete(closing);
          }),
        );
        break;
      }
      case 'INIT':
      case 'CLOSING':
      case 'DISCONNECTED':
        break;
    }
  }

  /**
   * A connection attempt succeeded. Connections that arrive after their
   * attempt was abandoned are closed right away.
   */
  onConnectSuccess(connecting: ConnectingState, connection: BrokerConnection): void {
    this.assertExecuting();
    if (this.state !== connecting) {
      void connection.close();
      return;
    }
    this.transition(ClientStates.connected(connection));
    connection.receive(
      this.bind((frame: StompFrame) => {
        if (this.isCurrent(connection)) {
          this.onReceive(frame);
        }
      }),
      this.bind((error: Error) => {
        if (this.isCurrent(connection)) {
          this.onFailure(error);
        }
      }),
    );
    connecting.onComplete();
    this.resumeInbound();
  }

  /**
   * A transport failure on the current attempt or connection.
   */
  onFailure(error: Error): void {
    this.assertExecuting();
    switch (this.state.kind) {
      case 'CONNECTING':
      case 'CONNECTED':
        this.recordError(error);
        this.delay = RECONNECT_BACKOFF_MS;
        this.close();
        break;
      case 'INIT':
      case 'CLOSING':
      case 'DISCONNECTED':
        break;
    }
  }

  /**
   * Opens a connection to the configured broker unless the scenario is done.
   */
  protected connect(onComplete: () => void): void {
    this.assertExecuting();
    if (!this.env.done.isSet) {
      this.open(this.env.config.host, this.env.config.port, onComplete);
    }
  }

  private attemptConnect(connecting: ConnectingState): void {
    const { login, passcode } = this.env.config;
    const queue = this.queue;
    void this.env.transport.connect({ host: connecting.host, port: connecting.port, login, passcode }).then(
      (connection) => {
        if (DispatchQueue.isRunning(queue)) {
          DispatchQueue.execute(queue, () => this.onConnectSuccess(connecting, connection));
        } else {
          void connection.close();
        }
      },
      this.bind((error: unknown) => {
        if (this.state === connecting) {
          this.onFailure(toError(error));
        }
      }),
    );
  }

  private onCloseComplete(closing: ClientState): void {
    if (this.state === closing) {
      this.transition(ClientStates.disconnected());
    }
  }

  private transition(next: ClientState): void {
    this.state = next;
    if (next.kind === 'DISCONNECTED') {
      this.dispatch(() => {
        if (this.state === next) {
          this.onDisconnectedEntry();
        }
      });
    }
  }

  private onDisconnectedEntry(): void {
    if (this.env.done.isSet) {
      this.hasShutdown.countDown();
    } else {
      this.reconnectAction();
    }
  }

  private recordError(error: Error): void {
    this.env.counters.incrementErrors();
    if (this.env.config.displayErrors) {
      this.env.logger.error(`${this.name}: ${error.message}`, error);
    }
  }

  // ===========================================================================
  // Send / receive primitives
  // ===========================================================================

  /**
   * Sends a frame on the current connection. `onComplete` runs once the
   * frame is written, provided the connection is still current.
   */
  protected send(frame: StompFrame, onComplete: () => void): void {
    this.assertExecuting();
    if (this.state.kind !== 'CONNECTED') {
      return;
    }
    const { connection } = this.state;
    void connection.send(frame).then(
      this.bind(() => {
        if (this.isCurrent(connection)) {
          onComplete();
        }
      }),
      this.bind((error: unknown) => this.onConnectionError(connection, error)),
    );
  }

  /**
   * Sends a frame and waits for the broker's receipt.
   */
  protected request(frame: StompFrame, onReply: (receipt: StompFrame) => void): void {
    this.assertExecuting();
    if (this.state.kind !== 'CONNECTED') {
      return;
    }
    const { connection } = this.state;
    void connection.request(frame).then(
      this.bind((receipt: StompFrame) => {
        if (this.isCurrent(connection)) {
          onReply(receipt);
        }
      }),
      this.bind((error: unknown) => this.onConnectionError(connection, error)),
    );
  }

  protected suspendInbound(): void {
    this.assertExecuting();
    if (this.state.kind === 'CONNECTED') {
      this.state.connection.suspend();
    }
  }

  protected resumeInbound(): void {
    this.assertExecuting();
    if (this.state.kind === 'CONNECTED') {
      this.state.connection.resume();
    }
  }

  // ===========================================================================
  // Queue helpers
  // ===========================================================================

  protected dispatch(task: QueueTask): void {
    DispatchQueue.execute(this.queue, task);
  }

  /**
   * Runs `task` on the queue after `delayMs` (or on the next turn of the
   * event loop when the delay is 0), but only if the state it was scheduled
   * in is still current.
   */
  protected dispatchWhileCurrent(delayMs: number, task: QueueTask): void {
    const scheduledIn = this.state;
    const guarded = (): void => {
      if (this.state === scheduledIn) {
        task();
      }
    };
    if (delayMs > 0) {
      DispatchQueue.after(this.queue, delayMs, guarded);
    } else {
      // A loop of instant completions would otherwise starve timers and I/O.
      DispatchQueue.defer(this.queue, guarded);
    }
  }

  protected assertExecuting(): void {
    DispatchQueue.assertExecuting(this.queue);
  }

  private bind<A extends unknown[]>(fn: (...args: A) => void): (...args: A) => void {
    return DispatchQueue.bind(this.queue, fn);
  }

  private isCurrent(connection: BrokerConnection): boolean {
    return this.state.kind === 'CONNECTED' && this.state.connection === connection;
  }

  private onConnectionError(connection: BrokerConnection, error: unknown): void {
    if (this.isCurrent(connection)) {
      this.onFailure(toError(error));
    }
  }
}
