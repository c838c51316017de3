/**
 * Core type definitions for the GenServer runtime.
 *
 * Every load client owns one GenServer process; the process mailbox is the
 * client's serialized execution context.
 */

/**
 * Opaque branded type for GenServer references.
 * Prevents accidental mixing of unrelated references.
 */
declare const RefBrand: unique symbol;

/**
 * A reference to a running GenServer instance.
 * This is the primary handle used to interact with a GenServer.
 */
export interface GenServerRef<
  State = unknown,
  CallMsg = unknown,
  CastMsg = unknown,
  CallReply = unknown,
> {
  readonly [RefBrand]: 'GenServerRef';
  readonly id: string;
  readonly _phantom?: {
    readonly state: State;
    readonly callMsg: CallMsg;
    readonly castMsg: CastMsg;
    readonly callReply: CallReply;
  };
}

/**
 * Reason for GenServer termination.
 *
 * - 'normal': Graceful shutdown initiated by stop()
 * - 'shutdown': Owner-initiated shutdown
 * - { error: Error }: Crash due to an exception thrown by a handler
 */
export type TerminateReason = 'normal' | 'shutdown' | { readonly error: Error };

/**
 * Result of a call handler.
 * Returns both the reply to send back and the new state.
 */
export type CallResult<Reply, State> = readonly [Reply, State];

/**
 * Options for GenServer.start()
 */
export interface StartOptions {
  /**
   * Human-readable label, reported in stats and lifecycle events.
   */
  readonly name?: string;

  /**
   * Timeout in milliseconds for the init() call.
   * @default 5000
   */
  readonly initTimeout?: number;
}

/**
 * Options for GenServer.call()
 */
export interface CallOptions {
  /**
   * Timeout in milliseconds for the call to complete.
   * @default 5000
   */
  readonly timeout?: number;
}

/**
 * The behavior interface that GenServer implementations must satisfy.
 *
 * @typeParam State - The type of the server's internal state
 * @typeParam CallMsg - Union type of all synchronous call messages
 * @typeParam CastMsg - Union type of all asynchronous cast messages
 * @typeParam CallReply - Union type of all possible call replies
 */
export interface GenServerBehavior<State, CallMsg, CastMsg, CallReply> {
  /**
   * Initialize the server state.
   * Called once when the server starts.
   *
   * @throws If init fails, the server will not start
   */
  init(): State | Promise<State>;

  /**
   * Handle a synchronous call message.
   * The caller will wait for the reply.
   */
  handleCall(
    msg: CallMsg,
    state: State,
  ): CallResult<CallReply, State> | Promise<CallResult<CallReply, State>>;

  /**
   * Handle an asynchronous cast message.
   *
   * A cast handler that throws crashes the server: it is terminated with
   * `{ error }` and a `crashed` lifecycle event is emitted.
   */
  handleCast(msg: CastMsg, state: State): State | Promise<State>;

  /**
   * Called when the server is about to terminate.
   */
  terminate?(reason: TerminateReason, state: State): void | Promise<void>;
}

/**
 * Handle for a timer created by GenServer.sendAfter().
 */
export interface TimerRef {
  readonly timerId: string;
  readonly serverId: string;
}

/**
 * Lifecycle event types emitted by GenServers.
 */
export type LifecycleEvent =
  | { readonly type: 'started'; readonly ref: GenServerRef; readonly name: string | undefined }
  | { readonly type: 'crashed'; readonly ref: GenServerRef; readonly name: string | undefined; readonly error: Error }
  | { readonly type: 'terminated'; readonly ref: GenServerRef; readonly name: string | undefined; readonly reason: TerminateReason };

/**
 * Handler for lifecycle events.
 */
export type LifecycleHandler = (event: LifecycleEvent) => void;

/**
 * Error thrown when a call times out.
 */
export class CallTimeoutError extends Error {
  override readonly name = 'CallTimeoutError' as const;

  constructor(
    readonly serverId: string,
    readonly timeoutMs: number,
  ) {
    super(`Call to GenServer '${serverId}' timed out after ${timeoutMs}ms`);
  }
}

/**
 * Error thrown when trying to call/cast to a stopped server.
 */
export class ServerNotRunningError extends Error {
  override readonly name = 'ServerNotRunningError' as const;

  constructor(readonly serverId: string) {
    super(`GenServer '${serverId}' is not running`);
  }
}

/**
 * Error thrown when a server's init() fails.
 */
export class InitializationError extends Error {
  override readonly name = 'InitializationError' as const;
  override readonly cause: Error;

  constructor(
    readonly serverId: string,
    cause: Error,
  ) {
    super(`GenServer '${serverId}' failed to initialize: ${cause.message}`);
    this.cause = cause;
  }
}

/**
 * Internal state of a GenServer.
 */
export type ServerStatus = 'initializing' | 'running' | 'stopping' | 'stopped';

/**
 * Default values for various options.
 */
export const DEFAULTS = {
  INIT_TIMEOUT: 5000,
  CALL_TIMEOUT: 5000,
} as const;

/**
 * Runtime statistics for a GenServer instance.
 */
export interface GenServerStats {
  /** Unique identifier of the server */
  readonly id: string;
  /** Label given at start, if any */
  readonly name: string | undefined;
  /** Current operational status */
  readonly status: ServerStatus;
  /** Number of messages waiting in the queue */
  readonly queueSize: number;
  /** Total number of messages processed (calls + casts) */
  readonly messageCount: number;
  /** Unix timestamp when the server started */
  readonly startedAt: number;
  /** Time elapsed since start in milliseconds */
  readonly uptimeMs: number;
}
