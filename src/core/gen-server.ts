/**
 * GenServer implementation for TypeScript.
 *
 * Provides an Elixir-style GenServer abstraction with:
 * - Serialized message processing via internal queue
 * - Synchronous call/response pattern
 * - Asynchronous fire-and-forget casts
 * - Delayed casts (sendAfter) with cancellation
 * - Crash detection for throwing cast handlers
 * - Lifecycle event emission for observability
 */

import {
  type GenServerRef,
  type GenServerBehavior,
  type TerminateReason,
  type CallResult,
  type StartOptions,
  type CallOptions,
  type ServerStatus,
  type LifecycleEvent,
  type LifecycleHandler,
  type GenServerStats,
  type TimerRef,
  CallTimeoutError,
  ServerNotRunningError,
  InitializationError,
  DEFAULTS,
} from './types.js';

/**
 * Internal message type for the processing queue.
 * Discriminated union ensures exhaustive handling.
 */
type QueuedMessage<CallMsg, CastMsg, CallReply> =
  | {
      readonly kind: 'call';
      readonly msg: CallMsg;
      readonly resolve: (reply: CallReply) => void;
      readonly reject: (error: Error) => void;
    }
  | {
      readonly kind: 'cast';
      readonly msg: CastMsg;
    }
  | {
      readonly kind: 'stop';
      readonly reason: TerminateReason;
      readonly resolve: () => void;
      readonly reject: (error: Error) => void;
    };

/**
 * Id of the server whose handler is running right now, if any.
 * Only the synchronous part of a handler counts as executing.
 */
let executingServerId: string | undefined;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Internal server instance that manages state and message processing.
 * This is the actual runtime representation of a GenServer.
 */
class ServerInstance<State, CallMsg, CastMsg, CallReply> {
  private state: State;
  private status: ServerStatus = 'initializing';
  private readonly queue: QueuedMessage<CallMsg, CastMsg, CallReply>[] = [];
  private processing = false;
  private readonly startedAt: number = Date.now();
  private messageCount = 0;

  constructor(
    readonly id: string,
    readonly name: string | undefined,
    private readonly behavior: GenServerBehavior<State, CallMsg, CastMsg, CallReply>,
    initialState: State,
    private readonly onCrash: (error: Error) => void,
  ) {
    this.state = initialState;
  }

  /**
   * Marks the server as running, enabling message processing.
   */
  markRunning(): void {
    this.status = 'running';
  }

  getStatus(): ServerStatus {
    return this.status;
  }

  getStats(): GenServerStats {
    return {
      id: this.id,
      name: this.name,
      status: this.status,
      queueSize: this.queue.length,
      messageCount: this.messageCount,
      startedAt: this.startedAt,
      uptimeMs: Date.now() - this.startedAt,
    };
  }

  /**
   * Enqueues a call message and returns a promise for the reply.
   */
  enqueueCall(msg: CallMsg, timeoutMs: number): Promise<CallReply> {
    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        // Remove the message from queue if still pending
        const idx = this.queue.findIndex(
          (m) => m.kind === 'call' && m.resolve === wrappedResolve,
        );
        if (idx !== -1) {
          this.queue.splice(idx, 1);
        }
        reject(new CallTimeoutError(this.id, timeoutMs));
      }, timeoutMs);

      const wrappedResolve = (reply: CallReply) => {
        clearTimeout(timeoutId);
        resolve(reply);
      };

      const wrappedReject = (error: Error) => {
        clearTimeout(timeoutId);
        reject(error);
      };

      this.queue.push({
        kind: 'call',
        msg,
        resolve: wrappedResolve,
        reject: wrappedReject,
      });
      this.processQueue();
    });
  }

  /**
   * Enqueues a cast message for asynchronous processing.
   */
  enqueueCast(msg: CastMsg): void {
    this.queue.push({ kind: 'cast', msg });
    this.processQueue();
  }

  /**
   * Initiates graceful shutdown.
   */
  enqueueStop(reason: TerminateReason): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.status === 'stopped') {
        resolve();
        return;
      }

      if (this.status === 'stopping') {
        const checkStopped = () => {
          if (this.status === 'stopped') {
            resolve();
          } else {
            setTimeout(checkStopped, 10);
          }
        };
        checkStopped();
        return;
      }

      this.queue.push({ kind: 'stop', reason, resolve, reject });
      this.processQueue();
    });
  }

  /**
   * Terminates the server immediately, rejecting all pending calls.
   * The terminate callback is not invoked.
   */
  forceTerminate(): void {
    this.status = 'stopped';

    for (const msg of this.queue) {
      if (msg.kind === 'call') {
        msg.reject(new ServerNotRunningError(this.id));
      } else if (msg.kind === 'stop') {
        msg.resolve();
      }
    }
    this.queue.length = 0;
  }

  /**
   * Processes messages from the queue sequentially.
   * This ensures message handling is serialized.
   */
  private processQueue(): void {
    if (this.processing || this.status === 'stopped') {
      return;
    }

    const message = this.queue.shift();
    if (!message) {
      return;
    }

    // Handlers never run on the stack of the code that enqueued them.
    this.processing = true;
    void Promise.resolve()
      .then(() => this.processMessage(message))
      .finally(() => {
        this.processing = false;
        this.processQueue();
      });
  }

  private async processMessage(
    message: QueuedMessage<CallMsg, CastMsg, CallReply>,
  ): Promise<void> {
    switch (message.kind) {
      case 'call':
        await this.handleCallMessage(message);
        break;
      case 'cast':
        await this.handleCastMessage(message);
        break;
      case 'stop':
        await this.handleStopMessage(message);
        break;
    }
  }

  private async handleCallMessage(message: {
    readonly kind: 'call';
    readonly msg: CallMsg;
    readonly resolve: (reply: CallReply) => void;
    readonly reject: (error: Error) => void;
  }): Promise<void> {
    if (this.status !== 'running') {
      message.reject(new ServerNotRunningError(this.id));
      return;
    }

    try {
      const result: CallResult<CallReply, State> = await this.runHandler(() =>
        this.behavior.handleCall(message.msg, this.state),
      );
      const [reply, newState] = result;
      this.state = newState;
      this.messageCount++;
      message.resolve(reply);
    } catch (error) {
      message.reject(toError(error));
    }
  }

  private async handleCastMessage(message: {
    readonly kind: 'cast';
    readonly msg: CastMsg;
  }): Promise<void> {
    if (this.status !== 'running') {
      return;
    }

    let newState: State;
    try {
      newState = await this.runHandler(() => this.behavior.handleCast(message.msg, this.state));
    } catch (error) {
      // There is no caller to hand the error to: the server crashes.
      this.onCrash(toError(error));
      return;
    }
    this.state = newState;
    this.messageCount++;
  }

  private async handleStopMessage(message: {
    readonly kind: 'stop';
    readonly reason: TerminateReason;
    readonly resolve: () => void;
    readonly reject: (error: Error) => void;
  }): Promise<void> {
    this.status = 'stopping';

    try {
      if (this.behavior.terminate) {
        await this.runHandler(() => this.behavior.terminate?.(message.reason, this.state));
      }
      this.status = 'stopped';
      message.resolve();
    } catch (error) {
      this.status = 'stopped';
      message.reject(toError(error));
    }
  }

  /**
   * Invokes a behavior callback with this server marked as executing
   * for the synchronous part of the callback.
   */
  private runHandler<R>(fn: () => R | Promise<R>): Promise<R> {
    const previous = executingServerId;
    executingServerId = this.id;
    try {
      return Promise.resolve(fn());
    } finally {
      executingServerId = previous;
    }
  }
}

/**
 * Registry of active server instances.
 * Maps server IDs to their runtime instances.
 */
const serverRegistry = new Map<string, ServerInstance<unknown, unknown, unknown, unknown>>();

/**
 * Global lifecycle event handlers.
 */
const lifecycleHandlers = new Set<LifecycleHandler>();

/**
 * Pending sendAfter timers by timer ID.
 */
const timers = new Map<string, { readonly handle: ReturnType<typeof setTimeout>; readonly serverId: string }>();

let serverIdCounter = 0;
let timerIdCounter = 0;

function generateServerId(): string {
  return `genserver_${++serverIdCounter}_${Date.now().toString(36)}`;
}

function generateTimerId(): string {
  return `timer_${++timerIdCounter}_${Date.now().toString(36)}`;
}

function emitLifecycleEvent(event: LifecycleEvent): void {
  for (const handler of lifecycleHandlers) {
    handler(event);
  }
}

/**
 * Creates a GenServerRef from a server ID.
 * This is an internal function - refs are opaque to consumers.
 */
function createRef<State, CallMsg, CastMsg, CallReply>(
  id: string,
): GenServerRef<State, CallMsg, CastMsg, CallReply> {
  // The ref is just a branded object with an ID.
  // The actual runtime is managed via the registry.
  return { id } as GenServerRef<State, CallMsg, CastMsg, CallReply>;
}

function getServerInstance<State, CallMsg, CastMsg, CallReply>(
  ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
): ServerInstance<State, CallMsg, CastMsg, CallReply> {
  const instance = serverRegistry.get(ref.id);
  if (!instance) {
    throw new ServerNotRunningError(ref.id);
  }
  return instance as ServerInstance<State, CallMsg, CastMsg, CallReply>;
}

function clearTimersFor(serverId: string): void {
  for (const [timerId, timer] of timers) {
    if (timer.serverId === serverId) {
      clearTimeout(timer.handle);
      timers.delete(timerId);
    }
  }
}

/**
 * GenServer provides a process-like abstraction for managing stateful services.
 *
 * @example
 * ```typescript
 * const behavior: GenServerBehavior<number, 'get', 'inc', number> = {
 *   init: () => 0,
 *   handleCall: (msg, state) => [state, state],
 *   handleCast: (msg, state) => state + 1,
 * };
 *
 * const ref = await GenServer.start(behavior);
 * GenServer.cast(ref, 'inc');
 * const value = await GenServer.call(ref, 'get'); // 1
 * await GenServer.stop(ref);
 * ```
 */
export const GenServer = {
  /**
   * Starts a new GenServer with the given behavior.
   *
   * @throws {InitializationError} If init() fails or times out
   */
  async start<State, CallMsg, CastMsg, CallReply>(
    behavior: GenServerBehavior<State, CallMsg, CastMsg, CallReply>,
    options: StartOptions = {},
  ): Promise<GenServerRef<State, CallMsg, CastMsg, CallReply>> {
    const id = generateServerId();
    const initTimeout = options.initTimeout ?? DEFAULTS.INIT_TIMEOUT;

    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new InitializationError(id, new Error(`Init timed out after ${initTimeout}ms`)));
      }, initTimeout);
    });

    let initialState: State;
    try {
      initialState = await Promise.race([
        Promise.resolve(behavior.init()),
        timeoutPromise,
      ]);
    } catch (error) {
      if (error instanceof InitializationError) {
        throw error;
      }
      throw new InitializationError(id, toError(error));
    } finally {
      clearTimeout(timeoutHandle);
    }

    const ref = createRef<State, CallMsg, CastMsg, CallReply>(id);
    const instance = new ServerInstance(id, options.name, behavior, initialState, (error) => {
      instance.forceTerminate();
      serverRegistry.delete(id);
      clearTimersFor(id);
      emitLifecycleEvent({ type: 'crashed', ref: ref as GenServerRef, name: options.name, error });
      emitLifecycleEvent({ type: 'terminated', ref: ref as GenServerRef, name: options.name, reason: { error } });
    });
    serverRegistry.set(id, instance as ServerInstance<unknown, unknown, unknown, unknown>);
    instance.markRunning();

    emitLifecycleEvent({ type: 'started', ref: ref as GenServerRef, name: options.name });

    return ref;
  },

  /**
   * Sends a synchronous message and waits for a reply.
   *
   * @throws {CallTimeoutError} If the call times out
   * @throws {ServerNotRunningError} If the server is not running
   */
  async call<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
    msg: CallMsg,
    options: CallOptions = {},
  ): Promise<CallReply> {
    const timeout = options.timeout ?? DEFAULTS.CALL_TIMEOUT;
    const instance = getServerInstance(ref);

    if (instance.getStatus() !== 'running') {
      throw new ServerNotRunningError(ref.id);
    }

    return instance.enqueueCall(msg, timeout);
  },

  /**
   * Sends an asynchronous message without waiting for a reply.
   *
   * @throws {ServerNotRunningError} If the server is not running
   */
  cast<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
    msg: CastMsg,
  ): void {
    const instance = getServerInstance(ref);

    if (instance.getStatus() !== 'running') {
      throw new ServerNotRunningError(ref.id);
    }

    instance.enqueueCast(msg);
  },

  /**
   * Casts `msg` to the server after `delayMs`.
   * The message is silently dropped if the server is gone by then.
   */
  sendAfter<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
    msg: CastMsg,
    delayMs: number,
  ): TimerRef {
    const timerId = generateTimerId();
    const handle = setTimeout(() => {
      timers.delete(timerId);
      const instance = serverRegistry.get(ref.id);
      if (instance && instance.getStatus() === 'running') {
        instance.enqueueCast(msg);
      }
    }, delayMs);

    timers.set(timerId, { handle, serverId: ref.id });
    return { timerId, serverId: ref.id };
  },

  /**
   * Cancels a pending sendAfter timer.
   *
   * @returns true if the timer was pending, false if it already fired or was cancelled
   */
  cancelTimer(timerRef: TimerRef): boolean {
    const timer = timers.get(timerRef.timerId);
    if (!timer) {
      return false;
    }
    clearTimeout(timer.handle);
    timers.delete(timerRef.timerId);
    return true;
  },

  /**
   * Gracefully stops the server. Pending timers of the server are cancelled.
   */
  async stop<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
    reason: TerminateReason = 'normal',
  ): Promise<void> {
    const instance = serverRegistry.get(ref.id);
    if (!instance) {
      return;
    }

    try {
      await instance.enqueueStop(reason);
    } finally {
      serverRegistry.delete(ref.id);
      clearTimersFor(ref.id);
      emitLifecycleEvent({ type: 'terminated', ref: ref as GenServerRef, name: instance.name, reason });
    }
  },

  isRunning<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
  ): boolean {
    const instance = serverRegistry.get(ref.id);
    return instance !== undefined && instance.getStatus() === 'running';
  },

  /**
   * Returns true while a handler of the given server is running.
   */
  isExecuting<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
  ): boolean {
    return executingServerId === ref.id;
  },

  /**
   * Registers a lifecycle event handler.
   *
   * @returns A function to unregister the handler
   */
  onLifecycleEvent(handler: LifecycleHandler): () => void {
    lifecycleHandlers.add(handler);
    return () => {
      lifecycleHandlers.delete(handler);
    };
  },

  getStats<State, CallMsg, CastMsg, CallReply>(
    ref: GenServerRef<State, CallMsg, CastMsg, CallReply>,
  ): GenServerStats | undefined {
    return serverRegistry.get(ref.id)?.getStats();
  },

  /**
   * @internal
   */
  _clearLifecycleHandlers(): void {
    lifecycleHandlers.clear();
  },

  /**
   * @internal
   */
  _resetIdCounter(): void {
    serverIdCounter = 0;
    timerIdCounter = 0;
  },

  /**
   * Cancels every pending sendAfter timer.
   *
   * @internal
   */
  _clearTimers(): void {
    for (const timer of timers.values()) {
      clearTimeout(timer.handle);
    }
    timers.clear();
  },

  /**
   * @internal
   */
  _getAllServerIds(): readonly string[] {
    return Array.from(serverRegistry.keys());
  },

  /**
   * @internal
   */
  _getRefById(id: string): GenServerRef | undefined {
    if (!serverRegistry.has(id)) {
      return undefined;
    }
    return createRef(id);
  },
} as const;
