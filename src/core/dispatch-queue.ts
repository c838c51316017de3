/**
 * DispatchQueue - a serialized execution context built on GenServer.
 *
 * Each load client owns one queue. Tasks cast to the queue run one at a
 * time, in order, on the queue's GenServer mailbox; timers fire back into
 * the same mailbox. Code that mutates client state asserts it is running
 * on the owning queue.
 *
 * @example
 * ```typescript
 * const queue = await DispatchQueue.start('producer 0');
 * DispatchQueue.execute(queue, () => {
 *   DispatchQueue.assertExecuting(queue);
 * });
 * DispatchQueue.after(queue, 250, () => console.log('later'));
 * await DispatchQueue.stop(queue);
 * ```
 */

import { GenServer } from './gen-server.js';
import type { GenServerRef, TimerRef } from './types.js';

/**
 * A unit of work run on the queue.
 */
export type QueueTask = () => void;

interface QueueState {
  readonly executed: number;
}

type QueueCastMsg = { readonly type: 'run'; readonly task: QueueTask };

type QueueCallMsg = { readonly type: 'drain' };

/**
 * A reference to a running DispatchQueue.
 */
export type DispatchQueueRef = GenServerRef<QueueState, QueueCallMsg, QueueCastMsg, number>;

/**
 * Error thrown when queue-owned code runs outside of its queue.
 */
export class NotExecutingError extends Error {
  override readonly name = 'NotExecutingError' as const;

  constructor(readonly label: string) {
    super(`Not executing on dispatch queue '${label}'`);
  }
}

export const DispatchQueue = {
  /**
   * Starts a new queue.
   *
   * @param label - Name reported in errors and lifecycle events
   */
  async start(label: string): Promise<DispatchQueueRef> {
    return GenServer.start<QueueState, QueueCallMsg, QueueCastMsg, number>(
      {
        init: () => ({ executed: 0 }),
        handleCall(_msg, state) {
          return [state.executed, state];
        },
        handleCast(msg, state) {
          msg.task();
          return { executed: state.executed + 1 };
        },
      },
      { name: label },
    );
  },

  /**
   * Enqueues a task. Throws if the queue has been stopped.
   */
  execute(ref: DispatchQueueRef, task: QueueTask): void {
    GenServer.cast(ref, { type: 'run', task });
  },

  /**
   * Enqueues a task after `delayMs`. The task is dropped if the queue is
   * stopped before the timer fires.
   */
  after(ref: DispatchQueueRef, delayMs: number, task: QueueTask): TimerRef {
    return GenServer.sendAfter(ref, { type: 'run', task }, delayMs);
  },

  /**
   * Enqueues a task on a later turn of the event loop, once pending I/O
   * callbacks and due timers have run. Dropped if the queue is stopped by
   * then.
   */
  defer(ref: DispatchQueueRef, task: QueueTask): void {
    setImmediate(() => {
      if (GenServer.isRunning(ref)) {
        GenServer.cast(ref, { type: 'run', task });
      }
    });
  },

  cancel(timerRef: TimerRef): boolean {
    return GenServer.cancelTimer(timerRef);
  },

  /**
   * Wraps a callback so that every invocation is enqueued on the queue
   * instead of running on the caller's stack. Invocations after the queue
   * stopped are dropped.
   */
  bind<A extends unknown[]>(ref: DispatchQueueRef, fn: (...args: A) => void): (...args: A) => void {
    return (...args: A) => {
      if (GenServer.isRunning(ref)) {
        GenServer.cast(ref, { type: 'run', task: () => fn(...args) });
      }
    };
  },

  isExecuting(ref: DispatchQueueRef): boolean {
    return GenServer.isExecuting(ref);
  },

  /**
   * @throws {NotExecutingError} If the caller is not a task of this queue
   */
  assertExecuting(ref: DispatchQueueRef): void {
    if (!GenServer.isExecuting(ref)) {
      throw new NotExecutingError(GenServer.getStats(ref)?.name ?? ref.id);
    }
  },

  /**
   * Resolves once every task enqueued before this call has run.
   *
   * @returns Number of tasks the queue has executed so far
   */
  async drain(ref: DispatchQueueRef): Promise<number> {
    return GenServer.call(ref, { type: 'drain' });
  },

  isRunning(ref: DispatchQueueRef): boolean {
    return GenServer.isRunning(ref);
  },

  /**
   * Calls `handler` once the queue has terminated, whether stopped or
   * crashed.
   *
   * @returns A function to unregister the handler
   */
  onTerminated(ref: DispatchQueueRef, handler: () => void): () => void {
    return GenServer.onLifecycleEvent((event) => {
      if (event.type === 'terminated' && event.ref.id === ref.id) {
        handler();
      }
    });
  },

  async stop(ref: DispatchQueueRef): Promise<void> {
    await GenServer.stop(ref);
  },
} as const;
