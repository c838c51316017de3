/**
 * stomp-loadgen - load generation harness for STOMP message brokers.
 *
 * This module provides the public API of the library; the CLI lives in
 * `bin/stomp-loadgen`.
 */

export const VERSION = '0.1.0' as const;

// Core runtime
export type {
  GenServerRef,
  TimerRef,
  TerminateReason,
  CallResult,
  StartOptions,
  CallOptions,
  GenServerBehavior,
  LifecycleEvent,
  LifecycleHandler,
  ServerStatus,
  GenServerStats,
} from './core/types.js';
export { CallTimeoutError, ServerNotRunningError, InitializationError } from './core/types.js';
export { GenServer } from './core/gen-server.js';
export {
  DispatchQueue,
  NotExecutingError,
  type DispatchQueueRef,
  type QueueTask,
} from './core/dispatch-queue.js';
export { Latch } from './core/latch.js';

// STOMP
export * from './stomp/index.js';

// Load clients and scenarios
export * from './load/index.js';
