/**
 * In-process stand-ins for the broker transport, plus runtime helpers shared
 * by the load tests.
 */

import { vi, type Mock } from 'vitest';
import {
  GenServer,
  DoneSignal,
  SharedCounters,
  StompFrame,
  resolveConfig,
  type BrokerConnection,
  type BrokerTransport,
  type ClientEnvironment,
  type ConnectOptions,
  type ScenarioLogger,
  type ScenarioOptions,
} from '../../src/index.js';

interface PendingWrite {
  readonly frame: StompFrame;
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
}

export class FakeConnection implements BrokerConnection {
  /** Frames passed to send() and request(), in order */
  readonly written: StompFrame[] = [];
  /** suspend/resume/close calls, in order */
  readonly flowEvents: Array<'suspend' | 'resume' | 'close'> = [];
  closed = false;

  private readonly pending: PendingWrite[] = [];
  private onFrame: ((frame: StompFrame) => void) | undefined;
  private onError: ((error: Error) => void) | undefined;

  constructor(private readonly holdWrites: boolean) {}

  get pendingWrites(): number {
    return this.pending.length;
  }

  send(frame: StompFrame): Promise<void> {
    this.written.push(frame);
    if (!this.holdWrites) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ frame, resolve, reject });
    });
  }

  async request(frame: StompFrame): Promise<StompFrame> {
    await this.send(frame);
    return new StompFrame('RECEIPT', [['receipt-id', frame.getHeader('receipt') ?? '']]);
  }

  receive(onFrame: (frame: StompFrame) => void, onError: (error: Error) => void): void {
    this.onFrame = onFrame;
    this.onError = onError;
  }

  suspend(): void {
    this.flowEvents.push('suspend');
  }

  resume(): void {
    this.flowEvents.push('resume');
  }

  close(): Promise<void> {
    this.flowEvents.push('close');
    this.closed = true;
    return Promise.resolve();
  }

  /** Completes the oldest held write. */
  completeWrite(): StompFrame {
    const write = this.pending.shift();
    if (write === undefined) {
      throw new Error('no pending write');
    }
    write.resolve();
    return write.frame;
  }

  /** Fails the oldest held write. */
  failWrite(error: Error): void {
    const write = this.pending.shift();
    if (write === undefined) {
      throw new Error('no pending write');
    }
    write.reject(error);
  }

  /** Delivers an inbound frame to the registered handler. */
  deliver(frame: StompFrame): void {
    this.onFrame?.(frame);
  }

  /** Reports a connection failure to the registered handler. */
  fail(error: Error): void {
    this.onError?.(error);
  }
}

interface PendingConnect {
  readonly resolve: (connection: FakeConnection) => void;
  readonly reject: (error: Error) => void;
}

export interface FakeTransportOptions {
  /** Writes stay pending until completeWrite() */
  readonly holdWrites?: boolean;
  /** Connect attempts stay pending until completeConnect() */
  readonly holdConnects?: boolean;
}

export class FakeTransport implements BrokerTransport {
  readonly attempts: ConnectOptions[] = [];
  readonly connections: FakeConnection[] = [];

  private readonly failures: Error[] = [];
  private readonly pendingConnects: PendingConnect[] = [];

  constructor(private readonly options: FakeTransportOptions = {}) {}

  /** Makes the next connect attempt fail with `error`. */
  failNextConnect(error: Error): void {
    this.failures.push(error);
  }

  /** Number of connections not closed yet. */
  get liveConnections(): number {
    return this.connections.filter((c) => !c.closed).length;
  }

  get lastConnection(): FakeConnection {
    const last = this.connections[this.connections.length - 1];
    if (last === undefined) {
      throw new Error('no connection opened yet');
    }
    return last;
  }

  connect(options: ConnectOptions): Promise<FakeConnection> {
    this.attempts.push(options);
    const failure = this.failures.shift();
    if (failure !== undefined) {
      return Promise.reject(failure);
    }
    if (this.options.holdConnects === true) {
      return new Promise((resolve, reject) => {
        this.pendingConnects.push({ resolve, reject });
      });
    }
    return Promise.resolve(this.open());
  }

  /** Completes the oldest held connect attempt. */
  completeConnect(): FakeConnection {
    const pending = this.pendingConnects.shift();
    if (pending === undefined) {
      throw new Error('no pending connect');
    }
    const connection = this.open();
    pending.resolve(connection);
    return connection;
  }

  private open(): FakeConnection {
    const connection = new FakeConnection(this.options.holdWrites === true);
    this.connections.push(connection);
    return connection;
  }
}

export interface MockLogger extends ScenarioLogger {
  readonly info: Mock;
  readonly error: Mock;
}

export function silentLogger(): MockLogger {
  return { info: vi.fn(), error: vi.fn() };
}

export function createEnvironment(
  transport: BrokerTransport,
  options: ScenarioOptions = {},
): ClientEnvironment & { readonly logger: MockLogger } {
  return {
    config: resolveConfig(options),
    transport,
    counters: new SharedCounters(),
    done: new DoneSignal(),
    logger: silentLogger(),
  };
}

export function message(id: string, subscription?: string): StompFrame {
  const headers: Array<[string, string]> = [
    ['destination', '/queue/load-0'],
    ['message-id', id],
  ];
  if (subscription !== undefined) {
    headers.push(['subscription', subscription]);
  }
  return new StompFrame('MESSAGE', headers, Buffer.from('payload'));
}

/**
 * Lets queued tasks, promise continuations and deferred tasks run. Load
 * tests fake only setTimeout and Date, so the real setImmediate still runs;
 * several turns cover tasks deferred from within deferred tasks.
 */
export async function settle(turns = 10): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

export function useClientTimers(): void {
  vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
}

export async function resetRuntime(): Promise<void> {
  GenServer._clearTimers();
  for (const id of GenServer._getAllServerIds()) {
    const ref = GenServer._getRefById(id);
    if (ref) {
      await GenServer.stop(ref);
    }
  }
  GenServer._clearLifecycleHandlers();
  vi.useRealTimers();
}
