/**
 * Tests for the LoadClient connection state machine.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  DispatchQueue,
  GenServer,
  InvalidStateError,
  LoadClient,
  NotExecutingError,
  RECONNECT_BACKOFF_MS,
  ShutdownNotRequestedError,
  type ClientEnvironment,
  type LifecycleEvent,
} from '../../src/index.js';
import { FakeTransport, createEnvironment, resetRuntime, settle, useClientTimers } from './support.js';

/**
 * Minimal client whose reconnect action just connects.
 */
class TestClient extends LoadClient {
  readonly reconnects = vi.fn();
  readonly completions = vi.fn();

  static async create(env: ClientEnvironment): Promise<TestClient> {
    const queue = await DispatchQueue.start('test 0');
    return new TestClient(0, 'test 0', env, queue);
  }

  /** Runs `task` as a task of the client's queue. */
  run(task: () => void): void {
    this.dispatch(task);
  }

  protected reconnectAction(): void {
    this.reconnects();
    this.connect(() => this.completions());
  }
}

describe('LoadClient', () => {
  let transport: FakeTransport;
  let env: ReturnType<typeof createEnvironment>;

  beforeEach(() => {
    useClientTimers();
    GenServer._clearLifecycleHandlers();
    transport = new FakeTransport();
    env = createEnvironment(transport);
  });

  afterEach(async () => {
    await resetRuntime();
  });

  describe('start()', () => {
    it('connects to the configured broker and resumes inbound delivery', async () => {
      const client = await TestClient.create(env);
      expect(client.currentState.kind).toBe('INIT');

      client.start();
      await settle();

      expect(client.currentState.kind).toBe('CONNECTED');
      expect(transport.attempts).toEqual([{ host: '127.0.0.1', port: 61613, login: undefined, passcode: undefined }]);
      expect(client.reconnects).toHaveBeenCalledTimes(1);
      expect(client.completions).toHaveBeenCalledTimes(1);
      expect(transport.lastConnection.flowEvents).toEqual(['resume']);
      expect(client.reconnectDelay).toBe(0);
    });

    it('passes credentials from the configuration', async () => {
      env = createEnvironment(transport, { login: 'guest', passcode: 'test-secret' });
      const client = await TestClient.create(env);

      client.start();
      await settle();

      expect(transport.attempts[0]).toEqual({
        host: '127.0.0.1',
        port: 61613,
        login: 'guest',
        passcode: 'test-secret',
      });
    });

    it('crashes the client queue when started twice', async () => {
      const events: LifecycleEvent[] = [];
      GenServer.onLifecycleEvent((e) => events.push(e));
      const client = await TestClient.create(env);

      client.start();
      client.start();
      await settle();

      const crash = events.find((e) => e.type === 'crashed');
      expect(crash?.type === 'crashed' && crash.error).toBeInstanceOf(InvalidStateError);
      expect(crash?.type === 'crashed' && crash.error.message).toBe("Client 'test 0' cannot start while DISCONNECTED");
    });
  });

  describe('queue ownership', () => {
    it('rejects state changes from outside the client queue', async () => {
      const client = await TestClient.create(env);

      expect(() => client.close()).toThrow(NotExecutingError);
      expect(() => client.open('localhost', 61613, () => undefined)).toThrow(NotExecutingError);
    });
  });

  describe('failures and reconnect', () => {
    it('counts a connection failure and reconnects after the backoff', async () => {
      const client = await TestClient.create(env);
      client.start();
      await settle();
      const first = transport.lastConnection;

      first.fail(new Error('connection reset'));
      await settle();

      expect(env.counters.snapshot().errors).toBe(1);
      expect(first.closed).toBe(true);
      expect(client.reconnectDelay).toBe(RECONNECT_BACKOFF_MS);
      expect(client.currentState.kind).toBe('CONNECTING');
      expect(transport.attempts).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(RECONNECT_BACKOFF_MS - 1);
      await settle();
      expect(transport.attempts).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      await settle();
      expect(transport.attempts).toHaveLength(2);
      expect(client.currentState.kind).toBe('CONNECTED');
      expect(transport.liveConnections).toBe(1);
    });

    it('keeps the backoff for every later cycle', async () => {
      const client = await TestClient.create(env);
      transport.failNextConnect(new Error('refused'));
      client.start();
      await settle();
      await vi.advanceTimersByTimeAsync(RECONNECT_BACKOFF_MS);
      await settle();
      expect(client.currentState.kind).toBe('CONNECTED');

      client.run(() => client.close());
      await settle();

      expect(client.currentState.kind).toBe('CONNECTING');
      expect(client.reconnectDelay).toBe(RECONNECT_BACKOFF_MS);
      expect(transport.attempts).toHaveLength(2);

      await vi.advanceTimersByTimeAsync(RECONNECT_BACKOFF_MS);
      await settle();
      expect(transport.attempts).toHaveLength(3);
    });

    it('logs failures only when displayErrors is set', async () => {
      const quiet = await TestClient.create(env);
      transport.failNextConnect(new Error('refused'));
      quiet.start();
      await settle();
      expect(env.logger.error).not.toHaveBeenCalled();

      const loudEnv = createEnvironment(transport, { displayErrors: true });
      const loud = await TestClient.create(loudEnv);
      const error = new Error('refused again');
      transport.failNextConnect(error);
      loud.start();
      await settle();

      expect(loudEnv.logger.error).toHaveBeenCalledWith('test 0: refused again', error);
    });

    it('abandons a delayed attempt when closed during the wait', async () => {
      const client = await TestClient.create(env);
      transport.failNextConnect(new Error('refused'));
      client.start();
      await settle();
      expect(client.currentState.kind).toBe('CONNECTING');

      client.run(() => client.close());
      await settle();
      // The close re-entered DISCONNECTED, whose reconnect action scheduled
      // a fresh attempt; only that one may reach the transport.
      expect(client.reconnects).toHaveBeenCalledTimes(3);

      await vi.advanceTimersByTimeAsync(RECONNECT_BACKOFF_MS);
      await settle();

      expect(transport.attempts).toHaveLength(2);
      expect(transport.connections).toHaveLength(1);
    });

    it('ignores failures reported by a connection it no longer owns', async () => {
      const client = await TestClient.create(env);
      client.start();
      await settle();
      const stale = transport.lastConnection;

      client.run(() => client.close());
      await settle();
      expect(transport.connections).toHaveLength(2);

      stale.fail(new Error('late failure'));
      await settle();

      expect(env.counters.snapshot().errors).toBe(0);
      expect(client.currentState.kind).toBe('CONNECTED');
      expect(transport.liveConnections).toBe(1);
    });

    it('closes a connection that arrives after its attempt was abandoned', async () => {
      transport = new FakeTransport({ holdConnects: true });
      env = createEnvironment(transport);
      const client = await TestClient.create(env);
      client.start();
      await settle();

      env.done.set();
      client.run(() => client.close());
      await settle();
      expect(client.isShutdown).toBe(true);

      const late = transport.completeConnect();
      await settle();

      expect(late.closed).toBe(true);
      expect(client.currentState.kind).toBe('DISCONNECTED');
    });

    it('closes a connection that arrives after the client was disposed', async () => {
      transport = new FakeTransport({ holdConnects: true });
      env = createEnvironment(transport);
      const client = await TestClient.create(env);
      client.start();
      await settle();

      env.done.set();
      await Promise.all([client.shutdown(), settle()]);
      await client.dispose();
      const late = transport.completeConnect();
      await settle();

      expect(late.closed).toBe(true);
    });
  });

  describe('shutdown()', () => {
    it('requires the done signal', async () => {
      const client = await TestClient.create(env);

      expect(() => client.shutdown()).toThrow(ShutdownNotRequestedError);
    });

    it('closes a connected client and does not reconnect', async () => {
      const client = await TestClient.create(env);
      client.start();
      await settle();
      const connection = transport.lastConnection;

      env.done.set();
      const finished = client.shutdown();
      await settle();

      await expect(finished).resolves.toBeUndefined();
      expect(client.currentState.kind).toBe('DISCONNECTED');
      expect(connection.closed).toBe(true);
      expect(client.reconnects).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(10 * RECONNECT_BACKOFF_MS);
      await settle();
      expect(transport.attempts).toHaveLength(1);
    });

    it('completes at once for a client that never started', async () => {
      const client = await TestClient.create(env);
      env.done.set();

      const finished = client.shutdown();
      await settle();

      await expect(finished).resolves.toBeUndefined();
      expect(client.currentState.kind).toBe('INIT');
      expect(transport.attempts).toHaveLength(0);
    });

    it('completes for a client whose queue crashed', async () => {
      const client = await TestClient.create(env);
      client.start();
      client.start();
      await settle();

      env.done.set();

      await expect(client.shutdown()).resolves.toBeUndefined();
    });

    it('completes when the queue crashes while the close is in flight', async () => {
      const client = await TestClient.create(env);
      client.start();
      await settle();

      env.done.set();
      const finished = client.shutdown();
      client.run(() => {
        throw new Error('boom');
      });
      await settle();

      await expect(finished).resolves.toBeUndefined();
      expect(GenServer._getAllServerIds()).not.toContain(client.queueId);
      expect(client.currentState.kind).toBe('CLOSING');
    });
  });
});
