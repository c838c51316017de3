/**
 * Tests for the producer loop and its message frame.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  GenServer,
  ProducerClient,
  RECONNECT_BACKOFF_MS,
  buildMessageBody,
  buildMessageFrame,
  resolveConfig,
} from '../../src/index.js';
import { FakeTransport, createEnvironment, resetRuntime, settle, useClientTimers } from './support.js';

describe('buildMessageBody', () => {
  it('pads the greeting with letters chosen by byte position', () => {
    expect(buildMessageBody('p', 20).toString('ascii')).toBe('Message from p\npqrst');
  });

  it('truncates to the requested size', () => {
    expect(buildMessageBody('producer 0', 5).toString('ascii')).toBe('Messa');
    expect(buildMessageBody('producer 0', 0)).toHaveLength(0);
  });

  it('wraps the padding after z', () => {
    const body = buildMessageBody('x', 60);

    expect(body).toHaveLength(60);
    expect(body.subarray(25, 28).toString('ascii')).toBe('zab');
  });
});

describe('buildMessageFrame', () => {
  it('addresses the destination chosen by id', () => {
    const config = resolveConfig({ destinationCount: 2, messageSize: 32 });
    const frame = buildMessageFrame(config, 3, 'producer 3');

    expect(frame.command).toBe('SEND');
    expect(frame.headers).toEqual([['destination', '/queue/load-1']]);
    expect(frame.body).toHaveLength(32);
  });

  it('adds persistence, receipt and per-producer headers in order', () => {
    const config = resolveConfig({
      destinationType: 'topic',
      persistent: true,
      persistentHeader: 'JMSDeliveryMode:persistent',
      syncSend: true,
      headers: [['a:1'], ['b:2', 'c:3']],
    });
    const frame = buildMessageFrame(config, 1, 'producer 1');

    expect(frame.headers).toEqual([
      ['destination', '/topic/load-0'],
      ['JMSDeliveryMode', 'persistent'],
      ['receipt', 'producer-1-send'],
      ['b', '2'],
      ['c', '3'],
    ]);
  });
});

describe('ProducerClient', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    useClientTimers();
    GenServer._clearLifecycleHandlers();
    transport = new FakeTransport({ holdWrites: true });
  });

  afterEach(async () => {
    await resetRuntime();
  });

  it('sends the message frame and counts each completed send', async () => {
    const env = createEnvironment(transport);
    const producer = await ProducerClient.create(0, env);
    producer.start();
    await settle();
    const connection = transport.lastConnection;

    expect(connection.written).toEqual([producer.messageFrame]);
    expect(env.counters.snapshot().produced).toBe(0);

    connection.completeWrite();
    await settle();

    expect(env.counters.snapshot().produced).toBe(1);
    expect(connection.pendingWrites).toBe(1);
    expect(producer.messagesThisCycle).toBe(1);
  });

  it('reconnects after messagesPerConnection sends', async () => {
    const env = createEnvironment(transport, { messagesPerConnection: 3 });
    const producer = await ProducerClient.create(0, env);
    producer.start();
    await settle();
    const first = transport.lastConnection;

    for (let i = 0; i < 3; i++) {
      first.completeWrite();
      await settle();
    }

    expect(first.written).toHaveLength(3);
    expect(first.closed).toBe(true);
    expect(transport.connections).toHaveLength(2);
    expect(producer.messagesThisCycle).toBe(0);
    expect(producer.reconnectDelay).toBe(0);

    const second = transport.lastConnection;
    expect(second.written).toHaveLength(1);
    second.completeWrite();
    await settle();

    expect(env.counters.snapshot().produced).toBe(4);
    expect(producer.messagesThisCycle).toBe(1);
    expect(transport.liveConnections).toBe(1);
  });

  it('waits producerSleep between sends, ignoring its sign', async () => {
    const env = createEnvironment(transport, { producerSleep: -50 });
    const producer = await ProducerClient.create(0, env);
    producer.start();
    await settle();
    const connection = transport.lastConnection;

    connection.completeWrite();
    await settle();
    expect(connection.written).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(49);
    await settle();
    expect(connection.written).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    await settle();
    expect(connection.written).toHaveLength(2);
  });

  it('uses receipts when syncSend is set', async () => {
    const env = createEnvironment(transport, { syncSend: true });
    const producer = await ProducerClient.create(0, env);
    producer.start();
    await settle();
    const connection = transport.lastConnection;

    expect(connection.written[0]?.getHeader('receipt')).toBe('producer-0-send');
    connection.completeWrite();
    await settle();

    expect(env.counters.snapshot().produced).toBe(1);
  });

  it('treats a failed send as a connection failure', async () => {
    const env = createEnvironment(transport);
    const producer = await ProducerClient.create(0, env);
    producer.start();
    await settle();
    const connection = transport.lastConnection;

    connection.failWrite(new Error('broken pipe'));
    await settle();

    expect(env.counters.snapshot()).toMatchObject({ produced: 0, errors: 1 });
    expect(connection.closed).toBe(true);
    expect(producer.reconnectDelay).toBe(RECONNECT_BACKOFF_MS);

    await vi.advanceTimersByTimeAsync(RECONNECT_BACKOFF_MS);
    await settle();
    expect(transport.lastConnection).not.toBe(connection);
    expect(transport.lastConnection.written).toHaveLength(1);
  });

  it('closes after the in-flight send once done is set', async () => {
    const env = createEnvironment(transport);
    const producer = await ProducerClient.create(0, env);
    producer.start();
    await settle();
    const connection = transport.lastConnection;

    env.done.set();
    connection.completeWrite();
    await settle();

    expect(env.counters.snapshot().produced).toBe(1);
    expect(connection.closed).toBe(true);
    expect(producer.currentState.kind).toBe('DISCONNECTED');
    expect(producer.isShutdown).toBe(true);
    await expect(producer.shutdown()).resolves.toBeUndefined();
    expect(transport.connections).toHaveLength(1);
  });
});
