/**
 * Consumer client: subscribes to its destination and counts what arrives.
 */

import { DispatchQueue, type DispatchQueueRef } from '../core/dispatch-queue.js';
import { StompFrame, type StompHeader } from '../stomp/frame.js';
import { LoadClient, type ClientEnvironment } from './client.js';
import { destinationFor, type ScenarioConfig } from './config.js';

export function consumerName(id: number): string {
  return `consumer ${id}`;
}

export function buildSubscribeFrame(config: ScenarioConfig, id: number): StompFrame {
  const headers: StompHeader[] = [
    ['id', `${config.consumerPrefix}${id}`],
    ['ack', config.ack],
    ['destination', destinationFor(config, id)],
  ];
  if (config.durable) {
    headers.push(['persistent', 'true']);
  }
  if (config.selector !== undefined) {
    headers.push(['selector', config.selector]);
  }
  return new StompFrame('SUBSCRIBE', headers);
}

/**
 * Acknowledges a MESSAGE frame, or returns undefined if it has no message-id.
 */
export function buildAckFrame(message: StompFrame): StompFrame | undefined {
  const messageId = message.getHeader('message-id');
  if (messageId === undefined) {
    return undefined;
  }
  const headers: StompHeader[] = [['message-id', messageId]];
  const subscription = message.getHeader('subscription');
  if (subscription !== undefined) {
    headers.push(['subscription', subscription]);
  }
  // STOMP 1.2 acknowledges by the message's ack header.
  const ackId = message.getHeader('ack');
  if (ackId !== undefined) {
    headers.push(['id', ackId]);
  }
  return new StompFrame('ACK', headers);
}

export class ConsumerClient extends LoadClient {
  private readonly clientAck: boolean;

  private constructor(id: number, env: ClientEnvironment, queue: DispatchQueueRef) {
    super(id, consumerName(id), env, queue);
    this.clientAck = env.config.ack === 'client';
  }

  static async create(id: number, env: ClientEnvironment): Promise<ConsumerClient> {
    const queue = await DispatchQueue.start(consumerName(id));
    return new ConsumerClient(id, env, queue);
  }

  protected reconnectAction(): void {
    this.connect(() => {
      this.messageCounter = 0;
      this.send(buildSubscribeFrame(this.env.config, this.id), () => undefined);
    });
  }

  protected override onReceive(frame: StompFrame): void {
    const sleep = Math.abs(this.env.config.consumerSleep);
    if (sleep === 0) {
      this.process(frame);
      return;
    }
    if (!this.clientAck) {
      this.suspendInbound();
    }
    this.dispatchWhileCurrent(sleep, () => {
      if (!this.clientAck) {
        this.resumeInbound();
      }
      this.process(frame);
    });
  }

  private process(frame: StompFrame): void {
    this.messageCounter++;
    if (!this.clientAck) {
      this.env.counters.incrementConsumed();
      return;
    }
    const ack = buildAckFrame(frame);
    if (ack === undefined) {
      this.onFailure(new Error(`${frame.command} frame without message-id`));
      return;
    }
    this.send(ack, () => this.env.counters.incrementConsumed());
  }
}
