/**
 * Producer client: sends one prebuilt SEND frame in a loop.
 */

import { DispatchQueue, type DispatchQueueRef } from '../core/dispatch-queue.js';
import { StompFrame, parseHeader, type StompHeader } from '../stomp/frame.js';
import { LoadClient, type ClientEnvironment } from './client.js';
import { destinationFor, headersFor, type ScenarioConfig } from './config.js';

const FIRST_FILL_CHAR = 'a'.charCodeAt(0);

export function producerName(id: number): string {
  return `producer ${id}`;
}

/**
 * Builds a body of exactly `size` bytes: a `Message from <name>` line,
 * padded with `a`..`z` by byte position.
 */
export function buildMessageBody(name: string, size: number): Buffer {
  const body = Buffer.alloc(size);
  const written = body.write(`Message from ${name}\n`, 'ascii');
  for (let i = written; i < size; i++) {
    body[i] = FIRST_FILL_CHAR + (i % 26);
  }
  return body;
}

/**
 * The SEND frame a producer repeats for its whole life.
 */
export function buildMessageFrame(config: ScenarioConfig, id: number, name: string): StompFrame {
  const headers: StompHeader[] = [['destination', destinationFor(config, id)]];
  if (config.persistent) {
    headers.push(parseHeader(config.persistentHeader));
  }
  if (config.syncSend) {
    headers.push(['receipt', `${name.replace(' ', '-')}-send`]);
  }
  headers.push(...headersFor(config, id));
  return new StompFrame('SEND', headers, buildMessageBody(name, config.messageSize));
}

export class ProducerClient extends LoadClient {
  readonly messageFrame: StompFrame;

  private constructor(id: number, env: ClientEnvironment, queue: DispatchQueueRef) {
    super(id, producerName(id), env, queue);
    this.messageFrame = buildMessageFrame(env.config, id, this.name);
  }

  static async create(id: number, env: ClientEnvironment): Promise<ProducerClient> {
    const queue = await DispatchQueue.start(producerName(id));
    return new ProducerClient(id, env, queue);
  }

  protected reconnectAction(): void {
    this.connect(() => this.writeAction());
  }

  private writeAction(): void {
    if (this.env.done.isSet) {
      this.close();
      return;
    }
    if (this.env.config.syncSend) {
      this.request(this.messageFrame, () => this.writeCompleted());
    } else {
      this.send(this.messageFrame, () => this.writeCompleted());
    }
  }

  private writeCompleted(): void {
    this.env.counters.incrementProduced();
    this.messageCounter++;
    if (this.env.done.isSet) {
      this.close();
      return;
    }
    this.dispatchWhileCurrent(Math.abs(this.env.config.producerSleep), () => this.nextWrite());
  }

  private nextWrite(): void {
    const limit = this.env.config.messagesPerConnection;
    if (limit > 0 && this.messageCounter >= limit) {
      this.messageCounter = 0;
      this.close();
    } else {
      this.writeAction();
    }
  }
}
