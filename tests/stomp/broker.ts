/**
 * In-process STOMP broker stand-in for connection tests.
 */

import * as net from 'node:net';
import { FrameDecoder, StompFrame, encodeFrame } from '../../src/index.js';

export type BrokerHandler = (frame: StompFrame, reply: (frame: StompFrame) => void, socket: net.Socket) => void;

/**
 * Answers CONNECT, DISCONNECT and receipt requests the way a broker would.
 */
export const defaultHandler: BrokerHandler = (frame, reply, socket) => {
  if (frame.command === 'CONNECT') {
    reply(new StompFrame('CONNECTED', [['version', '1.2']]));
    return;
  }
  const receipt = frame.getHeader('receipt');
  if (receipt !== undefined) {
    reply(new StompFrame('RECEIPT', [['receipt-id', receipt]]));
  }
  if (frame.command === 'DISCONNECT') {
    socket.end();
  }
};

export class FakeBroker {
  readonly received: StompFrame[] = [];
  handler: BrokerHandler = defaultHandler;

  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor() {
    this.server = net.createServer((socket) => this.accept(socket));
  }

  /** Starts listening on an ephemeral port and returns it. */
  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(0, '127.0.0.1', () => {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('broker is not listening on a TCP port'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  /** Sends a frame to every connected client. */
  broadcast(frame: StompFrame): void {
    for (const socket of this.sockets) {
      socket.write(encodeFrame(frame));
    }
  }

  /** Drops every client connection. */
  dropClients(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
  }

  commands(): string[] {
    return this.received.map((f) => f.command);
  }

  close(): Promise<void> {
    this.dropClients();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => socket.destroy());

    const decoder = new FrameDecoder();
    socket.on('data', (data) => {
      for (const frame of decoder.push(data)) {
        this.received.push(frame);
        this.handler(frame, (reply) => socket.write(encodeFrame(reply)), socket);
      }
    });
  }
}

/**
 * Resolves once `condition` holds, polling on real timers.
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Returns a port nothing listens on. */
export async function unusedPort(): Promise<number> {
  const broker = new FakeBroker();
  const port = await broker.listen();
  await broker.close();
  return port;
}
