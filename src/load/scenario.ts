/**
 * Scenario - creates the clients, samples the counters and shuts down.
 *
 * @example
 * ```typescript
 * const scenario = new Scenario(resolveConfig({ producers: 4, consumers: 4 }));
 * const result = await scenario.run();
 * console.log(result.producedPerSecond);
 * ```
 */

import { GenServer } from '../core/gen-server.js';
import { Latch } from '../core/latch.js';
import type { LifecycleEvent } from '../core/types.js';
import { StompTransport } from '../stomp/transport.js';
import type { BrokerTransport } from '../stomp/types.js';
import type { ClientEnvironment, LoadClient } from './client.js';
import type { ScenarioConfig } from './config.js';
import { ConsumerClient } from './consumer.js';
import { DoneSignal, SharedCounters, type CounterSnapshot } from './counters.js';
import { consoleLogger, type ScenarioLogger } from './logger.js';
import { ProducerClient } from './producer.js';
import {
  ConsoleReporter,
  sampleBetween,
  summarize,
  type ScenarioReporter,
  type ScenarioResult,
  type ScenarioSample,
} from './reporter.js';

export interface ScenarioDeps {
  readonly transport?: BrokerTransport;
  readonly logger?: ScenarioLogger;
  readonly reporter?: ScenarioReporter;
}

/**
 * Error raised when a client's queue crashes on a broken invariant.
 */
export class ClientCrashedError extends Error {
  override readonly name = 'ClientCrashedError' as const;
  override readonly cause: Error;

  constructor(
    readonly clientName: string,
    cause: Error,
  ) {
    super(`Client '${clientName}' crashed: ${cause.message}`);
    this.cause = cause;
  }
}

export class Scenario {
  readonly counters = new SharedCounters();
  readonly done = new DoneSignal();

  private readonly transport: BrokerTransport;
  private readonly logger: ScenarioLogger;
  private readonly reporter: ScenarioReporter;
  private readonly clients: LoadClient[] = [];
  private readonly stopRequested = new Latch();
  private started = false;
  private crash: ClientCrashedError | undefined;
  private onCrash: ((error: ClientCrashedError) => void) | undefined;
  private unsubscribe: (() => void) | undefined;

  constructor(
    readonly config: ScenarioConfig,
    deps: ScenarioDeps = {},
  ) {
    this.transport = deps.transport ?? new StompTransport();
    this.logger = deps.logger ?? consoleLogger;
    this.reporter = deps.reporter ?? new ConsoleReporter(this.logger);
  }

  get clientList(): readonly LoadClient[] {
    return this.clients;
  }

  /**
   * Creates every client and starts it. Consumers start first so that they
   * subscribe before producers begin sending.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Scenario already started');
    }
    this.started = true;
    this.unsubscribe = GenServer.onLifecycleEvent((event) => this.handleLifecycleEvent(event));

    const env: ClientEnvironment = {
      config: this.config,
      transport: this.transport,
      counters: this.counters,
      done: this.done,
      logger: this.logger,
    };
    for (let i = 0; i < this.config.consumers; i++) {
      this.clients.push(await ConsumerClient.create(i, env));
    }
    for (let i = 0; i < this.config.producers; i++) {
      this.clients.push(await ProducerClient.create(i, env));
    }
    for (const client of this.clients) {
      client.start();
    }
  }

  /**
   * Ends sampling early; `run()` then shuts down as usual.
   */
  requestStop(): void {
    this.stopRequested.countDown();
  }

  /**
   * Sets the done signal and waits for every client to shut down.
   */
  async stop(): Promise<CounterSnapshot> {
    this.done.set();
    this.stopRequested.countDown();
    await Promise.all(this.clients.map((client) => client.shutdown()));
    await Promise.all(this.clients.map((client) => client.dispose()));
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    return this.counters.snapshot();
  }

  /**
   * Starts the clients, warms up, takes the configured samples and shuts
   * down.
   *
   * @throws {ClientCrashedError} If any client crashed
   */
  async run(): Promise<ScenarioResult> {
    await this.start();
    this.reporter.onStart(this.config);

    const crashed = new Promise<never>((_, reject) => {
      this.onCrash = reject;
    });
    if (this.crash !== undefined) {
      this.onCrash?.(this.crash);
    }

    try {
      const samples = await Promise.race([this.sample(), crashed]);
      const totals = await this.stop();
      if (this.crash !== undefined) {
        throw this.crash;
      }
      const result = summarize(samples, totals);
      this.reporter.onComplete(result);
      return result;
    } catch (error) {
      await this.stop();
      throw error;
    } finally {
      this.onCrash = undefined;
      this.reporter.close();
    }
  }

  private async sample(): Promise<ScenarioSample[]> {
    const samples: ScenarioSample[] = [];
    if (!(await this.pause(this.config.warmup))) {
      return samples;
    }
    const startedAt = Date.now();
    let previous = this.counters.snapshot();
    for (let i = 0; i < this.config.sampleCount; i++) {
      if (!(await this.pause(this.config.sampleInterval))) {
        break;
      }
      const current = this.counters.snapshot();
      const sample = sampleBetween(i, startedAt, previous, current);
      samples.push(sample);
      this.reporter.onSample(sample);
      previous = current;
    }
    return samples;
  }

  /**
   * Waits `ms` milliseconds.
   *
   * @returns false if sampling was stopped or a client crashed meanwhile
   */
  private async pause(ms: number): Promise<boolean> {
    if (this.stopRequested.isReleased || this.crash !== undefined) {
      return false;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const elapsed = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), ms);
    });
    const stopped = this.stopRequested.wait().then(() => false);
    const proceed = await Promise.race([elapsed, stopped]);
    clearTimeout(timer);
    return proceed && this.crash === undefined;
  }

  private handleLifecycleEvent(event: LifecycleEvent): void {
    if (event.type !== 'crashed') {
      return;
    }
    const client = this.clients.find((c) => c.queueId === event.ref.id);
    if (client === undefined) {
      return;
    }
    const error = new ClientCrashedError(client.name, event.error);
    this.logger.error(error.message, event.error);
    if (this.crash === undefined) {
      this.crash = error;
      this.onCrash?.(error);
      this.stopRequested.countDown();
    }
  }
}
