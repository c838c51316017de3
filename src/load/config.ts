/**
 * Scenario configuration: defaults, validation and per-client derivations.
 */

import { parseHeader, type StompHeader } from '../stomp/frame.js';
import { STOMP_DEFAULTS } from '../stomp/types.js';

/** Longest delay a Node.js timer accepts */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Largest message body, the same as the frame decoder's size limit */
export const MAX_MESSAGE_SIZE = STOMP_DEFAULTS.MAX_FRAME_SIZE;

export type DestinationType = 'queue' | 'topic';

export type AckMode = 'auto' | 'client';

/**
 * Fully resolved configuration of a load scenario.
 */
export interface ScenarioConfig {
  readonly host: string;
  readonly port: number;
  readonly login: string | undefined;
  readonly passcode: string | undefined;

  /** Number of producer clients */
  readonly producers: number;
  /** Number of consumer clients */
  readonly consumers: number;

  readonly destinationType: DestinationType;
  readonly destinationName: string;
  /** Clients are spread over this many destinations by id */
  readonly destinationCount: number;

  /** Body size of every produced message, in bytes */
  readonly messageSize: number;
  readonly persistent: boolean;
  /** `name:value` header added to SEND frames when `persistent` is set */
  readonly persistentHeader: string;
  /** Wait for a broker receipt after every SEND */
  readonly syncSend: boolean;
  /** Extra `name:value` headers, one list per producer (round-robin by id) */
  readonly headers: readonly (readonly string[])[];
  /** Producers reconnect after this many messages; 0 means never */
  readonly messagesPerConnection: number;
  /** Pause between sends in ms; the sign is ignored */
  readonly producerSleep: number;
  /** Pause before processing each message in ms; the sign is ignored */
  readonly consumerSleep: number;

  readonly ack: AckMode;
  readonly durable: boolean;
  readonly selector: string | undefined;
  readonly consumerPrefix: string;

  readonly sampleInterval: number;
  readonly sampleCount: number;
  readonly warmup: number;

  /** Log every transport failure with its stack */
  readonly displayErrors: boolean;
}

export type ScenarioOptions = Partial<ScenarioConfig>;

export const SCENARIO_DEFAULTS: ScenarioConfig = Object.freeze({
  host: '127.0.0.1',
  port: 61613,
  login: undefined,
  passcode: undefined,
  producers: 1,
  consumers: 1,
  destinationType: 'queue',
  destinationName: 'load',
  destinationCount: 1,
  messageSize: 1024,
  persistent: false,
  persistentHeader: 'persistent:true',
  syncSend: false,
  headers: [],
  messagesPerConnection: 0,
  producerSleep: 0,
  consumerSleep: 0,
  ack: 'auto',
  durable: false,
  selector: undefined,
  consumerPrefix: 'consumer-',
  sampleInterval: 1000,
  sampleCount: 15,
  warmup: 3000,
  displayErrors: false,
});

/**
 * Error thrown when a configuration has one or more invalid fields.
 */
export class ConfigValidationError extends Error {
  override readonly name = 'ConfigValidationError' as const;

  constructor(readonly problems: readonly string[]) {
    super(`Invalid scenario configuration:\n  ${problems.join('\n  ')}`);
  }
}

function checkInteger(
  problems: string[],
  field: string,
  value: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    problems.push(`${field} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

function checkSleep(problems: string[], field: string, value: number): void {
  if (!Number.isFinite(value)) {
    problems.push(`${field} must be a finite number, got ${value}`);
  } else if (Math.abs(value) > MAX_TIMER_DELAY_MS) {
    problems.push(`${field} must be at most ${MAX_TIMER_DELAY_MS} ms in magnitude, got ${value}`);
  }
}

function checkHeader(problems: string[], field: string, spec: string): void {
  try {
    parseHeader(spec);
  } catch (error) {
    problems.push(`${field}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Fills in defaults and validates the result.
 *
 * @throws {ConfigValidationError} Listing every invalid field
 */
export function resolveConfig(options: ScenarioOptions = {}): ScenarioConfig {
  const config: ScenarioConfig = Object.freeze({ ...SCENARIO_DEFAULTS, ...options });
  const problems: string[] = [];

  if (config.host.length === 0) {
    problems.push('host must not be empty');
  }
  checkInteger(problems, 'port', config.port, 1, 65535);
  checkInteger(problems, 'producers', config.producers, 0);
  checkInteger(problems, 'consumers', config.consumers, 0);
  if (config.destinationType !== 'queue' && config.destinationType !== 'topic') {
    problems.push(`destinationType must be 'queue' or 'topic', got '${String(config.destinationType)}'`);
  }
  if (config.destinationName.length === 0) {
    problems.push('destinationName must not be empty');
  }
  checkInteger(problems, 'destinationCount', config.destinationCount, 1);
  checkInteger(problems, 'messageSize', config.messageSize, 0, MAX_MESSAGE_SIZE);
  checkHeader(problems, 'persistentHeader', config.persistentHeader);
  config.headers.forEach((list, i) => {
    for (const spec of list) {
      checkHeader(problems, `headers[${i}]`, spec);
    }
  });
  checkInteger(problems, 'messagesPerConnection', config.messagesPerConnection, 0);
  checkSleep(problems, 'producerSleep', config.producerSleep);
  checkSleep(problems, 'consumerSleep', config.consumerSleep);
  if (config.ack !== 'auto' && config.ack !== 'client') {
    problems.push(`ack must be 'auto' or 'client', got '${String(config.ack)}'`);
  }
  checkInteger(problems, 'sampleInterval', config.sampleInterval, 1, MAX_TIMER_DELAY_MS);
  checkInteger(problems, 'sampleCount', config.sampleCount, 0);
  checkInteger(problems, 'warmup', config.warmup, 0, MAX_TIMER_DELAY_MS);

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return config;
}

/**
 * Destination used by the client with the given id.
 */
export function destinationFor(config: ScenarioConfig, id: number): string {
  return `/${config.destinationType}/${config.destinationName}-${id % config.destinationCount}`;
}

/**
 * Extra headers for the producer with the given id.
 */
export function headersFor(config: ScenarioConfig, id: number): readonly StompHeader[] {
  if (config.headers.length === 0) {
    return [];
  }
  const list = config.headers[id % config.headers.length] ?? [];
  return list.map(parseHeader);
}
