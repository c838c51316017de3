/**
 * Command line parsing for stomp-loadgen.
 */

import { parseArgs } from 'node:util';
import type { ThemeName } from '../dashboard/types.js';
import {
  ConfigValidationError,
  SCENARIO_DEFAULTS,
  resolveConfig,
  type AckMode,
  type DestinationType,
  type ScenarioConfig,
} from '../load/config.js';

// =============================================================================
// CLI Argument Definition
// =============================================================================

const options = {
  host: { type: 'string', short: 'H' },
  port: { type: 'string', short: 'p' },
  login: { type: 'string' },
  passcode: { type: 'string' },
  producers: { type: 'string', short: 'P' },
  consumers: { type: 'string', short: 'C' },
  'destination-type': { type: 'string' },
  'destination-name': { type: 'string', short: 'd' },
  'destination-count': { type: 'string' },
  'message-size': { type: 'string', short: 's' },
  persistent: { type: 'boolean' },
  'persistent-header': { type: 'string' },
  'sync-send': { type: 'boolean' },
  header: { type: 'string', multiple: true },
  'messages-per-connection': { type: 'string' },
  'producer-sleep': { type: 'string' },
  'consumer-sleep': { type: 'string' },
  ack: { type: 'string' },
  durable: { type: 'boolean' },
  selector: { type: 'string' },
  'consumer-prefix': { type: 'string' },
  'sample-interval': { type: 'string' },
  'sample-count': { type: 'string' },
  warmup: { type: 'string' },
  'display-errors': { type: 'boolean' },
  dashboard: { type: 'boolean' },
  theme: { type: 'string', short: 't' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | {
      readonly kind: 'run';
      readonly config: ScenarioConfig;
      readonly dashboard: boolean;
      readonly theme: ThemeName;
    }
  | { readonly kind: 'invalid'; readonly problems: readonly string[] };

// =============================================================================
// Help Output
// =============================================================================

export const HELP_TEXT = `
stomp-loadgen - load generator for STOMP message brokers

USAGE:
  stomp-loadgen [OPTIONS]

CONNECTION:
  -H, --host <address>               Broker host (default: ${SCENARIO_DEFAULTS.host})
  -p, --port <number>                Broker port (default: ${SCENARIO_DEFAULTS.port})
      --login <user>                 Login sent with CONNECT
      --passcode <secret>            Passcode sent with CONNECT

CLIENTS:
  -P, --producers <n>                Producer clients (default: ${SCENARIO_DEFAULTS.producers})
  -C, --consumers <n>                Consumer clients (default: ${SCENARIO_DEFAULTS.consumers})
      --destination-type <type>      queue or topic (default: ${SCENARIO_DEFAULTS.destinationType})
  -d, --destination-name <name>      Destination base name (default: ${SCENARIO_DEFAULTS.destinationName})
      --destination-count <n>        Destinations to spread clients over (default: ${SCENARIO_DEFAULTS.destinationCount})

PRODUCERS:
  -s, --message-size <bytes>         Message body size (default: ${SCENARIO_DEFAULTS.messageSize})
      --persistent                   Add the persistence header to every SEND
      --persistent-header <h:v>      Persistence header (default: ${SCENARIO_DEFAULTS.persistentHeader})
      --sync-send                    Wait for a receipt after every SEND
      --header <h:v,...>             Extra headers for one producer; repeat to round-robin
      --messages-per-connection <n>  Reconnect after n messages (default: 0, never)
      --producer-sleep <ms>          Pause between sends (default: 0)

CONSUMERS:
      --ack <mode>                   auto or client (default: ${SCENARIO_DEFAULTS.ack})
      --durable                      Request durable subscriptions
      --selector <expr>              Subscription selector
      --consumer-prefix <prefix>     Subscription id prefix (default: ${SCENARIO_DEFAULTS.consumerPrefix})
      --consumer-sleep <ms>          Pause before processing each message (default: 0)

SAMPLING:
      --warmup <ms>                  Time before the first sample (default: ${SCENARIO_DEFAULTS.warmup})
      --sample-interval <ms>         Sample period (default: ${SCENARIO_DEFAULTS.sampleInterval})
      --sample-count <n>             Number of samples (default: ${SCENARIO_DEFAULTS.sampleCount})
      --display-errors               Log every connection failure

OUTPUT:
      --dashboard                    Show the terminal dashboard
  -t, --theme <name>                 Dashboard theme: dark, light (default: dark)
  -h, --help                         Show this help message
  -v, --version                      Show version number

EXAMPLES:
  # Four producers and four consumers against a local broker
  stomp-loadgen -P 4 -C 4

  # Client acknowledgements, 256 byte persistent messages
  stomp-loadgen --ack client -s 256 --persistent --dashboard
`.trim();

// =============================================================================
// Argument Validation
// =============================================================================

function integer(problems: string[], flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    problems.push(`Invalid --${flag}: '${raw}' is not an integer`);
    return fallback;
  }
  return value;
}

function choice<T extends string>(
  problems: string[],
  flag: string,
  raw: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  if (raw === undefined) {
    return fallback;
  }
  const found = choices.find((c) => c === raw);
  if (found === undefined) {
    problems.push(`Invalid --${flag}: '${raw}'. Must be one of: ${choices.join(', ')}`);
    return fallback;
  }
  return found;
}

function headerLists(raw: readonly string[] | undefined): string[][] {
  if (raw === undefined) {
    return [];
  }
  return raw.map((list) =>
    list
      .split(',')
      .map((spec) => spec.trim())
      .filter((spec) => spec.length > 0),
  );
}

function parse(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options, strict: true, allowPositionals: false });
}

/**
 * Parses and validates the command line.
 */
export function parseCommandLine(argv: readonly string[]): CliCommand {
  let values: ReturnType<typeof parse>['values'];
  try {
    values = parse(argv).values;
  } catch (error) {
    return { kind: 'invalid', problems: [error instanceof Error ? error.message : String(error)] };
  }

  if (values.help === true) {
    return { kind: 'help' };
  }
  if (values.version === true) {
    return { kind: 'version' };
  }

  const d = SCENARIO_DEFAULTS;
  const problems: string[] = [];
  const port = integer(problems, 'port', values.port, d.port);
  const producers = integer(problems, 'producers', values.producers, d.producers);
  const consumers = integer(problems, 'consumers', values.consumers, d.consumers);
  const destinationType = choice<DestinationType>(
    problems,
    'destination-type',
    values['destination-type'],
    ['queue', 'topic'],
    d.destinationType,
  );
  const destinationCount = integer(problems, 'destination-count', values['destination-count'], d.destinationCount);
  const messageSize = integer(problems, 'message-size', values['message-size'], d.messageSize);
  const messagesPerConnection = integer(
    problems,
    'messages-per-connection',
    values['messages-per-connection'],
    d.messagesPerConnection,
  );
  const producerSleep = integer(problems, 'producer-sleep', values['producer-sleep'], d.producerSleep);
  const consumerSleep = integer(problems, 'consumer-sleep', values['consumer-sleep'], d.consumerSleep);
  const ack = choice<AckMode>(problems, 'ack', values.ack, ['auto', 'client'], d.ack);
  const sampleInterval = integer(problems, 'sample-interval', values['sample-interval'], d.sampleInterval);
  const sampleCount = integer(problems, 'sample-count', values['sample-count'], d.sampleCount);
  const warmup = integer(problems, 'warmup', values.warmup, d.warmup);
  const theme = choice<ThemeName>(problems, 'theme', values.theme, ['dark', 'light'], 'dark');

  if (problems.length > 0) {
    return { kind: 'invalid', problems };
  }

  try {
    const config = resolveConfig({
      host: values.host ?? d.host,
      port,
      login: values.login,
      passcode: values.passcode,
      producers,
      consumers,
      destinationType,
      destinationName: values['destination-name'] ?? d.destinationName,
      destinationCount,
      messageSize,
      persistent: values.persistent ?? d.persistent,
      persistentHeader: values['persistent-header'] ?? d.persistentHeader,
      syncSend: values['sync-send'] ?? d.syncSend,
      headers: headerLists(values.header),
      messagesPerConnection,
      producerSleep,
      consumerSleep,
      ack,
      durable: values.durable ?? d.durable,
      selector: values.selector,
      consumerPrefix: values['consumer-prefix'] ?? d.consumerPrefix,
      sampleInterval,
      sampleCount,
      warmup,
      displayErrors: values['display-errors'] ?? d.displayErrors,
    });
    return { kind: 'run', config, dashboard: values.dashboard ?? false, theme };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { kind: 'invalid', problems: error.problems };
    }
    throw error;
  }
}
