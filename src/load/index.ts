/**
 * Load clients, configuration and scenario orchestration.
 *
 * @module load
 */

export {
  LoadClient,
  InvalidStateError,
  ShutdownNotRequestedError,
  RECONNECT_BACKOFF_MS,
  type ClientEnvironment,
} from './client.js';
export {
  ClientStates,
  type ClientState,
  type ClientStateKind,
  type ConnectingState,
  type ConnectedState,
  type ClosingState,
  type DisconnectedState,
} from './client-state.js';
export { ProducerClient, producerName, buildMessageBody, buildMessageFrame } from './producer.js';
export { ConsumerClient, consumerName, buildSubscribeFrame, buildAckFrame } from './consumer.js';
export {
  SCENARIO_DEFAULTS,
  MAX_TIMER_DELAY_MS,
  MAX_MESSAGE_SIZE,
  ConfigValidationError,
  resolveConfig,
  destinationFor,
  headersFor,
  type ScenarioConfig,
  type ScenarioOptions,
  type DestinationType,
  type AckMode,
} from './config.js';
export { SharedCounters, DoneSignal, type CounterSnapshot } from './counters.js';
export { consoleLogger, toError, type ScenarioLogger } from './logger.js';
export { formatCount, formatRate, formatElapsed } from './format.js';
export {
  ConsoleReporter,
  sampleBetween,
  summarize,
  type ScenarioReporter,
  type ScenarioResult,
  type ScenarioSample,
} from './reporter.js';
export { Scenario, ClientCrashedError, type ScenarioDeps } from './scenario.js';
