/**
 * Scenario progress reporting.
 */

import type { ScenarioConfig } from './config.js';
import type { CounterSnapshot } from './counters.js';
import { formatRate } from './format.js';
import type { ScenarioLogger } from './logger.js';

/**
 * Counter deltas over one sample interval.
 */
export interface ScenarioSample {
  /** Zero-based sample number */
  readonly index: number;
  /** Time since sampling began, in milliseconds */
  readonly elapsedMs: number;
  readonly producedPerSecond: number;
  readonly consumedPerSecond: number;
  /** Errors recorded during this interval */
  readonly newErrors: number;
  /** Counter values at the end of the interval */
  readonly totals: CounterSnapshot;
}

export interface ScenarioResult {
  readonly samples: readonly ScenarioSample[];
  /** Counter values once every client has shut down */
  readonly totals: CounterSnapshot;
  /** Mean of the sampled producer rates */
  readonly producedPerSecond: number;
  /** Mean of the sampled consumer rates */
  readonly consumedPerSecond: number;
}

export interface ScenarioReporter {
  onStart(config: ScenarioConfig): void;
  onSample(sample: ScenarioSample): void;
  onComplete(result: ScenarioResult): void;
  /** Releases any resources (terminal, timers) held by the reporter */
  close(): void;
}

/**
 * Computes the rates between two counter snapshots.
 */
export function sampleBetween(
  index: number,
  startedAt: number,
  previous: CounterSnapshot,
  current: CounterSnapshot,
): ScenarioSample {
  const seconds = (current.takenAt - previous.takenAt) / 1000;
  const rate = (delta: number): number => (seconds > 0 ? delta / seconds : 0);
  return {
    index,
    elapsedMs: current.takenAt - startedAt,
    producedPerSecond: rate(current.produced - previous.produced),
    consumedPerSecond: rate(current.consumed - previous.consumed),
    newErrors: current.errors - previous.errors,
    totals: current,
  };
}

export function summarize(samples: readonly ScenarioSample[], totals: CounterSnapshot): ScenarioResult {
  const mean = (pick: (s: ScenarioSample) => number): number =>
    samples.length === 0 ? 0 : samples.reduce((sum, s) => sum + pick(s), 0) / samples.length;
  return {
    samples,
    totals,
    producedPerSecond: mean((s) => s.producedPerSecond),
    consumedPerSecond: mean((s) => s.consumedPerSecond),
  };
}

/**
 * Prints one line per sample and a summary.
 */
export class ConsoleReporter implements ScenarioReporter {
  private sampleCount = 0;

  constructor(private readonly logger: ScenarioLogger) {}

  onStart(config: ScenarioConfig): void {
    this.sampleCount = config.sampleCount;
    this.logger.info(
      `Load against ${config.host}:${config.port}: ${config.producers} producer(s), ` +
        `${config.consumers} consumer(s), ${config.destinationCount} ${config.destinationType}(s) ` +
        `'${config.destinationName}', ${config.messageSize} byte messages`,
    );
    this.logger.info(`Warming up for ${config.warmup} ms`);
  }

  onSample(sample: ScenarioSample): void {
    this.logger.info(
      `[${sample.index + 1}/${this.sampleCount}] ` +
        `produced ${formatRate(sample.producedPerSecond)}/s, ` +
        `consumed ${formatRate(sample.consumedPerSecond)}/s, ` +
        `errors ${sample.totals.errors} (+${sample.newErrors})`,
    );
  }

  onComplete(result: ScenarioResult): void {
    const { totals } = result;
    this.logger.info(
      `Producer rate: ${formatRate(result.producedPerSecond)}/s (${totals.produced} total), ` +
        `consumer rate: ${formatRate(result.consumedPerSecond)}/s (${totals.consumed} total), ` +
        `errors: ${totals.errors}`,
    );
  }

  close(): void {
    // Nothing to release.
  }
}
