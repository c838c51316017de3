/**
 * Text rendering for the dashboard panels. Output uses blessed tags.
 */

import type { ScenarioConfig } from '../load/config.js';
import { formatCount, formatElapsed, formatRate } from '../load/format.js';
import type { ScenarioResult, ScenarioSample } from '../load/reporter.js';
import type { DashboardTheme, EventSeverity } from './types.js';

export function colorize(text: string, color: string): string {
  return `{${color}-fg}${text}{/${color}-fg}`;
}

export function severityColor(theme: DashboardTheme, severity: EventSeverity): string {
  switch (severity) {
    case 'success':
      return theme.success;
    case 'warning':
      return theme.warning;
    case 'error':
      return theme.error;
    case 'info':
      return theme.text;
  }
}

/**
 * Scenario parameters shown in the header panel.
 */
export function renderScenario(config: ScenarioConfig): string {
  const lines = [
    `Broker:       ${config.host}:${config.port}`,
    `Clients:      ${config.producers} producer(s), ${config.consumers} consumer(s)`,
    `Destination:  /${config.destinationType}/${config.destinationName}-* (${config.destinationCount})`,
    `Messages:     ${config.messageSize} bytes, ${config.persistent ? 'persistent' : 'non-persistent'}, ` +
      `${config.syncSend ? 'sync' : 'async'} send, ${config.ack} ack`,
  ];
  return lines.join('\n');
}

/**
 * Latest rates and running totals.
 */
export function renderRates(theme: DashboardTheme, sample: ScenarioSample, sampleCount: number): string {
  const errorColor = sample.newErrors > 0 ? theme.error : theme.success;
  const lines = [
    `Sample:    ${sample.index + 1}/${sampleCount}  (${formatElapsed(sample.elapsedMs)})`,
    `Produced:  ${colorize(`${formatRate(sample.producedPerSecond)}/s`, theme.success)}  ` +
      `total ${formatCount(sample.totals.produced)}`,
    `Consumed:  ${colorize(`${formatRate(sample.consumedPerSecond)}/s`, theme.success)}  ` +
      `total ${formatCount(sample.totals.consumed)}`,
    `Errors:    ${colorize(`+${sample.newErrors}`, errorColor)}  total ${formatCount(sample.totals.errors)}`,
  ];
  return lines.join('\n');
}

export function renderSummary(result: ScenarioResult): string {
  return (
    `Done: producer ${formatRate(result.producedPerSecond)}/s, ` +
    `consumer ${formatRate(result.consumedPerSecond)}/s, ` +
    `errors ${result.totals.errors}`
  );
}
