import { describe, it, expect } from 'vitest';
import {
  colorize,
  renderRates,
  renderScenario,
  renderSummary,
  severityColor,
} from '../../src/dashboard/render.js';
import { DARK_THEME, LIGHT_THEME, getTheme } from '../../src/dashboard/types.js';
import { resolveConfig, sampleBetween, summarize } from '../../src/index.js';

describe('colorize', () => {
  it('wraps text in blessed color tags', () => {
    expect(colorize('ok', 'green')).toBe('{green-fg}ok{/green-fg}');
  });
});

describe('themes', () => {
  it('resolves themes by name', () => {
    expect(getTheme('dark')).toBe(DARK_THEME);
    expect(getTheme('light')).toBe(LIGHT_THEME);
  });

  it('maps severities onto theme colors', () => {
    expect(severityColor(DARK_THEME, 'info')).toBe('white');
    expect(severityColor(LIGHT_THEME, 'info')).toBe('black');
    expect(severityColor(DARK_THEME, 'error')).toBe('red');
  });
});

describe('renderScenario', () => {
  it('describes the broker, clients and messages', () => {
    expect(renderScenario(resolveConfig()).split('\n')).toEqual([
      'Broker:       127.0.0.1:61613',
      'Clients:      1 producer(s), 1 consumer(s)',
      'Destination:  /queue/load-* (1)',
      'Messages:     1024 bytes, non-persistent, async send, auto ack',
    ]);
  });
});

describe('renderRates', () => {
  it('shows the latest rates and totals', () => {
    const sample = sampleBetween(
      1,
      0,
      { produced: 0, consumed: 0, errors: 0, takenAt: 1000 },
      { produced: 2500, consumed: 1500, errors: 2, takenAt: 2000 },
    );

    expect(renderRates(DARK_THEME, sample, 5).split('\n')).toEqual([
      'Sample:    2/5  (00:00:02)',
      'Produced:  {green-fg}2,500.00/s{/green-fg}  total 2.5K',
      'Consumed:  {green-fg}1,500.00/s{/green-fg}  total 1.5K',
      'Errors:    {red-fg}+2{/red-fg}  total 2',
    ]);
  });
});

describe('renderSummary', () => {
  it('prints the mean rates and the error total', () => {
    const result = summarize([], { produced: 10, consumed: 10, errors: 3, takenAt: 0 });

    expect(renderSummary(result)).toBe('Done: producer 0.00/s, consumer 0.00/s, errors 3');
  });
});
