/**
 * Terminal dashboard for a running load scenario.
 *
 * Implements `ScenarioReporter`: the header panel shows the scenario, the
 * rates panel the latest sample, and the event log every sample line plus
 * whatever is sent through `logger`. Console output would tear the screen,
 * so the CLI routes the scenario's logging here while the dashboard runs.
 */

import blessed from 'blessed';
import type { ScenarioConfig } from '../load/config.js';
import type { ScenarioLogger } from '../load/logger.js';
import type { ScenarioReporter, ScenarioResult, ScenarioSample } from '../load/reporter.js';
import { formatRate } from '../load/format.js';
import { colorize, renderRates, renderScenario, renderSummary, severityColor } from './render.js';
import {
  type DashboardConfig,
  type DashboardOptions,
  type DashboardTheme,
  type EventSeverity,
  DEFAULT_CONFIG,
  getTheme,
} from './types.js';

type DashboardState = 'idle' | 'running' | 'stopped';

export class DashboardReporter implements ScenarioReporter {
  private readonly config: DashboardConfig;
  private readonly theme: DashboardTheme;
  private state: DashboardState = 'idle';
  private sampleCount = 0;
  private result: ScenarioResult | null = null;

  private screen: blessed.Widgets.Screen | null = null;
  private header: blessed.Widgets.BoxElement | null = null;
  private rates: blessed.Widgets.BoxElement | null = null;
  private eventLog: blessed.Widgets.Log | null = null;
  private statusBar: blessed.Widgets.BoxElement | null = null;

  /**
   * Logger that writes into the dashboard's event log.
   */
  readonly logger: ScenarioLogger = {
    info: (message) => this.log(message, 'info'),
    error: (message, error) => this.log(error?.stack ?? message, 'error'),
  };

  constructor(options: DashboardOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options };
    this.theme = getTheme(this.config.theme);
  }

  onStart(config: ScenarioConfig): void {
    if (this.state !== 'idle') {
      return;
    }
    this.state = 'running';
    this.sampleCount = config.sampleCount;

    this.screen = blessed.screen({
      smartCSR: true,
      title: 'stomp-loadgen',
      fullUnicode: true,
      autoPadding: true,
      warnings: false,
    });
    this.createLayout();
    this.setupKeyboardHandlers();

    this.header?.setContent(renderScenario(config));
    this.rates?.setContent(`Warming up for ${config.warmup} ms...`);
    this.setStatus('Running');
    this.render();
  }

  onSample(sample: ScenarioSample): void {
    this.rates?.setContent(renderRates(this.theme, sample, this.sampleCount));
    this.log(
      `#${sample.index + 1} produced ${formatRate(sample.producedPerSecond)}/s, ` +
        `consumed ${formatRate(sample.consumedPerSecond)}/s`,
      sample.newErrors > 0 ? 'warning' : 'info',
    );
    this.render();
  }

  onComplete(result: ScenarioResult): void {
    this.result = result;
    this.log(renderSummary(result), 'success');
    this.setStatus('Finished');
    this.render();
  }

  /**
   * Destroys the terminal screen, then hands the summary to `onSummary`.
   */
  close(): void {
    if (this.state === 'running') {
      this.screen?.destroy();
      this.screen = null;
      this.header = null;
      this.rates = null;
      this.eventLog = null;
      this.statusBar = null;
    }
    this.state = 'stopped';

    const result = this.result;
    this.result = null;
    if (result) {
      this.config.onSummary(renderSummary(result));
    }
  }

  private createLayout(): void {
    if (!this.screen) return;

    const border = { type: 'line' as const };
    const style = {
      fg: this.theme.text,
      border: { fg: this.theme.primary },
    };

    this.header = blessed.box({
      parent: this.screen,
      label: ' Scenario ',
      top: 0,
      left: 0,
      width: '60%',
      height: 7,
      tags: true,
      border,
      style,
    });

    this.rates = blessed.box({
      parent: this.screen,
      label: ' Rates ',
      top: 0,
      left: '60%',
      width: '40%',
      height: 7,
      tags: true,
      border,
      style,
    });

    this.eventLog = blessed.log({
      parent: this.screen,
      label: ' Event Log ',
      top: 7,
      left: 0,
      width: '100%',
      height: '100%-10',
      tags: true,
      border,
      style,
      scrollback: this.config.maxEventLogSize,
      scrollbar: { ch: ' ' },
    });

    this.statusBar = blessed.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: 3,
      tags: true,
      border,
      style,
    });
  }

  private setupKeyboardHandlers(): void {
    if (!this.screen) return;

    this.screen.key(['escape', 'q', 'C-c'], () => {
      this.setStatus('Stopping...');
      this.render();
      this.config.onQuit();
    });
  }

  private log(message: string, severity: EventSeverity): void {
    if (!this.eventLog) return;

    const time = new Date().toLocaleTimeString('en-US', { hour12: false });
    this.eventLog.log(
      `${colorize(time, this.theme.textMuted)} ${colorize(message, severityColor(this.theme, severity))}`,
    );
    this.render();
  }

  private setStatus(text: string): void {
    this.statusBar?.setContent(` ${text}  ${colorize('q: quit', this.theme.textMuted)}`);
  }

  private render(): void {
    this.screen?.render();
  }
}
