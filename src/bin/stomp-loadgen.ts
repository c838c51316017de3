#!/usr/bin/env node
/**
 * stomp-loadgen - drives producers and consumers against a STOMP broker and
 * reports throughput.
 *
 * @example
 * ```bash
 * # One producer and one consumer against localhost:61613
 * stomp-loadgen
 *
 * # Eight producers, client acks, terminal dashboard
 * stomp-loadgen -P 8 --ack client --dashboard
 * ```
 */

import { DashboardReporter } from '../dashboard/index.js';
import { VERSION } from '../index.js';
import { consoleLogger } from '../load/logger.js';
import { ConsoleReporter } from '../load/reporter.js';
import { Scenario, type ScenarioDeps } from '../load/scenario.js';
import { HELP_TEXT, parseCommandLine } from './args.js';

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<number> {
  const command = parseCommandLine(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      console.log(HELP_TEXT);
      return 0;
    case 'version':
      console.log(`stomp-loadgen v${VERSION}`);
      return 0;
    case 'invalid':
      console.error('Error: Invalid arguments\n');
      for (const problem of command.problems) {
        console.error(`  - ${problem}`);
      }
      console.error('\nRun "stomp-loadgen --help" for usage information.');
      return 1;
    case 'run':
      break;
  }

  let deps: ScenarioDeps;
  let scenario: Scenario | undefined;
  if (command.dashboard) {
    const dashboard = new DashboardReporter({
      theme: command.theme,
      onQuit: () => scenario?.requestStop(),
    });
    deps = { reporter: dashboard, logger: dashboard.logger };
  } else {
    deps = { reporter: new ConsoleReporter(consoleLogger), logger: consoleLogger };
  }
  scenario = new Scenario(command.config, deps);

  // Handle process signals: the first one ends sampling, shutdown follows.
  const requestStop = (): void => scenario?.requestStop();
  process.on('SIGINT', requestStop);
  process.on('SIGTERM', requestStop);

  try {
    await scenario.run();
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    process.off('SIGINT', requestStop);
    process.off('SIGTERM', requestStop);
  }
}

// =============================================================================
// Execute
// =============================================================================

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Unexpected error:', error instanceof Error ? error.message : error);
    process.exit(1);
  },
);
