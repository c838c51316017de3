import { describe, it, expect } from 'vitest';
import { HELP_TEXT, parseCommandLine } from '../../src/bin/args.js';
import { SCENARIO_DEFAULTS } from '../../src/index.js';

describe('parseCommandLine', () => {
  it('runs the default scenario without arguments', () => {
    expect(parseCommandLine([])).toEqual({
      kind: 'run',
      config: SCENARIO_DEFAULTS,
      dashboard: false,
      theme: 'dark',
    });
  });

  it('maps flags onto the scenario configuration', () => {
    const command = parseCommandLine([
      '-H',
      'broker.local',
      '-P',
      '4',
      '-C',
      '2',
      '--ack',
      'client',
      '--destination-type',
      'topic',
      '--sync-send',
      '--producer-sleep=-5',
      '--login',
      'guest',
      '--passcode',
      'test-secret',
    ]);

    expect(command.kind).toBe('run');
    if (command.kind !== 'run') return;
    expect(command.config).toMatchObject({
      host: 'broker.local',
      producers: 4,
      consumers: 2,
      ack: 'client',
      destinationType: 'topic',
      syncSend: true,
      producerSleep: -5,
      login: 'guest',
      passcode: 'test-secret',
    });
  });

  it('splits each --header flag into one producer header list', () => {
    const command = parseCommandLine(['--header', 'a:1, b:2', '--header', 'c:3']);

    expect(command.kind === 'run' && command.config.headers).toEqual([['a:1', 'b:2'], ['c:3']]);
  });

  it('selects the dashboard and its theme', () => {
    expect(parseCommandLine(['--dashboard', '-t', 'light'])).toMatchObject({
      kind: 'run',
      dashboard: true,
      theme: 'light',
    });
  });

  it('recognizes help and version', () => {
    expect(parseCommandLine(['--help'])).toEqual({ kind: 'help' });
    expect(parseCommandLine(['-v'])).toEqual({ kind: 'version' });
    expect(HELP_TEXT.startsWith('stomp-loadgen - load generator for STOMP message brokers')).toBe(true);
  });

  it('reports every malformed flag value', () => {
    expect(parseCommandLine(['--port', 'abc', '--ack', 'maybe'])).toEqual({
      kind: 'invalid',
      problems: ["Invalid --port: 'abc' is not an integer", "Invalid --ack: 'maybe'. Must be one of: auto, client"],
    });
  });

  it('reports configuration problems found after parsing', () => {
    expect(parseCommandLine(['--port', '70000'])).toEqual({
      kind: 'invalid',
      problems: ['port must be an integer between 1 and 65535, got 70000'],
    });
  });

  it('rejects unknown flags', () => {
    const command = parseCommandLine(['--bogus']);

    expect(command.kind).toBe('invalid');
    expect(command.kind === 'invalid' && command.problems).toHaveLength(1);
  });
});
