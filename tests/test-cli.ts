import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/cli.js';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseArgs', () => {
  it('splits options from the service command at --', () => {
    expect(
      parseArgs(['--ip', '0.0.0.0', '--port=9000', '--', 'node', 'server.js', '--verbose'])
    ).toEqual({
      overrides: { host: '0.0.0.0', port: '9000' },
      command: 'node',
      args: ['server.js', '--verbose'],
      help: false,
    });
  });

  it('starts the command at the first positional argument', () => {
    expect(parseArgs(['--no-tree-kill', './midi-service', '--open'])).toEqual({
      overrides: { killTree: false },
      command: './midi-service',
      args: ['--open'],
      help: false,
    });
  });

  it('maps every timeout flag', () => {
    const { overrides } = parseArgs([
      '--ready-timeout',
      '100',
      '--interrupt-timeout',
      '200',
      '--kill-timeout',
      '300',
      '--verify-timeout',
      '400',
      '--',
      'svc',
    ]);
    expect(overrides).toEqual({
      readinessTimeoutMs: '100',
      interruptTimeoutMs: '200',
      killTimeoutMs: '300',
      verifyTimeoutMs: '400',
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--bogus', '1', '--', 'svc'])).toThrow('Unknown option --bogus');
  });

  it('rejects an option without its value', () => {
    expect(() => parseArgs(['--port'])).toThrow('Option --port needs a value');
  });

  it('requires a command', () => {
    expect(() => parseArgs(['--port', '9000'])).toThrow(ConfigError);
  });

  it('allows --help on its own', () => {
    expect(parseArgs(['--help'])).toEqual({ overrides: {}, command: '', args: [], help: true });
  });

  it('produces overrides loadConfig understands', () => {
    const { overrides } = parseArgs(['--port', '9000', '--path', '/health', '--', 'svc']);
    const config = loadConfig(overrides, {});
    expect(config.port).toBe(9000);
    expect(config.verifyPath).toBe('/health');
  });
});
