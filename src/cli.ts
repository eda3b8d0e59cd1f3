import { ConfigError } from './errors.js';

export interface CliArgs {
  overrides: Record<string, string | boolean>;
  command: string;
  args: string[];
  help: boolean;
}

const VALUE_FLAGS: Record<string, string> = {
  '--ip': 'host',
  '--port': 'port',
  '--scheme': 'scheme',
  '--path': 'verifyPath',
  '--expect-status': 'expectedStatus',
  '--ready-timeout': 'readinessTimeoutMs',
  '--interrupt-timeout': 'interruptTimeoutMs',
  '--kill-timeout': 'killTimeoutMs',
  '--verify-timeout': 'verifyTimeoutMs',
  '--lock-dir': 'lockDir',
};

export const USAGE = `service-harness [options] -- <command> [args...]

Launches <command> with --ip/--port, waits for it to print its address,
requests GET <path> once and shuts it down.

Options:
  --ip <host>                 address to bind the service to (127.0.0.1)
  --port <port>               port, 0 picks a free one (8888)
  --scheme <http|https>       verification scheme (http)
  --path <path>               verification path (/midi/ports)
  --expect-status <code>      status that counts as a pass (200)
  --ready-timeout <ms>        max wait for the readiness line (60000)
  --interrupt-timeout <ms>    wait after SIGINT before SIGKILL (10000)
  --kill-timeout <ms>         wait after SIGKILL (5000)
  --verify-timeout <ms>       request timeout (10000)
  --lock-dir <dir>            claim the address in this registry directory
  --no-tree-kill              signal only the direct child
  -h, --help                  show this message`;

export function parseArgs(argv: string[]): CliArgs {
  const overrides: Record<string, string | boolean> = {};
  let help = false;
  let i = 0;

  for (; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      i++;
      break;
    }
    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }
    if (arg === '--no-tree-kill') {
      overrides.killTree = false;
      continue;
    }

    if (!arg.startsWith('-')) {
      break;
    }

    const [flag, inline]: [string, string | undefined] = arg.includes('=')
      ? splitOnce(arg)
      : [arg, undefined];
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new ConfigError(`Unknown option ${flag}`);
    }

    const value = inline ?? argv[++i];
    if (value === undefined) {
      throw new ConfigError(`Option ${flag} needs a value`);
    }
    overrides[key] = value;
  }

  const [command, ...args] = argv.slice(i);
  if (command === undefined && !help) {
    throw new ConfigError('Missing service command after --');
  }

  return { overrides, command: command ?? '', args, help };
}

function splitOnce(arg: string): [string, string] {
  const index = arg.indexOf('=');
  return [arg.slice(0, index), arg.slice(index + 1)];
}
