import { parseArgs, USAGE, type CliArgs } from './cli.js';
import { loadConfig, type HarnessConfig } from './config.js';
import { ConfigError, TerminationFailure } from './errors.js';
import { resolveAddress } from './harness/address.js';
import { AddressRegistry } from './harness/registry.js';
import { harnessOptionsFromConfig, ServiceHarness } from './harness/service-harness.js';

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_LEAKED = 2;
export const EXIT_USAGE = 64;

/**
 * Runs one launch/verify/terminate cycle for the command line in `argv` and
 * returns the process exit code. Aborting `signal` tears the service down.
 */
export async function main(argv: string[], signal?: AbortSignal): Promise<number> {
  let cli: CliArgs;
  let config: HarnessConfig;
  try {
    cli = parseArgs(argv);
    config = loadConfig(cli.overrides);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (cli.help) {
    console.log(USAGE);
    return EXIT_PASSED;
  }

  const address = await resolveAddress(config.host, config.port);
  const harness = new ServiceHarness(
    harnessOptionsFromConfig(config, address, {
      command: cli.command,
      args: cli.args,
      signal,
      registry: config.lockDir ? new AddressRegistry(config.lockDir) : undefined,
    })
  );

  try {
    const result = await harness.run();
    console.log(`GET ${result.verification.url} -> ${result.verification.status}`);
    console.log(result.verification.body);
    return EXIT_PASSED;
  } catch (error) {
    if (error instanceof TerminationFailure) {
      console.error(`Service process ${error.pid} could not be stopped:`, error);
      return EXIT_LEAKED;
    }
    console.error('Run failed:', error);
    return EXIT_FAILED;
  }
}
