import type { ServiceAddress } from '../../types.js';

/**
 * Everything the harness needs to know about one kind of service. The
 * lifecycle code only talks to this interface, so a service that advertises
 * readiness differently only needs a new adapter.
 */
export interface ServiceAdapter {
  readonly name: string;

  getLaunchArgs(address: ServiceAddress): string[];
  getEnvVars(address: ServiceAddress): Record<string, string>;

  /** Must be specific to `address` so stale or unrelated processes can't satisfy it. */
  getReadyPattern(address: ServiceAddress): RegExp;

  getBaseUrl(address: ServiceAddress): string;
  getVerificationUrl(address: ServiceAddress): string;
  validateStatus(status: number): boolean;
}
