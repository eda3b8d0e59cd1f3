import { formatAddress, serviceUrl } from '../address.js';
import type { Scheme, ServiceAddress } from '../../types.js';
import type { ServiceAdapter } from './base.js';

export interface MidiServiceAdapterOptions {
  scheme?: Scheme;
  verifyPath?: string;
  expectedStatus?: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches `host:port` anywhere in a line, but not as the tail of a longer
 * host (`10.127.0.0.1:8888`) or the head of a longer port (`127.0.0.1:88880`).
 */
export function addressPattern(address: ServiceAddress): RegExp {
  return new RegExp(`(?<![\\w.-])${escapeRegExp(formatAddress(address))}(?!\\d)`);
}

export class MidiServiceAdapter implements ServiceAdapter {
  readonly name = 'midi-service';

  private readonly scheme: Scheme;
  private readonly verifyPath: string;
  private readonly expectedStatus: number;

  constructor(options: MidiServiceAdapterOptions = {}) {
    this.scheme = options.scheme ?? 'http';
    this.verifyPath = options.verifyPath ?? '/midi/ports';
    this.expectedStatus = options.expectedStatus ?? 200;
  }

  getLaunchArgs(address: ServiceAddress): string[] {
    return ['--ip', address.host, '--port', String(address.port)];
  }

  getEnvVars(_address: ServiceAddress): Record<string, string> {
    return {};
  }

  getReadyPattern(address: ServiceAddress): RegExp {
    return addressPattern(address);
  }

  getBaseUrl(address: ServiceAddress): string {
    return serviceUrl(address, this.scheme);
  }

  getVerificationUrl(address: ServiceAddress): string {
    return serviceUrl(address, this.scheme, this.verifyPath);
  }

  validateStatus(status: number): boolean {
    return status === this.expectedStatus;
  }
}
