import { createServer, isIPv6 } from 'net';
import type { Scheme, ServiceAddress } from '../types.js';

export function formatAddress(address: ServiceAddress): string {
  const host = isIPv6(address.host) ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}

export function serviceUrl(address: ServiceAddress, scheme: Scheme, path = ''): string {
  return `${scheme}://${formatAddress(address)}${path}`;
}

export function addressKey(address: ServiceAddress): string {
  return formatAddress(address).toLowerCase();
}

export function isPortAvailable(port: number, host = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer()
      .once('error', () => {
        resolve(false);
      })
      .once('listening', () => {
        server.close(() => {
          resolve(true);
        });
      })
      .listen(port, host);
  });
}

function ephemeralPort(host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.once('listening', () => {
      const bound = server.address();
      if (bound === null || typeof bound === 'string') {
        server.close(() => reject(new Error(`Could not read bound port on ${host}`)));
        return;
      }
      server.close(() => resolve(bound.port));
    });
    server.listen(0, host);
  });
}

/**
 * Returns `preferred` when it can be bound on `host`, otherwise a port the OS
 * hands out. Port 0 always asks the OS.
 */
export async function allocatePort(host: string, preferred = 0): Promise<number> {
  if (preferred > 0 && (await isPortAvailable(preferred, host))) {
    return preferred;
  }
  return ephemeralPort(host);
}

export async function resolveAddress(host: string, port: number): Promise<ServiceAddress> {
  if (port > 0) {
    return { host, port };
  }
  return { host, port: await allocatePort(host) };
}
