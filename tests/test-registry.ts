import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { AddressInUseError } from '../src/errors.js';
import { AddressRegistry, isProcessAlive } from '../src/harness/registry.js';
import { catchError, deadPid } from './helpers/fake-service.js';

const address = { host: '127.0.0.1', port: 8888 };

describe('AddressRegistry', () => {
  let baseDir: string;
  let registry: AddressRegistry;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'harness-registry-'));
    registry = new AddressRegistry(baseDir);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('records a claim until it is released', async () => {
    const release = await registry.claim(address);

    const claims = await registry.listClaims();
    expect(claims).toHaveLength(1);
    expect(claims[0]).toMatchObject({ address, pid: process.pid });

    await release();
    expect(await registry.listClaims()).toEqual([]);
  });

  it('refuses an address held by a live process', async () => {
    const release = await registry.claim(address);

    const error = await catchError(registry.claim(address));
    expect(error).toBeInstanceOf(AddressInUseError);
    expect(error).toMatchObject({ address, ownerPid: process.pid });

    await release();
  });

  it('lets different ports be claimed side by side', async () => {
    const releaseA = await registry.claim(address);
    const releaseB = await registry.claim({ host: '127.0.0.1', port: 8889 });

    expect(await registry.listClaims()).toHaveLength(2);

    await releaseA();
    await releaseB();
  });

  it('takes over a claim whose owner has died', async () => {
    const pid = deadPid();
    await registry.claim(address, pid);

    const release = await registry.claim(address);
    const claims = await registry.listClaims();
    expect(claims).toHaveLength(1);
    expect(claims[0]?.pid).toBe(process.pid);

    await release();
  });

  it('does not drop a newer claim when a stale owner releases', async () => {
    const releaseStale = await registry.claim(address, deadPid());
    const releaseCurrent = await registry.claim(address);

    await releaseStale();
    expect(await registry.listClaims()).toHaveLength(1);

    await releaseCurrent();
    await releaseCurrent();
    expect(await registry.listClaims()).toEqual([]);
  });

  it('grants exactly one of two concurrent claims', async () => {
    const results = await Promise.allSettled([registry.claim(address), registry.claim(address)]);

    const granted = results.filter((result) => result.status === 'fulfilled');
    const refused = results.filter((result) => result.status === 'rejected');
    expect(granted).toHaveLength(1);
    expect(refused).toHaveLength(1);
  });

  it('starts over from a malformed claims file', async () => {
    await writeFile(join(baseDir, 'claims.json'), JSON.stringify({ claims: 5 }));

    const release = await registry.claim(address);
    expect(await registry.listClaims()).toHaveLength(1);
    await release();
  });

  it('starts over from a truncated claims file', async () => {
    await writeFile(join(baseDir, 'claims.json'), '{"claims": {');

    const release = await registry.claim(address);
    const claims = await registry.listClaims();
    expect(claims).toHaveLength(1);
    expect(claims[0]).toMatchObject({ address, pid: process.pid });
    await release();
    expect(await registry.listClaims()).toEqual([]);
  });
});

describe('isProcessAlive', () => {
  it('knows the current process is alive and an exited one is not', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
    expect(isProcessAlive(deadPid())).toBe(false);
  });
});
