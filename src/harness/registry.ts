import { readFile, writeFile, mkdir, rename, unlink } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomBytes } from 'crypto';
import lockfile from 'proper-lockfile';
import { z } from 'zod';
import { AddressInUseError } from '../errors.js';
import type { ServiceAddress } from '../types.js';
import { addressKey, formatAddress } from './address.js';

const AddressClaimSchema = z.object({
  address: z.object({ host: z.string(), port: z.number().int() }),
  pid: z.number().int(), // process that owns the harness run
  runId: z.string(),
  claimedAt: z.string(),
});

const ClaimFileSchema = z.object({
  claims: z.record(AddressClaimSchema),
  lastUpdated: z.string(),
});

export type AddressClaim = z.infer<typeof AddressClaimSchema>;
export type ClaimFile = z.infer<typeof ClaimFileSchema>;

export type ReleaseClaim = () => Promise<void>;

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * Cross-process record of which addresses are in use by a harness run. Backed
 * by a JSON file guarded with proper-lockfile; claims whose owner has died
 * are treated as free.
 */
export class AddressRegistry {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private baseDir: string = join(tmpdir(), 'service-harness')) {}

  getBaseDir(): string {
    return this.baseDir;
  }

  private claimsPath(): string {
    return join(this.baseDir, 'claims.json');
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    // Serialize in-process callers first; proper-lockfile then covers other processes
    const run = this.queue.then(async () => {
      await mkdir(this.baseDir, { recursive: true });
      const release = await lockfile.lock(this.baseDir, {
        lockfilePath: join(this.baseDir, 'claims.lock'),
        stale: 30000,
        retries: {
          retries: 12,
          factor: 1.2,
          minTimeout: 40,
          maxTimeout: 400,
        },
      });
      try {
        return await fn();
      } finally {
        await release();
      }
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  async read(): Promise<ClaimFile> {
    let content: string;
    try {
      content = await readFile(this.claimsPath(), 'utf-8');
    } catch {
      return { claims: {}, lastUpdated: new Date().toISOString() };
    }
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      console.error(`[registry] Ignoring unreadable ${this.claimsPath()}:`, error);
      return { claims: {}, lastUpdated: new Date().toISOString() };
    }

    const parsed = ClaimFileSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[registry] Ignoring malformed ${this.claimsPath()}`);
      return { claims: {}, lastUpdated: new Date().toISOString() };
    }
    return parsed.data;
  }

  private async write(file: ClaimFile): Promise<void> {
    const path = this.claimsPath();
    file.lastUpdated = new Date().toISOString();

    const tempPath = `${path}.tmp.${randomBytes(8).toString('hex')}`;
    try {
      await writeFile(tempPath, JSON.stringify(file, null, 2), {
        encoding: 'utf-8',
        mode: 0o600,
      });
      await rename(tempPath, path);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }
  }

  async claim(address: ServiceAddress, pid: number = process.pid): Promise<ReleaseClaim> {
    const key = addressKey(address);
    const runId = randomBytes(8).toString('hex');

    await this.withLock(async () => {
      const file = await this.read();
      const existing = file.claims[key];

      if (existing && isProcessAlive(existing.pid)) {
        throw new AddressInUseError(address, existing.pid);
      }
      if (existing) {
        console.error(
          `[registry] Reclaiming ${formatAddress(address)} from dead process ${existing.pid}`
        );
      }

      file.claims[key] = { address, pid, runId, claimedAt: new Date().toISOString() };
      await this.write(file);
    });

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      await this.withLock(async () => {
        const file = await this.read();
        if (file.claims[key]?.runId !== runId) return;
        delete file.claims[key];
        await this.write(file);
      });
    };
  }

  async listClaims(): Promise<AddressClaim[]> {
    const file = await this.read();
    return Object.values(file.claims);
  }
}
