import { spawn, type ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import type { HarnessConfig } from '../config.js';
import {
  HarnessError,
  LaunchError,
  NotReadyError,
  ReadinessTimeoutError,
  TerminationFailure,
} from '../errors.js';
import type {
  HarnessStatus,
  ServiceAddress,
  TerminationResult,
  VerificationResult,
} from '../types.js';
import { formatAddress } from './address.js';
import { MidiServiceAdapter, type ServiceAdapter } from './adapters/index.js';
import { scanForReadiness } from './readiness.js';
import type { AddressRegistry, ReleaseClaim } from './registry.js';
import { hasExited, terminateProcess, waitForExit, within } from './terminator.js';
import { verifyEndpoint } from './verifier.js';

export const DEFAULT_READINESS_TIMEOUT_MS = 60000;
export const DEFAULT_INTERRUPT_TIMEOUT_MS = 10000;
export const DEFAULT_KILL_TIMEOUT_MS = 5000;
export const DEFAULT_VERIFY_TIMEOUT_MS = 10000;
const EXIT_CODE_WAIT_MS = 1000;

export interface ServiceHarnessOptions {
  command: string;
  args?: string[]; // placed before the adapter's address arguments
  cwd?: string;
  env?: Record<string, string>;
  address: ServiceAddress;
  adapter?: ServiceAdapter;
  readinessTimeoutMs?: number;
  interruptTimeoutMs?: number;
  killTimeoutMs?: number;
  verifyTimeoutMs?: number;
  killTree?: boolean;
  registry?: AddressRegistry;
  signal?: AbortSignal;
  onReady?: (info: HarnessInfo) => void;
  onStop?: (result: TerminationResult) => void;
}

export interface HarnessInfo {
  address: ServiceAddress;
  url: string;
  status: HarnessStatus;
  pid?: number;
  startedAt?: Date;
  readyLine?: string;
  error?: string;
}

export interface HarnessRunResult extends HarnessInfo {
  verification: VerificationResult;
  termination: TerminationResult;
}

export type HarnessEvent =
  | { type: 'status'; status: HarnessStatus }
  | { type: 'ready'; info: HarnessInfo }
  | { type: 'terminated'; result: TerminationResult };

// Children still running when the harness process itself exits get SIGKILL,
// the only thing that can still be done synchronously at that point.
const liveChildren = new Set<ChildProcess>();
let exitHookInstalled = false;

function track(child: ChildProcess): void {
  liveChildren.add(child);
  child.once('exit', () => liveChildren.delete(child));

  if (!exitHookInstalled) {
    exitHookInstalled = true;
    process.once('exit', () => {
      for (const orphan of liveChildren) {
        orphan.kill('SIGKILL');
      }
    });
  }
}

function spawned(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns one child process for one run: launch, wait for the readiness line,
 * verify once, terminate. Termination happens at most once, and `run` and
 * `scoped` make sure it happens on every path.
 */
export class ServiceHarness extends EventEmitter {
  private child?: ChildProcess;
  private status: HarnessStatus = 'idle';
  private readonly adapter: ServiceAdapter;
  private startedAt?: Date;
  private readyLine?: string;
  private error?: string;
  private launching?: Promise<ChildProcess>;
  private termination?: Promise<TerminationResult>;
  private releaseClaim?: ReleaseClaim;

  constructor(private options: ServiceHarnessOptions) {
    super();
    this.adapter = options.adapter ?? new MidiServiceAdapter();
  }

  get address(): ServiceAddress {
    return this.options.address;
  }

  private setStatus(status: HarnessStatus): void {
    if (this.status === status || this.status === 'terminated') return;
    // Teardown can overtake a stage that is still finishing (abort)
    if (this.status === 'terminating' && status !== 'terminated') return;
    this.status = status;
    this.emit('status', { type: 'status', status } satisfies HarnessEvent);
  }

  private onAbort = (): void => {
    if (!this.launching) return;
    console.error(`[harness] Run aborted, terminating ${formatAddress(this.address)}`);
    this.terminate().catch((error) => {
      console.error('[harness] Termination after abort failed:', error);
    });
  };

  launch(): Promise<ChildProcess> {
    if (this.launching || this.termination) {
      return Promise.reject(new HarnessError(`Cannot launch: harness is ${this.status}`));
    }
    this.options.signal?.addEventListener('abort', this.onAbort, { once: true });
    this.launching = this.spawnChild();
    return this.launching;
  }

  private async spawnChild(): Promise<ChildProcess> {
    if (this.options.signal?.aborted) {
      this.setStatus('terminated');
      throw new NotReadyError('Run aborted before launch', 'aborted', { output: [] });
    }

    this.setStatus('starting');
    this.startedAt = new Date();

    if (this.options.registry) {
      try {
        this.releaseClaim = await this.options.registry.claim(this.address);
      } catch (error) {
        this.error = errorMessage(error);
        this.setStatus('terminated');
        throw error;
      }
    }

    const { command } = this.options;
    const args = [...(this.options.args ?? []), ...this.adapter.getLaunchArgs(this.address)];
    console.error(`[harness] Launching ${command} ${args.join(' ')}`);

    const child = spawn(command, args, {
      cwd: this.options.cwd,
      env: {
        ...process.env,
        ...this.adapter.getEnvVars(this.address),
        ...this.options.env,
      },
      stdio: ['ignore', 'pipe', 'inherit'],
      shell: false,
    });

    try {
      await spawned(child);
    } catch (error) {
      this.error = errorMessage(error);
      await this.releaseAddress();
      this.setStatus('terminated');
      throw new LaunchError(command, error);
    }

    child.on('error', (error) => {
      console.error(`[harness] Process ${child.pid} error:`, error);
    });
    child.once('exit', (code, signal) => {
      console.error(`[harness] Process ${child.pid} exited (${code ?? signal})`);
    });
    track(child);

    this.child = child;
    return child;
  }

  async waitUntilReady(): Promise<HarnessInfo> {
    if (this.options.signal?.aborted) {
      throw new NotReadyError('Run aborted while waiting for readiness', 'aborted', { output: [] });
    }
    const child = this.child;
    if (!child || this.status !== 'starting') {
      throw new HarnessError(`Cannot wait for readiness: harness is ${this.status}`);
    }
    if (!child.stdout) {
      throw new HarnessError('Service stdout is not captured');
    }

    const timeoutMs = this.options.readinessTimeoutMs ?? DEFAULT_READINESS_TIMEOUT_MS;
    const outcome = await scanForReadiness(child.stdout, this.adapter.getReadyPattern(this.address), {
      timeoutMs,
      signal: this.options.signal,
    });

    if (outcome.status === 'ready') {
      this.readyLine = outcome.line;
      this.setStatus('ready');
      const info = this.getInfo();
      console.error(`[harness] Service ready at ${info.url}`);
      this.emit('ready', { type: 'ready', info } satisfies HarnessEvent);
      this.options.onReady?.(info);
      return info;
    }

    this.setStatus('not-ready');
    // stdout closes before the exit event arrives
    const exit =
      outcome.reason === 'closed' ? await within(waitForExit(child), EXIT_CODE_WAIT_MS) : undefined;
    const details = { output: outcome.output, exitCode: exit?.code ?? child.exitCode };
    const error =
      outcome.reason === 'timeout'
        ? new ReadinessTimeoutError(timeoutMs, details)
        : outcome.reason === 'aborted'
          ? new NotReadyError('Run aborted while waiting for readiness', 'aborted', details)
          : new NotReadyError(
              `Service output closed before it reported ${formatAddress(this.address)}`,
              'closed',
              details
            );
    this.error = error.message;
    throw error;
  }

  /** Issues the single verification request. Only valid once, right after readiness. */
  async verify(): Promise<VerificationResult> {
    if (this.status !== 'ready') {
      throw new HarnessError(`Cannot verify: harness is ${this.status}`);
    }
    this.setStatus('verifying');

    try {
      const result = await verifyEndpoint(this.adapter.getVerificationUrl(this.address), {
        timeoutMs: this.options.verifyTimeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS,
        validateStatus: (status) => this.adapter.validateStatus(status),
      });
      console.error(`[harness] GET ${result.url} -> ${result.status}`);
      return result;
    } catch (error) {
      this.error = errorMessage(error);
      throw error;
    }
  }

  terminate(): Promise<TerminationResult> {
    this.termination ??= this.runTermination();
    return this.termination;
  }

  private async runTermination(): Promise<TerminationResult> {
    this.options.signal?.removeEventListener('abort', this.onAbort);
    // A launch in flight has to finish first, or its child would escape
    await this.launching?.catch(() => undefined);

    const child = this.child;
    if (!child) {
      await this.releaseAddress();
      this.setStatus('terminated');
      const result: TerminationResult = { method: 'not-started' };
      this.emit('terminated', { type: 'terminated', result } satisfies HarnessEvent);
      this.options.onStop?.(result);
      return result;
    }

    this.setStatus('terminating');
    let result: TerminationResult;
    try {
      result = await terminateProcess(child, {
        interruptTimeoutMs: this.options.interruptTimeoutMs ?? DEFAULT_INTERRUPT_TIMEOUT_MS,
        killTimeoutMs: this.options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS,
        killTree: this.options.killTree ?? true,
      });
    } catch (error) {
      // The address stays claimed: something may still be listening on it
      this.error = errorMessage(error);
      console.error(`[harness] ${this.error}`);
      throw error;
    } finally {
      child.stdout?.destroy();
    }

    console.error(`[harness] Process ${result.pid} stopped (${result.method})`);
    await this.releaseAddress();
    this.setStatus('terminated');
    this.emit('terminated', { type: 'terminated', result } satisfies HarnessEvent);
    this.options.onStop?.(result);
    return result;
  }

  private async releaseAddress(): Promise<void> {
    const release = this.releaseClaim;
    this.releaseClaim = undefined;
    await release?.();
  }

  /**
   * Launches, waits for readiness, hands the running service to `fn` and
   * terminates afterwards whatever happened. A teardown failure wins over an
   * earlier failure, which is kept on `TerminationFailure.previous`.
   */
  async scoped<T>(fn: (info: HarnessInfo) => Promise<T>): Promise<T> {
    let outcome: { ok: true; value: T } | { ok: false; error: unknown };
    try {
      await this.launch();
      const info = await this.waitUntilReady();
      outcome = { ok: true, value: await fn(info) };
    } catch (error) {
      outcome = { ok: false, error };
    }

    try {
      await this.terminate();
    } catch (error) {
      if (!outcome.ok && error instanceof TerminationFailure) {
        console.error('[harness] Run had already failed before teardown:', outcome.error);
        error.previous = outcome.error;
      }
      throw error;
    }

    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  async run(): Promise<HarnessRunResult> {
    const verification = await this.scoped(() => this.verify());
    const termination = await this.terminate();
    return { ...this.getInfo(), verification, termination };
  }

  getInfo(): HarnessInfo {
    const info: HarnessInfo = {
      address: this.address,
      url: this.adapter.getBaseUrl(this.address),
      status: this.status,
    };

    if (this.child?.pid !== undefined) {
      info.pid = this.child.pid;
    }
    if (this.startedAt) {
      info.startedAt = this.startedAt;
    }
    if (this.readyLine !== undefined) {
      info.readyLine = this.readyLine;
    }
    if (this.error !== undefined) {
      info.error = this.error;
    }

    return info;
  }

  isRunning(): boolean {
    return this.child !== undefined && !hasExited(this.child);
  }
}

export interface LaunchSpec {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  registry?: AddressRegistry;
}

export function harnessOptionsFromConfig(
  config: HarnessConfig,
  address: ServiceAddress,
  launch: LaunchSpec
): ServiceHarnessOptions {
  return {
    ...launch,
    address,
    adapter: new MidiServiceAdapter({
      scheme: config.scheme,
      verifyPath: config.verifyPath,
      expectedStatus: config.expectedStatus,
    }),
    readinessTimeoutMs: config.readinessTimeoutMs,
    interruptTimeoutMs: config.interruptTimeoutMs,
    killTimeoutMs: config.killTimeoutMs,
    verifyTimeoutMs: config.verifyTimeoutMs,
    killTree: config.killTree,
  };
}

/** Runs `fn` against a ready service and always tears it down. */
export function withService<T>(
  options: ServiceHarnessOptions,
  fn: (info: HarnessInfo) => Promise<T>
): Promise<T> {
  return new ServiceHarness(options).scoped(fn);
}

export function runVerification(options: ServiceHarnessOptions): Promise<HarnessRunResult> {
  return new ServiceHarness(options).run();
}
