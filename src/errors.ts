import { formatAddress } from './harness/address.js';
import type { NotReadyReason, ServiceAddress } from './types.js';

export class HarnessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends HarnessError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class LaunchError extends HarnessError {
  constructor(
    readonly command: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to launch ${command}: ${detail}`, { cause });
  }
}

export interface NotReadyDetails {
  output: string[];
  exitCode?: number | null;
}

export class NotReadyError extends HarnessError {
  readonly output: string[];
  readonly exitCode: number | null;

  constructor(
    message: string,
    readonly reason: NotReadyReason,
    details: NotReadyDetails
  ) {
    super(message);
    this.output = details.output;
    this.exitCode = details.exitCode ?? null;
  }
}

export class ReadinessTimeoutError extends NotReadyError {
  constructor(
    readonly timeoutMs: number,
    details: NotReadyDetails
  ) {
    super(`Service did not report readiness within ${timeoutMs}ms`, 'timeout', details);
  }
}

export interface VerificationFailureDetails {
  url: string;
  status?: number;
  body?: string;
  cause?: unknown;
}

export class VerificationFailure extends HarnessError {
  readonly url: string;
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: VerificationFailureDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
  }
}

export class TerminationFailure extends HarnessError {
  /** Failure of an earlier stage that was already in flight when teardown failed. */
  previous?: unknown;

  constructor(
    message: string,
    readonly pid: number | undefined,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class AddressInUseError extends HarnessError {
  constructor(
    readonly address: ServiceAddress,
    readonly ownerPid: number
  ) {
    super(`Address ${formatAddress(address)} is already claimed by process ${ownerPid}`);
  }
}
