import { VerificationFailure } from '../errors.js';
import type { VerificationResult } from '../types.js';

export interface VerifyOptions {
  timeoutMs: number;
  validateStatus?: (status: number) => boolean;
}

function describeTransportError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // fetch wraps the socket error ("fetch failed"), the useful part is the cause
  if (error.cause instanceof Error) return `${error.message} (${error.cause.message})`;
  return error.message;
}

/** One GET, no retries. */
export async function verifyEndpoint(
  url: string,
  options: VerifyOptions
): Promise<VerificationResult> {
  const validateStatus = options.validateStatus ?? ((status: number) => status === 200);
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  let status: number;
  let body: string;
  try {
    const response = await fetch(url, { signal: controller.signal });
    status = response.status;
    body = await response.text();
  } catch (error) {
    const detail = controller.signal.aborted
      ? `timed out after ${options.timeoutMs}ms`
      : describeTransportError(error);
    throw new VerificationFailure(`GET ${url} failed: ${detail}`, { url, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  if (!validateStatus(status)) {
    throw new VerificationFailure(`GET ${url} returned unexpected status ${status}`, {
      url,
      status,
      body,
    });
  }

  return { url, status, body };
}
