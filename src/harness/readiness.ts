import type { Readable } from 'stream';
import type { ReadinessOutcome } from '../types.js';

export const MAX_CAPTURED_LINES = 200;

export interface ScanOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onLine?: (line: string) => void;
}

/**
 * Reads `stream` line by line until a line matches `pattern`, the stream
 * closes, `timeoutMs` passes or `signal` aborts. Whatever happens, the stream
 * is left flowing so the writer never stalls on a full pipe.
 */
export function scanForReadiness(
  stream: Readable,
  pattern: RegExp,
  options: ScanOptions
): Promise<ReadinessOutcome> {
  return new Promise((resolve) => {
    const output: string[] = [];
    let pending = '';
    let settled = false;

    const capture = (line: string) => {
      output.push(line);
      if (output.length > MAX_CAPTURED_LINES) {
        output.shift();
      }
      options.onLine?.(line);
    };

    const finish = (outcome: ReadinessOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
      stream.off('data', onData);
      stream.off('close', onClose);
      stream.resume();
      resolve(outcome);
    };

    const handleLine = (line: string) => {
      capture(line);
      if (pattern.test(line)) {
        finish({ status: 'ready', line, output });
      }
    };

    const onData = (chunk: string) => {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? '';
      for (const line of lines) {
        handleLine(line);
        if (settled) return;
      }
    };

    const onClose = () => {
      if (pending.length > 0) {
        const last = pending;
        pending = '';
        handleLine(last);
      }
      finish({ status: 'not-ready', reason: 'closed', output });
    };

    const onAbort = () => finish({ status: 'not-ready', reason: 'aborted', output });

    const timeout = setTimeout(
      () => finish({ status: 'not-ready', reason: 'timeout', output }),
      options.timeoutMs
    );

    if (options.signal?.aborted) {
      onAbort();
      return;
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    stream.setEncoding('utf8');
    stream.on('data', onData);
    stream.once('close', onClose);

    // The stream may already be gone when the child died before we got here
    if (stream.destroyed) {
      onClose();
    }
  });
}
