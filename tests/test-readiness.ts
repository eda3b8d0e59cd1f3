import { PassThrough } from 'stream';
import { describe, it, expect } from 'vitest';
import { addressPattern } from '../src/harness/adapters/index.js';
import { MAX_CAPTURED_LINES, scanForReadiness } from '../src/harness/readiness.js';

const pattern = addressPattern({ host: '127.0.0.1', port: 8888 });

describe('scanForReadiness', () => {
  it('is ready on the first line carrying the address', async () => {
    const stream = new PassThrough();
    const pending = scanForReadiness(stream, pattern, { timeoutMs: 2000 });

    stream.write('booting\n');
    stream.write('Listening on 127.0.0.1:8888\n');

    await expect(pending).resolves.toEqual({
      status: 'ready',
      line: 'Listening on 127.0.0.1:8888',
      output: ['booting', 'Listening on 127.0.0.1:8888'],
    });
  });

  it('reassembles a line split across chunks and strips CRLF', async () => {
    const stream = new PassThrough();
    const pending = scanForReadiness(stream, pattern, { timeoutMs: 2000 });

    stream.write('Listening on 127.0.');
    stream.write('0.1:8888\r\n');

    const outcome = await pending;
    expect(outcome.status).toBe('ready');
    expect(outcome.status === 'ready' && outcome.line).toBe('Listening on 127.0.0.1:8888');
  });

  it('reports closed when the stream ends without the address', async () => {
    const stream = new PassThrough();
    const pending = scanForReadiness(stream, pattern, { timeoutMs: 2000 });

    stream.write('Listening\n');
    stream.write('Listening on 127.0.0.1:9999\n');
    stream.end();

    await expect(pending).resolves.toEqual({
      status: 'not-ready',
      reason: 'closed',
      output: ['Listening', 'Listening on 127.0.0.1:9999'],
    });
  });

  it('checks a final line that has no newline', async () => {
    const stream = new PassThrough();
    const pending = scanForReadiness(stream, pattern, { timeoutMs: 2000 });

    stream.end('Listening on 127.0.0.1:8888');

    const outcome = await pending;
    expect(outcome.status).toBe('ready');
  });

  it('gives up after the timeout', async () => {
    const stream = new PassThrough();
    const outcome = await scanForReadiness(stream, pattern, { timeoutMs: 50 });

    expect(outcome).toEqual({ status: 'not-ready', reason: 'timeout', output: [] });
  });

  it('stops when the signal aborts', async () => {
    const stream = new PassThrough();
    const controller = new AbortController();
    const pending = scanForReadiness(stream, pattern, {
      timeoutMs: 2000,
      signal: controller.signal,
    });

    stream.write('warming up\n');
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();

    await expect(pending).resolves.toEqual({
      status: 'not-ready',
      reason: 'aborted',
      output: ['warming up'],
    });
  });

  it('returns immediately for an already aborted signal', async () => {
    const stream = new PassThrough();
    const outcome = await scanForReadiness(stream, pattern, {
      timeoutMs: 2000,
      signal: AbortSignal.abort(),
    });

    expect(outcome).toEqual({ status: 'not-ready', reason: 'aborted', output: [] });
  });

  it('keeps the stream flowing after readiness', async () => {
    const stream = new PassThrough();
    const pending = scanForReadiness(stream, pattern, { timeoutMs: 2000 });

    stream.write('Listening on 127.0.0.1:8888\n');
    await pending;

    expect(stream.readableFlowing).toBe(true);
  });

  it('keeps only the most recent lines', async () => {
    const stream = new PassThrough();
    const pending = scanForReadiness(stream, pattern, { timeoutMs: 2000 });

    const lines = Array.from({ length: 250 }, (_, i) => `line ${i}`);
    stream.end(lines.join('\n') + '\n');

    const outcome = await pending;
    expect(outcome.output).toHaveLength(MAX_CAPTURED_LINES);
    expect(outcome.output[0]).toBe('line 50');
    expect(outcome.output[MAX_CAPTURED_LINES - 1]).toBe('line 249');
  });

  it('passes every line to onLine', async () => {
    const stream = new PassThrough();
    const seen: string[] = [];
    const pending = scanForReadiness(stream, pattern, {
      timeoutMs: 2000,
      onLine: (line) => seen.push(line),
    });

    stream.write('one\ntwo\nListening on 127.0.0.1:8888\nthree\n');
    await pending;

    expect(seen).toEqual(['one', 'two', 'Listening on 127.0.0.1:8888']);
  });
});
