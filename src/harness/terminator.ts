import { spawn, type ChildProcess } from 'child_process';
import kill from 'tree-kill';
import { TerminationFailure } from '../errors.js';
import type { ProcessExit, TerminationResult } from '../types.js';

export interface TerminateOptions {
  interruptTimeoutMs: number;
  killTimeoutMs: number;
  /** Signal every descendant too, not just the direct child. */
  killTree: boolean;
}

export function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

export function waitForExit(child: ChildProcess): Promise<ProcessExit> {
  if (hasExited(child)) {
    return Promise.resolve({ code: child.exitCode, signal: child.signalCode });
  }
  return new Promise((resolve) => {
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
}

export function within<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

function signalDirect(pid: number, signal: NodeJS.Signals): Promise<void> {
  try {
    process.kill(pid, signal);
  } catch (error) {
    if (!isMissingProcess(error)) {
      return Promise.reject(error);
    }
  }
  return Promise.resolve();
}

// tree-kill spawns this to list descendants and never listens for its errors
const TREE_LISTER = process.platform === 'darwin' ? 'pgrep' : 'ps';
const TREE_SIGNAL_TIMEOUT_MS = 2000;

export function canSignalTree(): Promise<boolean> {
  if (process.platform === 'win32') {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const lister = spawn(TREE_LISTER, ['-p', String(process.pid)], { stdio: 'ignore' });
    lister.once('error', () => resolve(false));
    lister.once('spawn', () => resolve(true));
  });
}

function signalTree(pid: number, signal: NodeJS.Signals): Promise<true> {
  return new Promise((resolve, reject) => {
    kill(pid, signal, (error?: Error) => {
      if (error) {
        reject(error);
      } else {
        resolve(true);
      }
    });
  });
}

/**
 * Signals `pid`, or its whole tree with `killTree`. Falls back to signalling
 * the pid alone when the tree can't be listed or tree-kill fails or stalls.
 */
export async function sendSignal(
  pid: number,
  signal: NodeJS.Signals,
  killTree: boolean
): Promise<void> {
  if (!killTree) {
    return signalDirect(pid, signal);
  }

  if (!(await canSignalTree())) {
    console.error(`[harness] ${TREE_LISTER} not available, sending ${signal} to ${pid} only`);
    return signalDirect(pid, signal);
  }

  try {
    const sent = await within(signalTree(pid, signal), TREE_SIGNAL_TIMEOUT_MS);
    if (sent) return;
    console.error(`[harness] tree-kill ${signal} for ${pid} stalled, signalling it directly`);
  } catch (error) {
    console.error(`[harness] tree-kill ${signal} for ${pid} failed, signalling it directly:`, error);
  }
  return signalDirect(pid, signal);
}

/**
 * Interrupt, wait, kill, wait. Resolves once the child has been reaped and
 * throws TerminationFailure when even SIGKILL could not get rid of it.
 */
export async function terminateProcess(
  child: ChildProcess,
  options: TerminateOptions
): Promise<TerminationResult> {
  const pid = child.pid;
  const exited = waitForExit(child);

  if (pid === undefined) {
    return { method: 'not-started' };
  }
  if (hasExited(child)) {
    return { pid, method: 'already-exited', exit: await exited };
  }

  try {
    await sendSignal(pid, 'SIGINT', options.killTree);
  } catch (error) {
    // Keep going: SIGKILL below is the backstop either way
    console.error(`[harness] Failed to interrupt process ${pid}:`, error);
  }

  const interrupted = await within(exited, options.interruptTimeoutMs);
  if (interrupted) {
    return { pid, method: 'interrupt', exit: interrupted };
  }

  console.error(
    `[harness] Process ${pid} still running ${options.interruptTimeoutMs}ms after SIGINT, sending SIGKILL`
  );

  try {
    await sendSignal(pid, 'SIGKILL', options.killTree);
  } catch (error) {
    if (!hasExited(child)) {
      throw new TerminationFailure(`Failed to kill process ${pid}`, pid, { cause: error });
    }
  }

  const killed = await within(exited, options.killTimeoutMs);
  if (!killed) {
    throw new TerminationFailure(
      `Process ${pid} did not exit within ${options.killTimeoutMs}ms of SIGKILL`,
      pid
    );
  }

  return { pid, method: 'kill', exit: killed };
}
