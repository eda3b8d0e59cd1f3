export type HarnessStatus =
  | 'idle'
  | 'starting'
  | 'ready'
  | 'not-ready'
  | 'verifying'
  | 'terminating'
  | 'terminated';

export interface ServiceAddress {
  host: string; // "127.0.0.1", "localhost" or an IPv6 literal without brackets
  port: number;
}

export type Scheme = 'http' | 'https';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type TerminationMethod = 'not-started' | 'already-exited' | 'interrupt' | 'kill';

export interface TerminationResult {
  pid?: number;
  method: TerminationMethod;
  exit?: ProcessExit; // absent when nothing was launched
}

export interface VerificationResult {
  url: string;
  status: number;
  body: string;
}

export type NotReadyReason = 'closed' | 'timeout' | 'aborted';

export type ReadinessOutcome =
  | { status: 'ready'; line: string; output: string[] }
  | { status: 'not-ready'; reason: NotReadyReason; output: string[] };
