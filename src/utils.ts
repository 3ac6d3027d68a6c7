import type { LogEntry } from './types.js';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

export const delay = (ms: number): Promise<void> => new Promise((resolve) => {
  if (ms <= 0) {
    resolve();
    return;
  }
  setTimeout(resolve, ms);
});

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label = 'operation'): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const timerPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timerPromise]);
  } finally {
    if (timeout !== undefined) clearTimeout(timeout);
  }
}

export const buildLogEntry = (
  remoteIdentifier: string,
  message: string,
  opts: Partial<Omit<LogEntry, 'remoteIdentifier' | 'message'>> = {}
): LogEntry => ({
  timestamp: opts.timestamp ?? Date.now(),
  severity: opts.severity ?? 'VRB',
  type: opts.type ?? 'server',
  direction: opts.direction ?? 'response',
  remoteIdentifier,
  fatal: opts.fatal ?? false,
  message,
  ...(opts.conversationId !== undefined ? { conversationId: opts.conversationId } : {}),
  ...(opts.streamId !== undefined ? { streamId: opts.streamId } : {}),
  ...(opts.details !== undefined ? { details: opts.details } : {}),
});

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) return;
  try {
    sink(message);
  } catch {
    /* ignore sink failures */
  }
}
