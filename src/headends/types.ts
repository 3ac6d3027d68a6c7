import type { LogSink } from '../types.js';

export type HeadendClosedEvent =
  | { reason: 'stopped'; graceful: boolean }
  | { reason: 'error'; error: Error };

export interface HeadendContext {
  log: LogSink;
  shutdownSignal: AbortSignal;
}

/** A network surface with a start/stop lifecycle. */
export interface Headend {
  readonly id: string;
  readonly closed: Promise<HeadendClosedEvent>;
  start: (context: HeadendContext) => Promise<void>;
  stop: () => Promise<void>;
}
