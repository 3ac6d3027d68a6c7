import { Mutex } from 'async-mutex';

import type { LogEntry, LogSink } from '../types.js';

import { StreamExistsError, StreamNotFoundError, toErrorMessage } from '../errors.js';
import { buildLogEntry, warn } from '../utils.js';

import { DEFAULT_STREAM_CAPACITY, EventStream, type StreamItem } from './event-stream.js';

export interface StreamRegistryOptions {
  capacity?: number;
  /** Delay between a completed stream's terminal read and its removal; 0 removes at once. */
  graceMs?: number;
  /** Completed streams nobody reads to the end are removed after this long. */
  unclaimedTtlMs?: number;
  onLog?: LogSink;
}

export const DEFAULT_GRACE_MS = 5_000;
export const DEFAULT_UNCLAIMED_TTL_MS = 600_000;

/**
 * Process-wide table of active event streams keyed by stream id.
 * Insert and delete run under a mutex; reads do not.
 */
export class StreamRegistry<T> {
  private readonly streams = new Map<string, EventStream<T>>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly mutex = new Mutex();
  private readonly capacity: number;
  private readonly graceMs: number;
  private readonly unclaimedTtlMs: number;
  private readonly onLog?: LogSink;

  constructor(opts: StreamRegistryOptions = {}) {
    this.capacity = opts.capacity ?? DEFAULT_STREAM_CAPACITY;
    this.graceMs = Math.max(0, opts.graceMs ?? DEFAULT_GRACE_MS);
    this.unclaimedTtlMs = Math.max(0, opts.unclaimedTtlMs ?? DEFAULT_UNCLAIMED_TTL_MS);
    this.onLog = opts.onLog;
  }

  get size(): number {
    return this.streams.size;
  }

  has(id: string): boolean {
    return this.streams.has(id);
  }

  get(id: string): EventStream<T> | undefined {
    return this.streams.get(id);
  }

  async create(id: string): Promise<EventStream<T>> {
    return await this.mutex.runExclusive(() => {
      if (this.streams.has(id)) throw new StreamExistsError(id);
      return this.insert(id);
    });
  }

  async getOrCreate(id: string): Promise<EventStream<T>> {
    return await this.mutex.runExclusive(() => this.streams.get(id) ?? this.insert(id));
  }

  async delete(id: string): Promise<boolean> {
    return await this.mutex.runExclusive(() => this.remove(id));
  }

  /**
   * Attach a reader. The lookup is eager: an unknown id throws
   * `StreamNotFoundError` here, not on first iteration.
   */
  subscribe(id: string, fromIndex = 0, signal?: AbortSignal): AsyncGenerator<StreamItem<T>, void, undefined> {
    const stream = this.streams.get(id);
    if (stream === undefined) throw new StreamNotFoundError(id);
    return this.consume(stream, fromIndex, signal);
  }

  /** Complete and drop every stream; pending timers are cleared. */
  async shutdown(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.timers.forEach((timer) => { clearTimeout(timer); });
      this.timers.clear();
      this.streams.forEach((stream) => { stream.markCompleted(); });
      this.streams.clear();
    });
  }

  private async *consume(stream: EventStream<T>, fromIndex: number, signal: AbortSignal | undefined): AsyncGenerator<StreamItem<T>, void, undefined> {
    let terminalRead = false;
    try {
      yield* stream.subscribe(fromIndex, signal);
      terminalRead = stream.completed && signal?.aborted !== true;
    } finally {
      if (terminalRead) {
        this.scheduleRemoval(stream, this.graceMs, 'terminal read', true);
      }
    }
  }

  private insert(id: string): EventStream<T> {
    const stream = new EventStream<T>(id, {
      capacity: this.capacity,
      onEvict: (evictedIndex) => {
        this.log('WRN', `stream over capacity ${String(this.capacity)}, evicted event ${String(evictedIndex)}`, id);
      },
    });
    this.streams.set(id, stream);
    void stream.completion.then(() => {
      this.scheduleRemoval(stream, this.unclaimedTtlMs, 'unclaimed', false);
    });
    this.log('TRC', 'stream created', id);
    return stream;
  }

  private remove(id: string): boolean {
    const timer = this.timers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
    const removed = this.streams.delete(id);
    if (removed) this.log('TRC', 'stream removed', id);
    return removed;
  }

  private scheduleRemoval(stream: EventStream<T>, delayMs: number, reason: string, replace: boolean): void {
    const id = stream.id;
    // a newer stream under the same id is not ours to remove
    if (this.streams.get(id) !== stream) return;
    const existing = this.timers.get(id);
    if (existing !== undefined) {
      if (!replace) return;
      clearTimeout(existing);
      this.timers.delete(id);
    }
    const run = (): void => {
      this.timers.delete(id);
      this.mutex
        .runExclusive(() => {
          if (this.streams.get(id) === stream) this.remove(id);
        })
        .catch((e: unknown) => { warn(`stream removal failed for '${id}': ${toErrorMessage(e)}`); });
      this.log('TRC', `stream removal (${reason})`, id);
    };
    if (delayMs <= 0) {
      run();
      return;
    }
    const timer = setTimeout(run, delayMs);
    timer.unref();
    this.timers.set(id, timer);
  }

  private log(severity: LogEntry['severity'], message: string, streamId: string): void {
    try {
      this.onLog?.(buildLogEntry('stream:registry', message, { severity, type: 'stream', streamId }));
    } catch (e) {
      warn(`stream registry onLog failed: ${toErrorMessage(e)}`);
    }
  }
}
