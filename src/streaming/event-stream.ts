import { createDeferred, type Deferred } from '../utils.js';

export const DEFAULT_STREAM_CAPACITY = 1000;

export interface StreamItem<T> {
  /** Absolute position: the n-th event ever added has index n, eviction never shifts it. */
  index: number;
  event: T;
}

export interface EventStreamOptions {
  capacity?: number;
  onEvict?: (evictedIndex: number) => void;
}

const waitOrAbort = async (promise: Promise<void>, signal: AbortSignal | undefined): Promise<void> => {
  if (signal === undefined) {
    await promise;
    return;
  }
  const aborted = createDeferred<void>();
  const onAbort = (): void => { aborted.resolve(); };
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    await Promise.race([promise, aborted.promise]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
};

/**
 * Append-only, bounded, multi-reader buffer with one-way completion.
 *
 * Every `add` and `markCompleted` resolves the current wake deferred and
 * installs a fresh one, so all blocked readers resume together.
 */
export class EventStream<T> {
  readonly id: string;
  readonly createdAt: number;
  readonly capacity: number;
  private readonly events: T[] = [];
  private offset = 0;
  private completedFlag = false;
  private wake: Deferred<void> = createDeferred<void>();
  private readonly completionDeferred = createDeferred<void>();
  private readonly onEvict?: (evictedIndex: number) => void;

  constructor(id: string, opts: EventStreamOptions = {}) {
    this.id = id;
    this.createdAt = Date.now();
    const capacity = opts.capacity ?? DEFAULT_STREAM_CAPACITY;
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new Error(`stream capacity must be a positive number; received ${String(capacity)}`);
    }
    this.capacity = Math.floor(capacity);
    this.onEvict = opts.onEvict;
  }

  get completed(): boolean {
    return this.completedFlag;
  }

  /** Resolves once `markCompleted` has been called. */
  get completion(): Promise<void> {
    return this.completionDeferred.promise;
  }

  /** Index of the oldest event still buffered. */
  get firstIndex(): number {
    return this.offset;
  }

  /** Index the next added event will receive. */
  get nextIndex(): number {
    return this.offset + this.events.length;
  }

  add(event: T): void {
    if (this.completedFlag) {
      throw new Error(`stream '${this.id}' is completed`);
    }
    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.shift();
      const evicted = this.offset;
      this.offset += 1;
      this.onEvict?.(evicted);
    }
    this.signal();
  }

  markCompleted(): void {
    if (this.completedFlag) return;
    this.completedFlag = true;
    this.completionDeferred.resolve();
    this.signal();
  }

  /**
   * Replay from `fromIndex`, then follow live events until completion.
   * Events evicted before they were read are skipped; the gap shows in the
   * indices. Aborting `signal` ends this reader only.
   */
  async *subscribe(fromIndex = 0, signal?: AbortSignal): AsyncGenerator<StreamItem<T>, void, undefined> {
    let cursor = Math.max(0, Math.trunc(fromIndex));
    // eslint-disable-next-line functional/no-loop-statements
    for (;;) {
      if (signal?.aborted === true) return;
      // eslint-disable-next-line functional/no-loop-statements
      for (;;) {
        if (cursor < this.offset) cursor = this.offset;
        if (cursor >= this.nextIndex) break;
        const event = this.events[cursor - this.offset];
        yield { index: cursor, event };
        cursor += 1;
        if (signal !== undefined && signal.aborted) return;
      }
      if (this.completedFlag) return;
      await waitOrAbort(this.wake.promise, signal);
    }
  }

  private signal(): void {
    const current = this.wake;
    this.wake = createDeferred<void>();
    current.resolve();
  }
}
