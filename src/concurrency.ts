import { setImmediate as scheduleImmediate } from 'node:timers';

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  abandoned: boolean;
}

export interface AcquireOptions {
  signal?: AbortSignal;
}

export class AcquireAbortedError extends Error {
  constructor() {
    super('acquire aborted');
    this.name = 'AbortError';
  }
}

/**
 * Counting semaphore. Used to bound HTTP handlers and tool-server handshakes.
 * Waiters are served first-come; an aborted waiter gives up its place.
 */
export class ConcurrencyLimiter {
  readonly capacity: number;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number) {
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new RangeError(`concurrency capacity must be a positive number, got ${String(capacity)}`);
    }
    this.capacity = Math.floor(capacity);
  }

  get active(): number {
    return this.inUse;
  }

  get waiting(): number {
    return this.waiters.filter((w) => !w.abandoned).length;
  }

  async acquire(opts: AcquireOptions = {}): Promise<Release> {
    const { signal } = opts;
    if (signal?.aborted === true) throw new AcquireAbortedError();
    if (this.inUse < this.capacity) {
      this.inUse += 1;
      return this.releaser();
    }
    return await new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => {
        waiter.abandoned = true;
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new AcquireAbortedError());
      };
      const waiter: Waiter = {
        abandoned: false,
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Run `task` inside a slot. */
  async run<T>(task: () => Promise<T>, opts: AcquireOptions = {}): Promise<T> {
    const release = await this.acquire(opts);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let done = false;
    return () => {
      if (done) return;
      done = true;
      this.inUse = Math.max(0, this.inUse - 1);
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.waiters.find((w) => !w.abandoned);
    if (next === undefined || this.inUse >= this.capacity) return;
    this.waiters.splice(this.waiters.indexOf(next), 1);
    this.inUse += 1;
    const release = this.releaser();
    // grant on a later tick so the releasing caller finishes first
    scheduleImmediate(() => { next.grant(release); });
  }
}
