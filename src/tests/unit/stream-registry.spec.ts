import { describe, expect, it, vi } from 'vitest';

import type { LogEntry } from '../../types.js';

import { StreamExistsError, StreamNotFoundError } from '../../errors.js';
import { pumpIntoStream } from '../../streaming/stream-pump.js';
import { StreamRegistry } from '../../streaming/stream-registry.js';

const drain = async <T>(iterable: AsyncIterable<{ event: T }>): Promise<T[]> => {
  const out: T[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for await (const item of iterable) out.push(item.event);
  return out;
};

describe('StreamRegistry', () => {
  it('refuses a duplicate id', async () => {
    const registry = new StreamRegistry<string>();
    await registry.create('s1');
    await expect(registry.create('s1')).rejects.toBeInstanceOf(StreamExistsError);
    await registry.shutdown();
  });

  it('returns the existing stream from getOrCreate', async () => {
    const registry = new StreamRegistry<string>();
    const created = await registry.getOrCreate('s1');
    expect(await registry.getOrCreate('s1')).toBe(created);
    expect(registry.size).toBe(1);
    await registry.shutdown();
  });

  it('throws for an unknown id before iteration starts', () => {
    const registry = new StreamRegistry<string>();
    expect(() => registry.subscribe('missing')).toThrow(StreamNotFoundError);
  });

  it('removes a stream after its terminal read', async () => {
    const registry = new StreamRegistry<string>({ graceMs: 0 });
    const stream = await registry.create('s1');
    stream.add('a');
    stream.markCompleted();
    expect(await drain(registry.subscribe('s1'))).toEqual(['a']);
    await vi.waitFor(() => { expect(registry.has('s1')).toBe(false); });
  });

  it('keeps the stream for the grace window so late readers can replay', async () => {
    const registry = new StreamRegistry<string>({ graceMs: 60_000 });
    const stream = await registry.create('s1');
    stream.add('a');
    stream.markCompleted();
    await drain(registry.subscribe('s1'));
    expect(await drain(registry.subscribe('s1'))).toEqual(['a']);
    expect(registry.has('s1')).toBe(true);
    await registry.shutdown();
    expect(registry.size).toBe(0);
  });

  it('does not schedule removal when the reader detaches early', async () => {
    const registry = new StreamRegistry<string>({ graceMs: 0 });
    const stream = await registry.create('s1');
    stream.add('a');
    const abort = new AbortController();
    const reading = drain(registry.subscribe('s1', 0, abort.signal));
    await new Promise((resolve) => { setImmediate(resolve); });
    abort.abort();
    expect(await reading).toEqual(['a']);
    expect(registry.has('s1')).toBe(true);
    await registry.shutdown();
  });

  it('expires completed streams nobody reads', async () => {
    vi.useFakeTimers();
    try {
      const registry = new StreamRegistry<string>({ unclaimedTtlMs: 1000 });
      const stream = await registry.create('s1');
      stream.markCompleted();
      await Promise.resolve();
      await vi.advanceTimersByTimeAsync(999);
      expect(registry.has('s1')).toBe(true);
      await vi.advanceTimersByTimeAsync(1);
      await vi.waitFor(() => { expect(registry.has('s1')).toBe(false); });
    } finally {
      vi.useRealTimers();
    }
  });

  it('completes open streams on shutdown', async () => {
    const registry = new StreamRegistry<string>();
    const stream = await registry.create('s1');
    const reading = drain(registry.subscribe('s1'));
    await registry.shutdown();
    expect(await reading).toEqual([]);
    expect(stream.completed).toBe(true);
  });
});

describe('pumpIntoStream', () => {
  it('copies every event and completes the stream', async () => {
    const registry = new StreamRegistry<string>();
    const stream = await registry.create('s1');
    async function* source(): AsyncGenerator<string> {
      yield 'a';
      yield 'b';
    }
    await pumpIntoStream(source(), stream, { toErrorEvent: () => 'error' });
    expect(stream.completed).toBe(true);
    expect(await drain(registry.subscribe('s1'))).toEqual(['a', 'b']);
    await registry.shutdown();
  });

  it('turns a producer failure into a final event', async () => {
    const registry = new StreamRegistry<string>();
    const stream = await registry.create('s1');
    const logs: LogEntry[] = [];
    async function* source(): AsyncGenerator<string> {
      yield 'a';
      throw new Error('upstream broke');
    }
    await pumpIntoStream(source(), stream, {
      toErrorEvent: (e) => `error: ${e instanceof Error ? e.message : String(e)}`,
      onLog: (entry) => { logs.push(entry); },
    });
    expect(await drain(registry.subscribe('s1'))).toEqual(['a', 'error: upstream broke']);
    expect(logs.map((l) => [l.severity, l.message])).toEqual([['ERR', 'producer failed: upstream broke']]);
    await registry.shutdown();
  });
});
