import { describe, expect, it } from 'vitest';

import { EventStream, type StreamItem } from '../../streaming/event-stream.js';
import { delay } from '../../utils.js';

const collect = async <T>(iterable: AsyncIterable<StreamItem<T>>): Promise<StreamItem<T>[]> => {
  const out: StreamItem<T>[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for await (const item of iterable) out.push(item);
  return out;
};

describe('EventStream', () => {
  it('replays buffered events to a late reader, then ends on completion', async () => {
    const stream = new EventStream<string>('s1');
    stream.add('a');
    stream.add('b');
    stream.markCompleted();
    expect(await collect(stream.subscribe())).toEqual([
      { index: 0, event: 'a' },
      { index: 1, event: 'b' },
    ]);
  });

  it('starts a reader at the requested index', async () => {
    const stream = new EventStream<string>('s1');
    ['a', 'b', 'c'].forEach((e) => { stream.add(e); });
    stream.markCompleted();
    expect((await collect(stream.subscribe(2))).map((i) => i.event)).toEqual(['c']);
  });

  it('ends at once when reading past the end of a completed stream', async () => {
    const stream = new EventStream<string>('s1');
    stream.add('a');
    stream.markCompleted();
    expect(await collect(stream.subscribe(5))).toEqual([]);
  });

  it('holds a reader at the tail of an open stream until the next add', async () => {
    const stream = new EventStream<string>('s1');
    ['a', 'b'].forEach((e) => { stream.add(e); });
    const reader = stream.subscribe(2);
    const first = reader.next();
    const early = await Promise.race([first.then(() => 'item' as const), delay(20).then(() => 'waiting' as const)]);
    expect(early).toBe('waiting');

    stream.add('c');
    const late = await Promise.race([first, delay(20).then(() => 'waiting' as const)]);
    expect(late).toEqual({ done: false, value: { index: 2, event: 'c' } });
    const second = await Promise.race([reader.next().then(() => 'item' as const), delay(20).then(() => 'waiting' as const)]);
    expect(second).toBe('waiting');
    stream.markCompleted();
  });

  it('wakes every blocked reader on add', async () => {
    const stream = new EventStream<number>('s1');
    const readers = [collect(stream.subscribe()), collect(stream.subscribe(1))];
    stream.add(10);
    stream.add(20);
    stream.markCompleted();
    const [all, fromOne] = await Promise.all(readers);
    expect(all.map((i) => i.event)).toEqual([10, 20]);
    expect(fromOne).toEqual([{ index: 1, event: 20 }]);
  });

  it('keeps absolute indices when the buffer evicts', async () => {
    const evicted: number[] = [];
    const stream = new EventStream<string>('s1', { capacity: 2, onEvict: (i) => { evicted.push(i); } });
    ['a', 'b', 'c', 'd'].forEach((e) => { stream.add(e); });
    stream.markCompleted();
    expect(evicted).toEqual([0, 1]);
    expect(stream.firstIndex).toBe(2);
    expect(stream.nextIndex).toBe(4);
    expect(await collect(stream.subscribe(0))).toEqual([
      { index: 2, event: 'c' },
      { index: 3, event: 'd' },
    ]);
  });

  it('refuses events after completion', () => {
    const stream = new EventStream<string>('s1');
    stream.markCompleted();
    expect(() => { stream.add('late'); }).toThrow("stream 's1' is completed");
  });

  it('detaches an aborted reader without completing the stream', async () => {
    const stream = new EventStream<string>('s1');
    const abort = new AbortController();
    const reading = collect(stream.subscribe(0, abort.signal));
    stream.add('a');
    await new Promise((resolve) => { setImmediate(resolve); });
    abort.abort();
    expect(await reading).toEqual([{ index: 0, event: 'a' }]);
    expect(stream.completed).toBe(false);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new EventStream<string>('s1', { capacity: 0 })).toThrow('stream capacity must be a positive number');
  });
});
