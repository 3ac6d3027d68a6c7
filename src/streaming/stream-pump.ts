import type { LogSink } from '../types.js';
import type { EventStream } from './event-stream.js';

import { toErrorMessage } from '../errors.js';
import { buildLogEntry } from '../utils.js';

export interface PumpOptions<T> {
  /** Terminal event appended when the source throws. */
  toErrorEvent: (error: unknown) => T;
  onLog?: LogSink;
}

/**
 * Drain `source` into `stream` in the background. The stream is always
 * marked completed, and a thrown error becomes its last event.
 */
export async function pumpIntoStream<T>(source: AsyncIterable<T>, stream: EventStream<T>, opts: PumpOptions<T>): Promise<void> {
  try {
    // eslint-disable-next-line functional/no-loop-statements
    for await (const event of source) {
      stream.add(event);
    }
  } catch (error) {
    opts.onLog?.(buildLogEntry('stream:pump', `producer failed: ${toErrorMessage(error)}`, {
      severity: 'ERR',
      type: 'stream',
      streamId: stream.id,
    }));
    if (!stream.completed) stream.add(opts.toErrorEvent(error));
  } finally {
    stream.markCompleted();
  }
}
