import type { LogSink } from './types.js';

import { toErrorMessage } from './errors.js';
import { buildLogEntry } from './utils.js';

export type ShutdownTask = () => Promise<void> | void;

/**
 * Ordered teardown. Tasks run in reverse registration order, one at a time;
 * a failing task is logged and the rest still run.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private shutdownPromise?: Promise<void>;

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  isStopping(): boolean {
    return this.shutdownPromise !== undefined;
  }

  register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  async shutdown(opts: { log?: LogSink } = {}): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(opts.log);
    await this.shutdownPromise;
  }

  private async performShutdown(log: LogSink | undefined): Promise<void> {
    this.abortController.abort();
    const entries = Array.from(this.tasks.entries()).reverse();
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    for (const [name, task] of entries) {
      const start = Date.now();
      try {
        await task();
        log?.(buildLogEntry('shutdown', `task '${name}' done in ${String(Date.now() - start)}ms`, { severity: 'TRC' }));
      } catch (error) {
        log?.(buildLogEntry('shutdown', `task '${name}' failed: ${toErrorMessage(error)}`, { severity: 'WRN' }));
      }
    }
  }
}
