import type { LogEntry } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent, type BuildStructuredEventOptions } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  /** Emit TRC entries and append labels to console lines. */
  verbose?: boolean;
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
  consoleWriter?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly color: boolean;
  private readonly verbose: boolean;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color: this.color })}\n`);
      });
    }
    if (format === 'json') {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      const writer = options.consoleWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color: this.color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (entry.severity === 'TRC' && !this.verbose) return;
    if (this.sinks.length === 0) return;
    const options: BuildStructuredEventOptions = { labels: this.labels };
    const event = buildStructuredLogEvent(entry, options);
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  /** Bound `emit`, for passing around as a `LogSink`. */
  get sink(): (entry: LogEntry) => void {
    return (entry) => { this.emit(entry); };
  }
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // ignore
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('remote', event.remoteIdentifier);
  push('server', event.server);
  push('tool', event.tool);
  push('conversation', event.conversationId);
  push('stream', event.streamId);
  if (event.fatal) push('fatal', true);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
