import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_DIM = '\u001B[2m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const time = event.isoTimestamp.slice(11, 23);
  const scope = [event.conversationId, event.streamId].filter((v): v is string => v !== undefined).join('/');
  const head = `${time} ${event.severity} [${event.remoteIdentifier}]${scope.length > 0 ? ` (${scope})` : ''}`;
  let line = `${head} ${event.message}`;
  if (options.verbose === true) {
    const extras = Object.entries(event.labels).map(([key, value]) => `${key}=${value}`);
    if (extras.length > 0) line += ` ${extras.join(' ')}`;
  }
  if (options.color !== true) return line;
  if (event.severity === 'ERR') return `${ANSI_RED}${line}${ANSI_RESET}`;
  if (event.severity === 'WRN') return `${ANSI_YELLOW}${line}${ANSI_RESET}`;
  return `${ANSI_DIM}${head}${ANSI_RESET} ${event.message}`;
}
