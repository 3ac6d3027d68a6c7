import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';

import type { LogEntry, LogSink, ServerParams, SseServerParams, StdioServerParams, ToolCallOutcome, ToolDescriptor } from '../types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { ToolExecutionError, TransportInitError, toErrorMessage } from '../errors.js';
import { buildLogEntry, isPlainObject, warn, withTimeout } from '../utils.js';

export type TransportFactory = (serverName: string, params: ServerParams, log: (severity: LogEntry['severity'], message: string) => void) => Transport;

export interface ToolServerClientOptions {
  onLog?: LogSink;
  transportFactory?: TransportFactory;
  clientInfo?: { name: string; version: string };
}

/** What the registry needs from a client; lets tests substitute fakes. */
export interface ToolServerConnection {
  readonly name: string;
  readonly params: ServerParams;
  readonly initialized: boolean;
  initialize: () => Promise<ToolDescriptor[]>;
  listTools: () => ToolDescriptor[];
  callTool: (toolName: string, args: Record<string, unknown>) => Promise<ToolCallOutcome>;
  close: () => Promise<void>;
}

const DEFAULT_CLIENT_INFO = { name: 'toolgate', version: '0.1.0' };

function createStdioTransport(name: string, params: StdioServerParams, log: (severity: LogEntry['severity'], message: string) => void): StdioClientTransport {
  const transport = new StdioClientTransport({
    command: params.command,
    args: [...params.args],
    env: { ...params.env },
    stderr: 'pipe',
  });
  const stderr = transport.stderr;
  if (stderr !== null) {
    stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf8').trim();
      if (text.length > 0) log('WRN', `stderr '${name}': ${text}`);
    });
  }
  return transport;
}

function createSseTransport(params: SseServerParams): SSEClientTransport {
  const resolvedHeaders = { ...params.headers };
  const customFetch: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    Object.entries(resolvedHeaders).forEach(([k, v]) => { headers.set(k, v); });
    return await fetch(input, { ...init, headers });
  };
  // eslint-disable-next-line @typescript-eslint/no-deprecated -- SSE is one of the two supported tool-server transports
  return new SSEClientTransport(new URL(params.url), {
    eventSourceInit: { fetch: customFetch },
    requestInit: { headers: resolvedHeaders },
  });
}

export const defaultTransportFactory: TransportFactory = (serverName, params, log) => (
  params.transport === 'stdio'
    ? createStdioTransport(serverName, params, log)
    : createSseTransport(params)
);

export function normalizeCallToolResult(res: unknown): ToolCallOutcome {
  if (!isPlainObject(res)) {
    return { content: [{ type: 'text', text: JSON.stringify(res) }], isError: false };
  }
  // protocol revisions before 2024-11-05 answered with a bare `toolResult`
  if (!Array.isArray(res.content) && 'toolResult' in res) {
    return { content: [{ type: 'text', text: JSON.stringify(res.toolResult) }], isError: false };
  }
  const content: unknown[] = Array.isArray(res.content) ? [...res.content] : [];
  const outcome: ToolCallOutcome = { content, isError: res.isError === true };
  if (isPlainObject(res.structuredContent)) {
    outcome.structuredContent = res.structuredContent;
  }
  return outcome;
}

/**
 * One tool-server connection (stdio subprocess or SSE endpoint).
 *
 * A failed `initialize()` releases whatever it opened before throwing
 * `TransportInitError`; the client is not retried.
 */
export class ToolServerClient implements ToolServerConnection {
  readonly name: string;
  readonly params: ServerParams;
  private readonly onLog?: LogSink;
  private readonly transportFactory: TransportFactory;
  private readonly clientInfo: { name: string; version: string };
  private client?: Client;
  private transport?: Transport;
  private tools?: ToolDescriptor[];

  constructor(name: string, params: ServerParams, opts: ToolServerClientOptions = {}) {
    this.name = name;
    this.params = params;
    this.onLog = opts.onLog;
    this.transportFactory = opts.transportFactory ?? defaultTransportFactory;
    this.clientInfo = opts.clientInfo ?? DEFAULT_CLIENT_INFO;
  }

  get initialized(): boolean {
    return this.tools !== undefined;
  }

  async initialize(): Promise<ToolDescriptor[]> {
    if (this.tools !== undefined) return this.tools;
    const client = new Client(this.clientInfo, { capabilities: {} });
    this.client = client;
    try {
      const transport = this.transportFactory(this.name, this.params, (severity, message) => {
        this.log(severity, message);
      });
      this.transport = transport;
      const connecting = client.connect(transport);
      if (this.params.transport === 'sse') {
        await withTimeout(connecting, this.params.connectTimeoutMs, `connect to '${this.name}'`);
      } else {
        await connecting;
      }
      this.log('TRC', `connected to '${this.name}'`);
      const listed = await client.listTools(undefined, this.requestOptions());
      this.tools = listed.tools.map((t) => ({
        name: t.name,
        description: t.description ?? '',
        inputSchema: { ...t.inputSchema },
      }));
      this.log('TRC', `listTools('${this.name}') -> ${String(this.tools.length)} tools [${this.tools.map((t) => t.name).join(', ')}]`);
      return this.tools;
    } catch (e) {
      try {
        await this.close();
      } catch (closeError) {
        warn(`tool server '${this.name}' close after failed initialize: ${toErrorMessage(closeError)}`);
      }
      throw new TransportInitError(this.name, toErrorMessage(e), { cause: e });
    }
  }

  listTools(): ToolDescriptor[] {
    return this.tools ?? [];
  }

  async callTool(toolName: string, args: Record<string, unknown>): Promise<ToolCallOutcome> {
    const client = this.client;
    if (client === undefined || this.tools === undefined) {
      throw new ToolExecutionError(this.name, toolName, 'client is not initialized');
    }
    const start = Date.now();
    try {
      const res = await client.callTool({ name: toolName, arguments: args }, undefined, this.requestOptions());
      const outcome = normalizeCallToolResult(res);
      this.log('VRB', `called '${toolName}' in ${String(Date.now() - start)}ms${outcome.isError ? ' (tool reported error)' : ''}`, toolName);
      return outcome;
    } catch (e) {
      this.log('ERR', `call '${toolName}' failed: ${toErrorMessage(e)}`, toolName);
      throw new ToolExecutionError(this.name, toolName, toErrorMessage(e), { cause: e });
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    const transport = this.transport;
    this.client = undefined;
    this.transport = undefined;
    this.tools = undefined;
    if (client !== undefined && client.transport !== undefined) {
      await client.close();
      return;
    }
    // connect never attached the transport to the client
    if (transport !== undefined) {
      await transport.close();
    }
  }

  private requestOptions(): { timeout: number } | undefined {
    return this.params.transport === 'sse' ? { timeout: this.params.readTimeoutMs } : undefined;
  }

  private log(severity: LogEntry['severity'], message: string, toolName?: string): void {
    const remote = toolName === undefined ? `mcp:${this.name}` : `mcp:${this.name}:${toolName}`;
    try {
      this.onLog?.(buildLogEntry(remote, message, { severity, type: 'tool', fatal: severity === 'ERR' }));
    } catch (e) {
      warn(`tool server onLog failed: ${toErrorMessage(e)}`);
    }
  }
}
