import { performance } from 'node:perf_hooks';

import { Mutex } from 'async-mutex';

import type { LogEntry, LogSink, ServerParams, ToolCallOutcome, ToolDefinition, ToolDescriptor, ToolIdentity } from '../types.js';

import { ConcurrencyLimiter } from '../concurrency.js';
import { ToolNotFoundError, toErrorMessage } from '../errors.js';
import { buildLogEntry, warn } from '../utils.js';

import { formatServerParamsForLog, loadToolServerConfig, type ToolServerConfig } from './server-config.js';
import { composeToolName, splitToolName } from './tool-identity.js';
import { ToolServerClient, type ToolServerConnection } from './tool-server-client.js';

export type ClientFactory = (name: string, params: ServerParams, onLog: LogSink | undefined) => ToolServerConnection;

export interface ToolServerRegistryOptions {
  onLog?: LogSink;
  /** Upper bound on concurrent handshakes; unbounded when omitted. */
  initConcurrency?: number;
  clientFactory?: ClientFactory;
}

export interface FailedServer {
  params: ServerParams;
  error: Error;
}

export interface RegistryStatus {
  initialized: boolean;
  usable: Record<string, ToolDescriptor[]>;
  disabled: string[];
  failed: Record<string, { params: string; error: string }>;
}

const defaultClientFactory: ClientFactory = (name, params, onLog) => new ToolServerClient(name, params, { onLog });

/**
 * Named collection of tool-server connections built from a declarative config.
 *
 * After `initialize()` every configured name is in exactly one of the usable,
 * disabled or failed sets.
 */
export class ToolServerRegistry {
  private readonly servers: Readonly<Record<string, ServerParams>>;
  private readonly disabledNames: readonly string[];
  private readonly usable = new Map<string, ToolServerConnection>();
  private readonly failedServers = new Map<string, FailedServer>();
  private readonly catalogIndex = new Map<string, ToolIdentity>();
  private readonly mutex = new Mutex();
  private readonly onLog?: LogSink;
  private readonly initConcurrency?: number;
  private readonly clientFactory: ClientFactory;
  private initializedFlag = false;
  private initializationPromise?: Promise<void>;

  constructor(config: ToolServerConfig, opts: ToolServerRegistryOptions = {}) {
    this.servers = config.servers;
    this.disabledNames = [...config.disabled];
    this.onLog = opts.onLog;
    this.clientFactory = opts.clientFactory ?? defaultClientFactory;
    const limit = opts.initConcurrency;
    if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
      this.initConcurrency = Math.trunc(limit);
    }
  }

  static fromConfigFile(configPath: string, opts: ToolServerRegistryOptions = {}): ToolServerRegistry {
    return new ToolServerRegistry(loadToolServerConfig(configPath), opts);
  }

  get initialized(): boolean {
    return this.initializedFlag;
  }

  get disabled(): readonly string[] {
    return this.disabledNames;
  }

  get failed(): ReadonlyMap<string, FailedServer> {
    return this.failedServers;
  }

  async initialize(): Promise<void> {
    if (this.initializedFlag) return;
    // concurrent callers join the attempt already in flight
    this.initializationPromise ??= this.doInitialize();
    await this.initializationPromise;
  }

  private async doInitialize(): Promise<void> {
    const entries = Object.entries(this.servers);
    const limiter = new ConcurrencyLimiter(this.initConcurrency ?? Math.max(1, entries.length));
    const latencies: string[] = [];
    const failures: string[] = [];
    const warmupStart = performance.now();

    await Promise.all(entries.map(async ([name, params]) => {
      const release = await limiter.acquire();
      const start = performance.now();
      try {
        this.log('TRC', `initializing '${name}' (${params.transport})`, `mcp:${name}`);
        try {
          const client = this.clientFactory(name, params, this.onLog);
          const tools = await client.initialize();
          await this.mutex.runExclusive(() => {
            this.usable.set(name, client);
            tools.forEach((tool) => {
              const identity: ToolIdentity = { serverName: name, toolName: tool.name };
              this.catalogIndex.set(composeToolName(identity), identity);
            });
          });
          this.log('VRB', `initialized '${name}' with ${String(tools.length)} tools`, `mcp:${name}`);
          latencies.push(`${name}=${String(Math.round(performance.now() - start))}ms`);
        } catch (e) {
          const error = e instanceof Error ? e : new Error(String(e));
          await this.mutex.runExclusive(() => {
            this.failedServers.set(name, { params, error });
          });
          this.log('ERR', `failed to initialize tool server: ${error.message} [${formatServerParamsForLog(name, params)}]`, `mcp:${name}`, true);
          latencies.push(`${name}=${String(Math.round(performance.now() - start))}ms FAILED`);
          failures.push(`${name} (${error.message})`);
        }
      } finally {
        release();
      }
    }));

    const total = Math.round(performance.now() - warmupStart);
    this.log('VRB', `tool server initialization (total=${String(total)}ms): ${latencies.length > 0 ? latencies.join(', ') : '<no servers>'}`, 'mcp:init');
    if (this.disabledNames.length > 0) {
      this.log('VRB', `disabled by configuration: ${this.disabledNames.join(', ')}`, 'mcp:init');
    }
    if (failures.length > 0) {
      this.log('WRN', `some tool servers failed to initialize and will be unavailable: ${failures.join(', ')}`, 'mcp:init');
    }
    this.initializedFlag = true;
  }

  listToolsByServer(): Record<string, ToolDescriptor[]> {
    const out: Record<string, ToolDescriptor[]> = {};
    this.usable.forEach((client, name) => {
      out[name] = client.listTools();
    });
    return out;
  }

  /** Flattened catalog with exposed `server-tool` names, ready for the model. */
  buildCatalog(): ToolDefinition[] {
    const catalog: ToolDefinition[] = [];
    this.usable.forEach((client, serverName) => {
      client.listTools().forEach((tool) => {
        const identity: ToolIdentity = { serverName, toolName: tool.name };
        catalog.push({ ...tool, name: composeToolName(identity), identity });
      });
    });
    return catalog;
  }

  resolveTool(exposedName: string): ToolIdentity | undefined {
    return this.catalogIndex.get(exposedName) ?? splitToolName(exposedName);
  }

  async call(serverName: string, toolName: string, args: Record<string, unknown>): Promise<ToolCallOutcome> {
    const client = this.usable.get(serverName);
    if (client === undefined) {
      throw new ToolNotFoundError(serverName);
    }
    if (!client.listTools().some((tool) => tool.name === toolName)) {
      throw new ToolNotFoundError(serverName, toolName);
    }
    return await client.callTool(toolName, args);
  }

  status(): RegistryStatus {
    const failed: RegistryStatus['failed'] = {};
    this.failedServers.forEach((entry, name) => {
      failed[name] = { params: formatServerParamsForLog(name, entry.params), error: entry.error.message };
    });
    return {
      initialized: this.initializedFlag,
      usable: this.listToolsByServer(),
      disabled: [...this.disabledNames],
      failed,
    };
  }

  /**
   * Close every usable client. All closes are attempted; failures are
   * collected into one `AggregateError`.
   */
  async close(): Promise<void> {
    const entries = await this.mutex.runExclusive(() => {
      const snapshot = Array.from(this.usable.entries());
      this.usable.clear();
      this.catalogIndex.clear();
      return snapshot;
    });
    const results = await Promise.allSettled(entries.map(async ([, client]) => { await client.close(); }));
    const errors: Error[] = [];
    results.forEach((result, idx) => {
      if (result.status === 'fulfilled') return;
      const name = entries[idx][0];
      const message = toErrorMessage(result.reason);
      warn(`tool server close failed for '${name}': ${message}`);
      errors.push(new Error(`${name}: ${message}`, { cause: result.reason }));
    });
    if (errors.length > 0) {
      throw new AggregateError(errors, `failed to close ${String(errors.length)} tool server(s)`);
    }
  }

  private log(severity: LogEntry['severity'], message: string, remoteIdentifier: string, fatal = false): void {
    try {
      this.onLog?.(buildLogEntry(remoteIdentifier, message, { severity, type: 'tool', fatal }));
    } catch (e) {
      warn(`registry onLog failed: ${toErrorMessage(e)}`);
    }
  }
}
