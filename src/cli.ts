#!/usr/bin/env node
import { Command, Option } from 'commander';

import type { Configuration } from './config.js';
import type { LogEntry, LogSink } from './types.js';
import type { CommanderError } from 'commander';

import { buildApp, startApp } from './app.js';
import { loadConfiguration } from './config.js';
import { toErrorMessage } from './errors.js';
import { StructuredLogger, type LogFormat } from './logging/structured-logger.js';
import { ToolServerRegistry } from './tools/tool-server-registry.js';
import { buildLogEntry, setWarningSink } from './utils.js';

const VERSION = '0.1.0';
const SHUTDOWN_WATCHDOG_MS = 30_000;

let hasExited = false;
function exitWith(code: number, reason: string): never {
  try {
    process.stderr.write(`toolgate: ${reason}\n`);
  } catch { /* stderr gone */ }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* stderr gone */ }
};

setWarningSink(defaultWarningSink);

interface CommonOptions {
  config?: string;
  mcpConfig?: string;
  logFormat?: LogFormat;
  verbose?: boolean;
}

interface ServeOptions extends CommonOptions {
  port?: string;
}

function resolveConfig(opts: CommonOptions): Configuration {
  const config = loadConfiguration(opts.config);
  return {
    ...config,
    ...(opts.mcpConfig !== undefined ? { mcpConfigPath: opts.mcpConfig } : {}),
    logging: {
      ...config.logging,
      ...(opts.logFormat !== undefined ? { format: opts.logFormat } : {}),
      ...(opts.verbose === true ? { verbose: true } : {}),
    },
  };
}

function createLogger(config: Configuration): StructuredLogger {
  return new StructuredLogger({
    format: config.logging.format,
    verbose: config.logging.verbose,
    color: config.logging.color && process.stderr.isTTY,
  });
}

function parsePort(raw: string): number {
  const port = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || port > 65535) exitWith(2, `invalid port '${raw}'`);
  return port;
}

async function serve(opts: ServeOptions): Promise<void> {
  const base = resolveConfig(opts);
  const config: Configuration = opts.port !== undefined
    ? { ...base, server: { ...base.server, port: parsePort(opts.port) } }
    : base;
  const logger = createLogger(config);
  const log: LogSink = logger.sink;
  const emit = (message: string, severity: LogEntry['severity'] = 'VRB'): void => {
    log(buildLogEntry('cli', message, { severity, fatal: severity === 'ERR' }));
  };

  const app = buildApp(config, log);
  let watchdog: NodeJS.Timeout | undefined;
  const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
    if (app.shutdown.isStopping()) {
      exitWith(1, `forced exit after ${signal}`);
    }
    emit(`received ${signal}, shutting down`, 'WRN');
    watchdog = setTimeout(() => {
      exitWith(1, 'shutdown watchdog expired');
    }, SHUTDOWN_WATCHDOG_MS).unref();
    await app.shutdown.shutdown({ log });
  };
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  const handlers = new Map<NodeJS.Signals, () => void>();
  signals.forEach((sig) => {
    const handler = (): void => { void handleSignal(sig); };
    handlers.set(sig, handler);
    process.on(sig, handler);
  });

  try {
    await startApp(app, log);
  } catch (err) {
    await app.shutdown.shutdown({ log });
    exitWith(1, `failed to start: ${toErrorMessage(err)}`);
  }
  const status = app.registry.status();
  emit(`serving on port ${String(app.headend.port)}; tool servers usable=${String(Object.keys(status.usable).length)} disabled=${String(status.disabled.length)} failed=${String(Object.keys(status.failed).length)}`);

  const closed = await app.headend.closed;
  await app.shutdown.shutdown({ log });
  if (watchdog !== undefined) clearTimeout(watchdog);
  handlers.forEach((handler, sig) => { process.removeListener(sig, handler); });
  if (closed.reason === 'error') {
    exitWith(1, `http server failed: ${closed.error.message}`);
  }
  emit('stopped');
}

async function listServers(opts: CommonOptions & { json?: boolean }): Promise<void> {
  const config = resolveConfig(opts);
  const logger = createLogger(config);
  const registry = ToolServerRegistry.fromConfigFile(config.mcpConfigPath, {
    onLog: logger.sink,
    ...(config.mcpInitConcurrency !== undefined ? { initConcurrency: config.mcpInitConcurrency } : {}),
  });
  await registry.initialize();
  const status = registry.status();
  try {
    await registry.close();
  } catch (err) {
    process.stderr.write(`[warn] ${toErrorMessage(err)}\n`);
  }
  if (opts.json === true) {
    process.stdout.write(`${JSON.stringify(status, null, 2)}\n`);
    return;
  }
  const lines: string[] = [];
  Object.entries(status.usable).forEach(([name, tools]) => {
    lines.push(`${name}: ${String(tools.length)} tool(s)`);
    tools.forEach((tool) => { lines.push(`  ${name}-${tool.name}  ${tool.description}`); });
  });
  status.disabled.forEach((name) => { lines.push(`${name}: disabled`); });
  Object.entries(status.failed).forEach(([name, entry]) => { lines.push(`${name}: FAILED ${entry.error}`); });
  process.stdout.write(`${lines.length > 0 ? lines.join('\n') : 'no tool servers configured'}\n`);
}

const program = new Command();
program
  .name('toolgate')
  .description('Permission-gated tool calling over MCP servers, streamed to remote callers')
  .version(VERSION)
  .exitOverride((err: CommanderError) => {
    if (err.exitCode === 0) process.exit(0);
    exitWith(err.exitCode, err.message);
  });

const addCommonOptions = (cmd: Command): Command => cmd
  .option('-c, --config <file>', 'application config file (default ./.toolgate.json, then ~/.toolgate.json)')
  .option('--mcp-config <file>', 'tool-server config file')
  .addOption(new Option('--log-format <format>', 'log output format').choices(['logfmt', 'json', 'console', 'none']))
  .option('-v, --verbose', 'include trace entries');

addCommonOptions(program.command('serve').description('start the HTTP server'))
  .option('-p, --port <port>', 'listen port')
  .action(async (opts: ServeOptions) => {
    await serve(opts);
  });

addCommonOptions(program.command('servers').description('connect to every configured tool server and list its tools'))
  .option('--json', 'print the status as JSON')
  .action(async (opts: CommonOptions & { json?: boolean }) => {
    await listServers(opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  exitWith(1, toErrorMessage(err));
});
