import fs from 'node:fs';

import { z } from 'zod';

import type { ServerParams } from '../types.js';

import { expandDeep, formatZodIssues } from '../config.js';
import { ConfigError } from '../errors.js';
import { isPlainObject } from '../utils.js';

import { isValidServerName } from './tool-identity.js';

export const DEFAULT_SSE_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_SSE_READ_TIMEOUT_MS = 300_000;

const StdioServerSchema = z.object({
  transport: z.literal('stdio'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
});

const SseServerSchema = z.object({
  transport: z.literal('sse'),
  url: z.string().url(),
  headers: z.record(z.string()).default({}),
  connectTimeoutMs: z.number().int().positive().default(DEFAULT_SSE_CONNECT_TIMEOUT_MS),
  readTimeoutMs: z.number().int().positive().default(DEFAULT_SSE_READ_TIMEOUT_MS),
});

const ServerParamsSchema = z.discriminatedUnion('transport', [StdioServerSchema, SseServerSchema]);

const ToolServerFileSchema = z.object({
  mcpServers: z.record(z.unknown()),
});

export interface ToolServerConfig {
  servers: Record<string, ServerParams>;
  disabled: string[];
}

const secondsToMs = (value: unknown): number | undefined => (
  typeof value === 'number' && Number.isFinite(value) ? Math.round(value * 1000) : undefined
);

// Accepts `type` as an alias of `transport`, infers it from `url`, and maps
// the `timeout` / `sse_read_timeout` second fields onto the millisecond ones.
function normalizeServerEntry(raw: unknown): unknown {
  if (!isPlainObject(raw)) return raw;
  const out: Record<string, unknown> = { ...raw };
  delete out.enabled;
  const declared = raw.transport ?? raw.type;
  delete out.type;
  out.transport = declared ?? (typeof raw.url === 'string' ? 'sse' : 'stdio');
  if (out.transport === 'sse') {
    out.connectTimeoutMs ??= secondsToMs(raw.timeout);
    out.readTimeoutMs ??= secondsToMs(raw.sse_read_timeout);
    delete out.timeout;
    delete out.sse_read_timeout;
    Object.keys(out).forEach((key) => {
      if (out[key] === undefined) delete out[key];
    });
  }
  return out;
}

export function parseToolServerConfig(json: unknown, source = '<inline>'): ToolServerConfig {
  const file = ToolServerFileSchema.safeParse(json);
  if (!file.success) {
    throw new ConfigError(`Invalid tool server configuration in ${source}: ${formatZodIssues(file.error.issues)}`);
  }
  const servers: Record<string, ServerParams> = {};
  const disabled: string[] = [];
  const problems: string[] = [];

  Object.entries(file.data.mcpServers).forEach(([name, raw]) => {
    // disabled entries are never validated or attempted
    if (isPlainObject(raw) && raw.enabled === false) {
      disabled.push(name);
      return;
    }
    if (!isValidServerName(name)) {
      problems.push(`server name '${name}' may only contain letters, digits and '_'`);
      return;
    }
    const parsed = ServerParamsSchema.safeParse(expandDeep(normalizeServerEntry(raw)));
    if (!parsed.success) {
      problems.push(`${name}: ${formatZodIssues(parsed.error.issues)}`);
      return;
    }
    servers[name] = Object.freeze(parsed.data);
  });

  if (problems.length > 0) {
    throw new ConfigError(`Invalid tool server configuration in ${source}: ${problems.join('; ')}`);
  }
  return { servers, disabled };
}

export function loadToolServerConfig(configPath: string): ToolServerConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read tool server configuration ${configPath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in tool server configuration ${configPath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  return parseToolServerConfig(json, configPath);
}

/**
 * Render server params for logs. Env and header values are redacted.
 */
export function formatServerParamsForLog(name: string, params: ServerParams): string {
  const parts: string[] = [`server='${name}'`, `transport=${params.transport}`];
  if (params.transport === 'stdio') {
    parts.push(`command='${params.command}'`);
    if (params.args.length > 0) {
      parts.push(`args=[${params.args.map((a) => `'${a}'`).join(', ')}]`);
    }
    const envKeys = Object.keys(params.env);
    if (envKeys.length > 0) {
      parts.push(`env_keys=[${envKeys.join(', ')}]`);
    }
    return parts.join(', ');
  }
  parts.push(`url='${params.url}'`);
  const headerKeys = Object.keys(params.headers);
  if (headerKeys.length > 0) {
    parts.push(`header_keys=[${headerKeys.join(', ')}]`);
  }
  parts.push(`connectTimeoutMs=${String(params.connectTimeoutMs)}`, `readTimeoutMs=${String(params.readTimeoutMs)}`);
  return parts.join(', ');
}
