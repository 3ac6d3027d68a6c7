import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z, type ZodIssue } from 'zod';

import { ConfigError } from './errors.js';

const CONFIG_FILE_NAME = '.toolgate.json';
const ENV_PREFIX = 'TOOLGATE_';

const ServerSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8787),
  concurrency: z.number().int().positive().default(10),
  bearerKeys: z.array(z.string().min(1)).default([]),
  pingIntervalMs: z.number().int().positive().default(15_000),
});

const ModelSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'test-llm']).default('test-llm'),
  name: z.string().min(1).default('scripted'),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
});

const StreamsSchema = z.object({
  capacity: z.number().int().positive().default(1000),
  graceMs: z.number().int().min(0).default(5_000),
  unclaimedTtlMs: z.number().int().positive().default(600_000),
});

const LoggingSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console', 'none']).default('logfmt'),
  verbose: z.boolean().default(false),
  color: z.boolean().default(false),
});

const ConfigurationSchema = z.object({
  server: ServerSchema.default({}),
  mcpConfigPath: z.string().min(1).default('./mcp.json'),
  mcpInitConcurrency: z.number().int().positive().optional(),
  database: z.object({
    backend: z.enum(['memory', 'sqlite']).default('memory'),
    path: z.string().min(1).default('./toolgate.sqlite'),
  }).default({}),
  model: ModelSchema.default({}),
  defaultSystemPrompt: z.string().optional(),
  streams: StreamsSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;

export function formatZodIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

export function expandEnv(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

export function expandDeep(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

function resolveConfigPath(configPath?: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new ConfigError(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(process.cwd(), CONFIG_FILE_NAME);
  if (fs.existsSync(local)) return local;
  const home = path.join(os.homedir(), CONFIG_FILE_NAME);
  if (fs.existsSync(home)) return home;
  return undefined;
}

function readConfigFile(resolved: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new ConfigError(`Configuration file ${resolved} must contain a JSON object`);
  }
  return { ...json };
}

type EnvKind = 'string' | 'int' | 'bool' | 'list';

// TOOLGATE_* variable -> dotted config path
const ENV_OVERRIDES: readonly (readonly [string, string, EnvKind])[] = [
  ['PORT', 'server.port', 'int'],
  ['CONCURRENCY', 'server.concurrency', 'int'],
  ['BEARER_KEYS', 'server.bearerKeys', 'list'],
  ['PING_INTERVAL_MS', 'server.pingIntervalMs', 'int'],
  ['MCP_CONFIG', 'mcpConfigPath', 'string'],
  ['MCP_INIT_CONCURRENCY', 'mcpInitConcurrency', 'int'],
  ['DATABASE_BACKEND', 'database.backend', 'string'],
  ['DATABASE_PATH', 'database.path', 'string'],
  ['MODEL_PROVIDER', 'model.provider', 'string'],
  ['MODEL_NAME', 'model.name', 'string'],
  ['MODEL_API_KEY', 'model.apiKey', 'string'],
  ['MODEL_BASE_URL', 'model.baseUrl', 'string'],
  ['SYSTEM_PROMPT', 'defaultSystemPrompt', 'string'],
  ['STREAM_CAPACITY', 'streams.capacity', 'int'],
  ['STREAM_GRACE_MS', 'streams.graceMs', 'int'],
  ['STREAM_UNCLAIMED_TTL_MS', 'streams.unclaimedTtlMs', 'int'],
  ['LOG_FORMAT', 'logging.format', 'string'],
  ['VERBOSE', 'logging.verbose', 'bool'],
];

function coerceEnvValue(name: string, raw: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'string':
      return raw;
    case 'int': {
      const value = Number.parseInt(raw, 10);
      if (!Number.isFinite(value)) throw new ConfigError(`${name} must be an integer, got '${raw}'`);
      return value;
    }
    case 'bool':
      return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
    case 'list':
      return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  }
}

function setPath(target: Record<string, unknown>, dotted: string, value: unknown): void {
  const keys = dotted.split('.');
  const last = keys.pop();
  if (last === undefined) return;
  const parent = keys.reduce<Record<string, unknown>>((node, key) => {
    const existing = node[key];
    if (existing !== null && typeof existing === 'object' && !Array.isArray(existing)) {
      const copy: Record<string, unknown> = { ...existing };
      node[key] = copy;
      return copy;
    }
    const created: Record<string, unknown> = {};
    node[key] = created;
    return created;
  }, target);
  parent[last] = value;
}

export function applyEnvOverrides(base: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  ENV_OVERRIDES.forEach(([suffix, dotted, kind]) => {
    const name = `${ENV_PREFIX}${suffix}`;
    const raw = env[name];
    if (raw === undefined || raw.length === 0) return;
    setPath(out, dotted, coerceEnvValue(name, raw, kind));
  });
  return out;
}

export function parseConfiguration(input: unknown, source = '<inline>'): Configuration {
  const parsed = ConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatZodIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/**
 * Load the application configuration: optional JSON file with `${VAR}`
 * expansion, then `TOOLGATE_*` overrides, validated as a whole.
 */
export function loadConfiguration(configPath?: string, env: NodeJS.ProcessEnv = process.env): Configuration {
  const resolved = resolveConfigPath(configPath);
  const fileData = resolved !== undefined ? readConfigFile(resolved) : {};
  const expanded = expandDeep(fileData, env);
  const base = expanded !== null && typeof expanded === 'object' && !Array.isArray(expanded) ? { ...expanded } : {};
  return parseConfiguration(applyEnvOverrides(base, env), resolved ?? 'environment');
}
