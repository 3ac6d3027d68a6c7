import http from 'node:http';
import { URL } from 'node:url';

import { z } from 'zod';

import type { ConversationController } from '../conversation/conversation-controller.js';
import type { RegistryStatus } from '../tools/tool-server-registry.js';
import type { LogEntry } from '../types.js';
import type { Headend, HeadendClosedEvent, HeadendContext } from './types.js';

import { AcquireAbortedError, ConcurrencyLimiter } from '../concurrency.js';
import { formatZodIssues } from '../config.js';
import { InvalidRequestError, toErrorMessage } from '../errors.js';
import { buildLogEntry, createDeferred } from '../utils.js';

import { describeError, HttpError, openSse, readJson, writeJson, writeSseEvent } from './http-utils.js';

export type UserResolver = (req: http.IncomingMessage) => string;

export const defaultUserResolver: UserResolver = (req) => {
  const header = req.headers['x-user-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value !== undefined && value.trim().length > 0 ? value.trim() : 'anonymous';
};

export interface ConversationHeadendOptions {
  port: number;
  host?: string;
  concurrency?: number;
  bearerKeys?: readonly string[];
  pingIntervalMs?: number;
  resolveUser?: UserResolver;
  serverStatus: () => RegistryStatus;
}

interface RouteArgs {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  url: URL;
  params: string[];
  userId: string;
}

interface Route {
  method: 'GET' | 'POST';
  pattern: RegExp;
  /** SSE routes bypass the JSON limiter. */
  streaming?: boolean;
  handler: (args: RouteArgs) => Promise<void>;
}

const ModelSettingsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
});

const CreateBodySchema = z.object({
  title: z.string().min(1).optional(),
  systemPrompt: z.string().optional(),
});

const ChatBodySchema = z.object({
  prompt: z.string().min(1),
  systemPrompt: z.string().optional(),
  settings: ModelSettingsSchema.optional(),
  redactedMessages: z.array(z.unknown()).optional(),
});

const PermitBodySchema = z.object({
  executeAll: z.boolean().optional(),
  toolCallIds: z.array(z.string().min(1)).optional(),
  settings: ModelSettingsSchema.optional(),
  redactedMessages: z.array(z.unknown()).optional(),
});

const RetryBodySchema = z.object({
  settings: ModelSettingsSchema.optional(),
  redactedMessages: z.array(z.unknown()).optional(),
});

const ORDER_BY_ALIASES: Record<string, 'created' | 'updated'> = {
  created: 'created',
  created_at: 'created',
  updated: 'updated',
  updated_at: 'updated',
};

function parseBody<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRequestError(`invalid request body: ${formatZodIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

function parseIntParam(url: URL, name: string): number | undefined {
  const raw = url.searchParams.get(name);
  if (raw === null || raw.length === 0) return undefined;
  if (!/^\d+$/.test(raw)) throw new InvalidRequestError(`${name} must be a non-negative integer`);
  return Number.parseInt(raw, 10);
}

function decodePathSegment(segment: string, path: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, 'invalid_path', `malformed escape in ${path}`);
  }
}

/** Replay position for a stream request: `Last-Event-ID` wins over `?index=`. */
export function resolveStreamStart(req: http.IncomingMessage, url: URL): number {
  const header = req.headers['last-event-id'];
  const lastEventId = Array.isArray(header) ? header[0] : header;
  if (lastEventId !== undefined && /^\d+$/.test(lastEventId.trim())) {
    return Number.parseInt(lastEventId.trim(), 10) + 1;
  }
  return parseIntParam(url, 'index') ?? 0;
}

/** HTTP + SSE surface over the conversation controller. */
export class ConversationHeadend implements Headend {
  readonly id: string;
  readonly closed: Promise<HeadendClosedEvent>;

  private readonly controller: ConversationController;
  private readonly options: ConversationHeadendOptions;
  private readonly limiter: ConcurrencyLimiter;
  private readonly resolveUser: UserResolver;
  private readonly routes: Route[];
  private readonly closeDeferred = createDeferred<HeadendClosedEvent>();
  private readonly openStreams = new Set<AbortController>();
  private closedSignaled = false;
  private server?: http.Server;
  private context?: HeadendContext;

  constructor(controller: ConversationController, opts: ConversationHeadendOptions) {
    this.controller = controller;
    this.options = opts;
    this.id = `http:${String(opts.port)}`;
    this.closed = this.closeDeferred.promise;
    this.limiter = new ConcurrencyLimiter(opts.concurrency ?? 10);
    this.resolveUser = opts.resolveUser ?? defaultUserResolver;
    this.routes = this.buildRoutes();
  }

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server?.address();
    if (address !== null && typeof address === 'object') return address.port;
    return this.options.port;
  }

  async start(context: HeadendContext): Promise<void> {
    if (this.server !== undefined) return;
    this.context = context;
    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    this.server = server;

    server.on('error', (err: Error) => {
      this.log(`server error: ${err.message}`, 'ERR', true);
      this.signalClosed({ reason: 'error', error: err });
    });
    server.on('close', () => {
      this.signalClosed({ reason: 'stopped', graceful: true });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        server.off('listening', onListening);
        reject(err);
      };
      const onListening = (): void => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.options.port, this.options.host);
    });
    this.log(`listening on port ${String(this.port)}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (server === undefined) {
      this.signalClosed({ reason: 'stopped', graceful: true });
      return;
    }
    // SSE readers hold their sockets open; detach them so close can finish
    this.openStreams.forEach((abort) => { abort.abort(); });
    await new Promise<void>((resolve) => {
      server.close(() => { resolve(); });
      server.closeIdleConnections();
    });
    this.server = undefined;
    this.signalClosed({ reason: 'stopped', graceful: true });
  }

  private buildRoutes(): Route[] {
    const c = this.controller;
    const id = '([^/]+)';
    return [
      {
        method: 'GET',
        pattern: /^\/health$/,
        handler: async ({ res }) => { writeJson(res, 200, { status: 'ok' }); },
      },
      {
        method: 'GET',
        pattern: /^\/api\/config\/mcp-servers$/,
        handler: async ({ res }) => {
          const status = this.options.serverStatus();
          writeJson(res, 200, { servers: status.usable, disabled: status.disabled, failed: status.failed });
        },
      },
      {
        method: 'POST',
        pattern: /^\/api\/v1\/conversation\/create$/,
        handler: async ({ req, res, userId }) => {
          const body = parseBody(CreateBodySchema, await readJson(req));
          writeJson(res, 200, await c.createConversation(userId, body));
        },
      },
      {
        method: 'GET',
        pattern: /^\/api\/v1\/conversation\/list$/,
        handler: async ({ res, url, userId }) => {
          const orderByRaw = url.searchParams.get('order_by');
          const orderRaw = url.searchParams.get('order');
          const orderBy = orderByRaw === null ? undefined : ORDER_BY_ALIASES[orderByRaw];
          if (orderByRaw !== null && orderBy === undefined) {
            throw new InvalidRequestError("order_by must be 'created' or 'updated'");
          }
          if (orderRaw !== null && orderRaw !== 'asc' && orderRaw !== 'desc') {
            throw new InvalidRequestError("order must be 'asc' or 'desc'");
          }
          const limit = parseIntParam(url, 'limit');
          const offset = parseIntParam(url, 'offset');
          const page = await c.listConversations(userId, {
            ...(limit !== undefined ? { limit } : {}),
            ...(offset !== undefined ? { offset } : {}),
            ...(orderBy !== undefined ? { orderBy } : {}),
            ...(orderRaw !== null ? { order: orderRaw } : {}),
          });
          writeJson(res, 200, page);
        },
      },
      {
        method: 'GET',
        pattern: new RegExp(`^/api/v1/conversation/info/${id}$`),
        handler: async ({ res, params, userId }) => {
          writeJson(res, 200, await c.getConversationInfo(userId, params[0]));
        },
      },
      {
        method: 'POST',
        pattern: new RegExp(`^/api/v1/conversation/delete/${id}$`),
        handler: async ({ res, params, userId }) => {
          await c.deleteConversation(userId, params[0]);
          writeJson(res, 200, { deleted: true });
        },
      },
      {
        method: 'POST',
        pattern: new RegExp(`^/api/v1/conversation/chat/${id}$`),
        handler: async ({ req, res, params, userId }) => {
          const body = parseBody(ChatBodySchema, await readJson(req));
          writeJson(res, 202, await c.chat(userId, params[0], body));
        },
      },
      {
        method: 'POST',
        pattern: new RegExp(`^/api/v1/conversation/permit-call-tool/${id}$`),
        handler: async ({ req, res, params, userId }) => {
          const body = parseBody(PermitBodySchema, await readJson(req));
          writeJson(res, 202, await c.permitCallTool(userId, params[0], body));
        },
      },
      {
        method: 'POST',
        pattern: new RegExp(`^/api/v1/conversation/retry/${id}$`),
        handler: async ({ req, res, params, userId }) => {
          const body = parseBody(RetryBodySchema, await readJson(req));
          writeJson(res, 202, await c.retry(userId, params[0], body));
        },
      },
      {
        method: 'GET',
        pattern: new RegExp(`^/api/v1/stream/${id}$`),
        streaming: true,
        handler: async (args) => { await this.streamEvents(args); },
      },
    ];
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = crypto.randomUUID();
    const method = (req.method ?? 'GET').toUpperCase();
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');
      const path = url.pathname.length > 1 && url.pathname.endsWith('/') ? url.pathname.slice(0, -1) : url.pathname;
      const matches = this.routes.filter((route) => route.pattern.test(path));
      if (matches.length === 0) throw new HttpError(404, 'not_found', `no route for ${path}`);
      const route = matches.find((candidate) => candidate.method === method);
      if (route === undefined) throw new HttpError(405, 'method_not_allowed', `${method} not allowed on ${path}`);
      if (path !== '/health') this.authorize(req);
      const params = (route.pattern.exec(path) ?? []).slice(1).map((p) => decodePathSegment(p, path));
      const args: RouteArgs = { req, res, url, params, userId: this.resolveUser(req) };
      this.log(`${requestId} ${method} ${path}`, 'VRB', false, 'request');
      if (route.streaming === true) {
        await route.handler(args);
        return;
      }
      const abort = new AbortController();
      const onClose = (): void => { if (!res.writableEnded) abort.abort(); };
      res.on('close', onClose);
      try {
        await this.limiter.run(() => route.handler(args), { signal: abort.signal });
      } finally {
        res.off('close', onClose);
      }
    } catch (err: unknown) {
      if (err instanceof AcquireAbortedError) {
        this.log(`${requestId} client went away while queued`, 'WRN');
        return;
      }
      const { status, body } = describeError(err);
      this.log(`${requestId} ${method} failed (${String(status)}): ${toErrorMessage(err)}`, status >= 500 ? 'ERR' : 'WRN');
      writeJson(res, status, body);
    }
  }

  private authorize(req: http.IncomingMessage): void {
    const keys = this.options.bearerKeys ?? [];
    if (keys.length === 0) return;
    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (match === null || !keys.includes(match[1].trim())) {
      throw new HttpError(401, 'unauthorized', 'missing or invalid bearer token');
    }
  }

  private async streamEvents({ req, res, url, params }: RouteArgs): Promise<void> {
    const streamId = params[0];
    const fromIndex = resolveStreamStart(req, url);
    const abort = new AbortController();
    // throws StreamNotFoundError before any SSE header is written
    const items = this.controller.subscribe(streamId, fromIndex, abort.signal);
    this.openStreams.add(abort);
    const onClose = (): void => { abort.abort(); };
    res.on('close', onClose);
    openSse(res);
    const pingMs = this.options.pingIntervalMs ?? 15_000;
    const ping = setInterval(() => { writeSseEvent(res, { type: 'ping' }); }, pingMs);
    ping.unref();
    let delivered = 0;
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const item of items) {
        writeSseEvent(res, item.event, { id: item.index });
        delivered += 1;
      }
    } finally {
      clearInterval(ping);
      res.off('close', onClose);
      this.openStreams.delete(abort);
      this.log(`stream ${streamId} from=${String(fromIndex)} delivered=${String(delivered)}${abort.signal.aborted ? ' (detached)' : ''}`, 'VRB', false, 'response', streamId);
      if (!res.writableEnded) res.end();
    }
  }

  private log(
    message: string,
    severity: LogEntry['severity'] = 'VRB',
    fatal = false,
    direction: LogEntry['direction'] = 'response',
    streamId?: string
  ): void {
    this.context?.log(buildLogEntry(`headend:${this.id}`, message, {
      severity,
      fatal,
      direction,
      ...(streamId !== undefined ? { type: 'stream' as const, streamId } : {}),
    }));
  }

  private signalClosed(event: HeadendClosedEvent): void {
    if (this.closedSignaled) return;
    this.closedSignaled = true;
    this.closeDeferred.resolve(event);
  }
}
