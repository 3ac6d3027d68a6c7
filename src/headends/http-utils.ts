import type http from 'node:http';

import { ERROR_KIND_MEANINGS, isToolgateError, toErrorMessage } from '../errors.js';

const DEFAULT_BODY_LIMIT = 1024 * 1024; // 1 MiB

/** Transport-level failure of a request (body, routing, auth). */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export interface ErrorBody {
  error: { kind: string; message: string; details?: Record<string, unknown> };
}

export const readBody = async (req: http.IncomingMessage, limit = DEFAULT_BODY_LIMIT): Promise<string> => {
  const chunks: Buffer[] = [];
  let total = 0;
  return await new Promise<string>((resolve, reject) => {
    req.on('data', (chunk: Buffer | string) => {
      const buf = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      total += buf.length;
      if (total > limit) {
        reject(new HttpError(413, 'payload_too_large', 'request body too large'));
        req.destroy();
        return;
      }
      chunks.push(buf);
    });
    req.on('end', () => { resolve(Buffer.concat(chunks).toString('utf8')); });
    req.on('error', (err) => { reject(err); });
  });
};

/** Parsed JSON body; an empty body reads as `{}`. */
export const readJson = async (req: http.IncomingMessage, limit = DEFAULT_BODY_LIMIT): Promise<unknown> => {
  const text = await readBody(req, limit);
  if (text.trim().length === 0) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new HttpError(400, 'invalid_json', toErrorMessage(err));
  }
};

export const writeJson = (res: http.ServerResponse, statusCode: number, payload: unknown, headers?: Record<string, string>): void => {
  if (res.writableEnded || res.headersSent) return;
  const body = JSON.stringify(payload);
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  if (headers !== undefined) {
    Object.entries(headers).forEach(([key, value]) => {
      res.setHeader(key, value);
    });
  }
  res.setHeader('Content-Length', Buffer.byteLength(body));
  res.end(body);
};

/** Status code and JSON body for any thrown value. */
export function describeError(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof HttpError) {
    return { status: err.statusCode, body: { error: { kind: err.code, message: err.message } } };
  }
  if (isToolgateError(err)) {
    return {
      status: ERROR_KIND_MEANINGS[err.kind].httpStatus,
      body: { error: { kind: err.kind, message: err.message, ...(err.details !== undefined ? { details: err.details } : {}) } },
    };
  }
  return { status: 500, body: { error: { kind: 'internal_error', message: toErrorMessage(err) } } };
}

export const openSse = (res: http.ServerResponse): void => {
  res.statusCode = 200;
  res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
  res.setHeader('Cache-Control', 'no-cache, no-transform');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();
};

export const writeSseEvent = (res: http.ServerResponse, payload: unknown, opts: { id?: number; event?: string } = {}): void => {
  if (res.writableEnded) return;
  const lines: string[] = [];
  if (opts.id !== undefined) lines.push(`id: ${String(opts.id)}`);
  if (opts.event !== undefined) lines.push(`event: ${opts.event}`);
  lines.push(`data: ${JSON.stringify(payload)}`);
  res.write(`${lines.join('\n')}\n\n`);
};
