export type ToolgateErrorKind =
  | 'config_error'
  | 'transport_init_error'
  | 'tool_not_found'
  | 'tool_execution_error'
  | 'needs_permission'
  | 'already_resolved'
  | 'busy'
  | 'stream_not_found'
  | 'stream_exists'
  | 'conversation_not_found'
  | 'forbidden'
  | 'invalid_request'
  | 'model_error'
  | 'storage_error';

export interface ToolgateErrorMeaning {
  httpStatus: number;
  summary: string;
}

export const ERROR_KIND_MEANINGS: Record<ToolgateErrorKind, ToolgateErrorMeaning> = {
  config_error: {
    httpStatus: 500,
    summary: 'Configuration could not be read or validated.',
  },
  transport_init_error: {
    httpStatus: 502,
    summary: 'Tool server transport or handshake failed.',
  },
  tool_not_found: {
    httpStatus: 404,
    summary: 'Unknown, disabled or failed tool server, or tool not advertised.',
  },
  tool_execution_error: {
    httpStatus: 502,
    summary: 'Tool call failed in transit after dispatch.',
  },
  needs_permission: {
    httpStatus: 409,
    summary: 'Pending tool calls must be resolved before a new prompt.',
  },
  already_resolved: {
    httpStatus: 409,
    summary: 'No pending tool calls to resolve.',
  },
  busy: {
    httpStatus: 409,
    summary: 'Another exchange is in flight for this conversation.',
  },
  stream_not_found: {
    httpStatus: 404,
    summary: 'Stream id is unknown or already deleted.',
  },
  stream_exists: {
    httpStatus: 409,
    summary: 'Stream id is already registered.',
  },
  conversation_not_found: {
    httpStatus: 404,
    summary: 'Conversation id is unknown.',
  },
  forbidden: {
    httpStatus: 403,
    summary: 'Conversation belongs to another user.',
  },
  invalid_request: {
    httpStatus: 400,
    summary: 'Request payload failed validation.',
  },
  model_error: {
    httpStatus: 502,
    summary: 'Model engine failed while producing a response.',
  },
  storage_error: {
    httpStatus: 500,
    summary: 'Conversation store read or write failed.',
  },
};

export class ToolgateError extends Error {
  readonly kind: ToolgateErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ToolgateErrorKind, message: string, opts?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ToolgateError';
    this.kind = kind;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }

  get httpStatus(): number {
    return ERROR_KIND_MEANINGS[this.kind].httpStatus;
  }
}

export class ConfigError extends ToolgateError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super('config_error', message, opts);
    this.name = 'ConfigError';
  }
}

export class TransportInitError extends ToolgateError {
  readonly serverName: string;

  constructor(serverName: string, message: string, opts?: { cause?: unknown }) {
    super('transport_init_error', `tool server '${serverName}' failed to initialize: ${message}`, opts);
    this.name = 'TransportInitError';
    this.serverName = serverName;
  }
}

export class ToolNotFoundError extends ToolgateError {
  constructor(serverName: string, toolName?: string) {
    const target = toolName === undefined ? `server '${serverName}'` : `tool '${toolName}' on server '${serverName}'`;
    super('tool_not_found', `${target} is not available`, { details: { serverName, ...(toolName !== undefined ? { toolName } : {}) } });
    this.name = 'ToolNotFoundError';
  }
}

export class ToolExecutionError extends ToolgateError {
  constructor(serverName: string, toolName: string, message: string, opts?: { cause?: unknown }) {
    super('tool_execution_error', `${serverName}-${toolName}: ${message}`, opts);
    this.name = 'ToolExecutionError';
  }
}

export type StateConflictKind = 'needs_permission' | 'already_resolved' | 'busy';

export class StateConflictError extends ToolgateError {
  declare readonly kind: StateConflictKind;

  constructor(kind: StateConflictKind, message: string) {
    super(kind, message);
    this.name = 'StateConflictError';
  }
}

export const needsPermission = (pending: readonly string[]): StateConflictError =>
  new StateConflictError('needs_permission', `resolve pending tool calls first: ${pending.join(', ')}`);

export const alreadyResolved = (): StateConflictError =>
  new StateConflictError('already_resolved', 'no pending tool calls to resolve');

export const busy = (conversationId?: string): StateConflictError =>
  new StateConflictError('busy', conversationId === undefined
    ? 'an exchange is already in flight'
    : `an exchange is already in flight for conversation '${conversationId}'`);

export class StreamNotFoundError extends ToolgateError {
  constructor(streamId: string) {
    super('stream_not_found', `stream '${streamId}' not found`);
    this.name = 'StreamNotFoundError';
  }
}

export class StreamExistsError extends ToolgateError {
  constructor(streamId: string) {
    super('stream_exists', `stream '${streamId}' already exists`);
    this.name = 'StreamExistsError';
  }
}

export class ConversationNotFoundError extends ToolgateError {
  constructor(conversationId: string) {
    super('conversation_not_found', `conversation '${conversationId}' not found`);
    this.name = 'ConversationNotFoundError';
  }
}

export class ForbiddenError extends ToolgateError {
  constructor(conversationId: string) {
    super('forbidden', `conversation '${conversationId}' is not accessible`);
    this.name = 'ForbiddenError';
  }
}

export class InvalidRequestError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('invalid_request', message, details !== undefined ? { details } : undefined);
    this.name = 'InvalidRequestError';
  }
}

export class ModelError extends ToolgateError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super('model_error', message, opts);
    this.name = 'ModelError';
  }
}

export class StorageError extends ToolgateError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super('storage_error', message, opts);
    this.name = 'StorageError';
  }
}

export const isToolgateError = (value: unknown): value is ToolgateError =>
  value instanceof ToolgateError;

export const toErrorMessage = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};
