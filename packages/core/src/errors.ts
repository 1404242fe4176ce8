/**
 * Error types shared by the remote client, tool handlers and dispatcher.
 */

/**
 * Thrown (or returned as a failure variant) when tool arguments fail validation.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * The single failure shape produced by the remote client, whether the
 * service answered with a non-success status or could not be reached.
 */
export class RemoteFailure extends Error {
  readonly code: number;
  readonly detail: string;

  constructor(
    code: number,
    detail: string,
    message: string = `Error ${code}: ${detail}`
  ) {
    super(message);
    this.name = 'RemoteFailure';
    this.code = code;
    this.detail = detail;
  }

  static transport(cause: unknown): RemoteFailure {
    const reason = describeCause(cause);
    return new RemoteFailure(-1, reason, `Request failed: ${reason}`);
  }
}

export class UnknownToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class InvalidInvocationError extends Error {
  constructor(message: string = 'arguments must be an object') {
    super(message);
    this.name = 'InvalidInvocationError';
  }
}

/**
 * The uniform failure surfaced to the transport for any handler failure.
 */
export class ExecutionFailedError extends Error {
  readonly toolName: string;

  constructor(toolName: string, cause: Error) {
    super(`Tool ${toolName} failed: ${cause.message}`, { cause });
    this.name = 'ExecutionFailedError';
    this.toolName = toolName;
  }
}

export class DuplicateToolError extends Error {
  constructor(toolName: string) {
    super(`Tool "${toolName}" is already registered.`);
    this.name = 'DuplicateToolError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

// fetch wraps network errors as `TypeError('fetch failed')` with the real
// reason on `cause`.
function describeCause(cause: unknown): string {
  const error = toError(cause);
  if (error.cause !== undefined) {
    const inner = toError(error.cause);
    return `${error.message} (${inner.message})`;
  }
  return error.message;
}
