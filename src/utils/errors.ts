/**
 * Error taxonomy for the bridge.
 *
 * Every failure that can reach an HTTP caller is a BridgeError carrying a
 * stable `kind` and the HTTP status it maps to. Transport and process level
 * failures are raised by the Framer, Correlator and Supervisor; validation and
 * tool errors stay local to one request.
 */

import {
  JSONRPC_INVALID_PARAMS,
  JSONRPC_INVALID_REQUEST,
  JSONRPC_METHOD_NOT_FOUND,
  type JsonRpcErrorObject,
} from '../mcp/json-rpc.js';

export type ErrorKind =
  | 'transport'
  | 'protocol'
  | 'tool_invocation'
  | 'tool_error'
  | 'timeout'
  | 'schema_validation'
  | 'unavailable'
  | 'cancelled'
  | 'bad_request'
  | 'not_found'
  | 'method_not_allowed'
  | 'payload_too_large'
  | 'config'
  | 'internal_error';

export class BridgeError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode: number;
  public readonly details?: unknown;

  public constructor(kind: ErrorKind, statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'BridgeError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** Broken pipe, closed stream or unexpected subprocess exit. */
export class TransportError extends BridgeError {
  public constructor(message: string, details?: unknown) {
    super('transport', 503, message, details);
    this.name = 'TransportError';
  }
}

/** Malformed or unexpected message from the subprocess. */
export class ProtocolError extends BridgeError {
  /** Raw line that failed to decode, when the error came from framing. */
  public readonly line?: string;

  public constructor(message: string, options: { line?: string; details?: unknown } = {}) {
    super('protocol', 502, message, options.details);
    this.name = 'ProtocolError';
    this.line = options.line;
  }
}

// JSON-RPC codes that describe a problem with the caller's request rather than the tool server
const CLIENT_ERROR_STATUS: Record<number, number> = {
  [JSONRPC_INVALID_REQUEST]: 400,
  [JSONRPC_INVALID_PARAMS]: 400,
  [JSONRPC_METHOD_NOT_FOUND]: 404,
};

/** The subprocess answered a call with a JSON-RPC error, or flagged the tool result with isError. */
export class ToolInvocationError extends BridgeError {
  public readonly rpcError?: JsonRpcErrorObject;

  public constructor(message: string, options: { rpcError?: JsonRpcErrorObject; toolResult?: unknown } = {}) {
    const status = options.rpcError ? (CLIENT_ERROR_STATUS[options.rpcError.code] ?? 502) : 502;
    super(options.rpcError ? 'tool_invocation' : 'tool_error', status, message, options.toolResult);
    this.name = 'ToolInvocationError';
    this.rpcError = options.rpcError;
  }

  public static fromRpcError(method: string, rpcError: JsonRpcErrorObject): ToolInvocationError {
    return new ToolInvocationError(`${method} failed: ${rpcError.message}`, { rpcError });
  }
}

export class TimeoutError extends BridgeError {
  public readonly timeoutMs: number;

  public constructor(method: string, timeoutMs: number) {
    super('timeout', 504, `No response to ${method} within ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface SchemaIssue {
  path: string;
  message: string;
}

export class SchemaValidationError extends BridgeError {
  public readonly issues: SchemaIssue[];

  public constructor(message: string, issues: SchemaIssue[]) {
    super('schema_validation', 422, message, issues);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/** The supervised subprocess is not ready; `state` names the lifecycle state. */
export class UnavailableError extends BridgeError {
  public readonly state: string;

  public constructor(state: string, message = `Tool server is ${state}`) {
    super('unavailable', 503, message);
    this.name = 'UnavailableError';
    this.state = state;
  }
}

export class CancelledError extends BridgeError {
  public constructor(method: string) {
    super('cancelled', 499, `Call to ${method} was cancelled`);
    this.name = 'CancelledError';
  }
}

export class HttpError extends BridgeError {
  public constructor(
    kind: 'bad_request' | 'not_found' | 'method_not_allowed' | 'payload_too_large',
    statusCode: number,
    message: string
  ) {
    super(kind, statusCode, message);
    this.name = 'HttpError';
  }
}

export class ConfigError extends BridgeError {
  public readonly issues: SchemaIssue[];

  public constructor(message: string, issues: SchemaIssue[] = []) {
    super('config', 500, message, issues);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Normalizes unknown failures into a BridgeError without leaking internals. */
export function normalizeError(error: unknown): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }

  return new BridgeError('internal_error', 500, 'An unexpected error occurred.');
}

export interface ErrorEnvelope {
  error: {
    kind: ErrorKind;
    message: string;
    [extra: string]: unknown;
  };
}

/** Builds the `{ error: { kind, message, ... } }` body returned on every non-2xx response. */
export function toErrorEnvelope(error: BridgeError): ErrorEnvelope {
  const envelope: ErrorEnvelope = { error: { kind: error.kind, message: error.message } };

  if (error instanceof UnavailableError) {
    envelope.error.state = error.state;
  } else if (error instanceof SchemaValidationError) {
    envelope.error.issues = error.issues;
  } else if (error instanceof ToolInvocationError) {
    if (error.rpcError) {
      envelope.error.rpcError = error.rpcError;
    } else if (error.details !== undefined) {
      envelope.error.result = error.details;
    }
  }

  return envelope;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
