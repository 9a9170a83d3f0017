/**
 * JSON-RPC 2.0 message model shared by the Framer and the Correlator.
 *
 * Decoded lines are classified with zod into exactly one of request,
 * notification, success response or error response. Anything else is a
 * protocol error for that line.
 */

import { z } from 'zod';

export type JsonRpcId = string | number;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export type ClassifiedMessage =
  | { kind: 'request'; message: JsonRpcRequest }
  | { kind: 'notification'; message: JsonRpcNotification }
  | { kind: 'response'; message: JsonRpcResponse };

// Standard JSON-RPC error codes used by the bridge
export const JSONRPC_INVALID_REQUEST = -32600;
export const JSONRPC_METHOD_NOT_FOUND = -32601;
export const JSONRPC_INVALID_PARAMS = -32602;

const idSchema = z.union([z.string(), z.number()]);

const errorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema,
  method: z.string(),
  params: z.unknown().optional(),
});

const notificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
});

const successResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema,
  result: z.unknown(),
});

const errorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema.nullable(),
  error: errorObjectSchema,
});

function hasOwn(value: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

/**
 * Classifies an already-parsed JSON value. Returns an error string when the
 * value is not a JSON-RPC 2.0 message.
 */
export function classifyMessage(value: unknown): ClassifiedMessage | { kind: 'invalid'; reason: string } {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { kind: 'invalid', reason: 'Expected a JSON-RPC object' };
  }

  if (hasOwn(value, 'method')) {
    if (hasOwn(value, 'id')) {
      const parsed = requestSchema.safeParse(value);
      return parsed.success
        ? { kind: 'request', message: parsed.data }
        : { kind: 'invalid', reason: `Malformed request: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
    }

    const parsed = notificationSchema.safeParse(value);
    return parsed.success
      ? { kind: 'notification', message: parsed.data }
      : { kind: 'invalid', reason: `Malformed notification: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
  }

  if (hasOwn(value, 'error')) {
    const parsed = errorResponseSchema.safeParse(value);
    return parsed.success
      ? { kind: 'response', message: parsed.data }
      : { kind: 'invalid', reason: `Malformed error response: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
  }

  if (hasOwn(value, 'result')) {
    const parsed = successResponseSchema.safeParse(value);
    if (!parsed.success) {
      return { kind: 'invalid', reason: 'Malformed response: missing jsonrpc version or id' };
    }
    return { kind: 'response', message: { jsonrpc: '2.0', id: parsed.data.id, result: parsed.data.result } };
  }

  return { kind: 'invalid', reason: 'Message has neither method, result nor error' };
}

export function isErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return 'error' in response;
}
