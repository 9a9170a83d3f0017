import { describe, it, expect } from 'vitest';
import {
  JSONRPC_INVALID_PARAMS,
  JSONRPC_INVALID_REQUEST,
  JSONRPC_METHOD_NOT_FOUND,
} from '../../src/mcp/json-rpc.js';
import { ToolInvocationError } from '../../src/utils/errors.js';

describe('ToolInvocationError', () => {
  it('maps request-side JSON-RPC codes to client errors', () => {
    const status = (code: number) =>
      ToolInvocationError.fromRpcError('tools/call', { code, message: 'rejected' }).statusCode;

    expect(status(JSONRPC_INVALID_REQUEST)).toBe(400);
    expect(status(JSONRPC_INVALID_PARAMS)).toBe(400);
    expect(status(JSONRPC_METHOD_NOT_FOUND)).toBe(404);
    expect(status(-32603)).toBe(502);
  });

  it('reports a tool result flagged isError as tool_error', () => {
    const error = new ToolInvocationError('Tool echo reported an error', { toolResult: ['boom'] });

    expect(error.kind).toBe('tool_error');
    expect(error.statusCode).toBe(502);
    expect(error.details).toEqual(['boom']);
  });
});
