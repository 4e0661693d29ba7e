// This module builds JSON-RPC success and error envelopes.

import type { JsonRpcErrorResponse, JsonRpcId, JsonRpcResponse, JsonRpcSuccessResponse } from '../types/mcp.js';

export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

// This helper creates a canonical JSON-RPC error payload; data is left out of the wire when absent.
export function rpcError(id: JsonRpcId, code: RpcErrorCode, message: string, data?: unknown): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

export function serializeResponse(response: JsonRpcResponse): string {
  return JSON.stringify(response);
}
