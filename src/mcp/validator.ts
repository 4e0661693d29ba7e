// This module classifies one decoded message as a request, a notification, or an invalid envelope.

import type { JsonRpcErrorResponse, JsonRpcId, JsonRpcNotification, JsonRpcRequest } from '../types/mcp.js';
import { RpcErrorCode, rpcError } from './rpc.js';

export const NOTIFICATION_PREFIX = 'notifications/';

export type ValidationResult =
  | { kind: 'request'; request: JsonRpcRequest }
  | { kind: 'notification'; notification: JsonRpcNotification }
  | { kind: 'invalid'; response: JsonRpcErrorResponse };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Best-effort id extraction for error envelopes; ids of any other type cannot be echoed.
export function extractId(message: unknown): JsonRpcId {
  if (!isRecord(message)) {
    return null;
  }

  const id = message.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

function invalid(id: JsonRpcId, message: string): ValidationResult {
  return { kind: 'invalid', response: rpcError(id, RpcErrorCode.InvalidRequest, message) };
}

// Checks run in a fixed order and stop at the first failure.
export function validateMessage(message: unknown): ValidationResult {
  if (!isRecord(message)) {
    const reason = Array.isArray(message) ? 'batch requests are not supported' : 'message must be a JSON object';
    return invalid(null, `Invalid Request: ${reason}`);
  }

  const id = extractId(message);
  const hasId = 'id' in message;
  const method = message.method;

  if (message.jsonrpc !== '2.0') {
    return invalid(id, 'Invalid Request: jsonrpc must be "2.0"');
  }

  const isNotification = typeof method === 'string' && method.startsWith(NOTIFICATION_PREFIX);

  if (isNotification && hasId) {
    return invalid(id, 'Invalid Request: notifications must not include an id');
  }

  if (!isNotification && !hasId) {
    return invalid(null, 'Invalid Request: missing required id');
  }

  if (typeof method !== 'string') {
    return invalid(id, 'Invalid Request: missing required method');
  }

  if (isNotification) {
    return { kind: 'notification', notification: { jsonrpc: '2.0', method, params: message.params } };
  }

  return { kind: 'request', request: { jsonrpc: '2.0', id, method, params: message.params } };
}
