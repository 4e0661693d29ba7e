// This module routes validated requests and notifications to handshake, listing, and tool invocation.

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { InitializeResult, JsonRpcNotification, JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { describeTool, type ToolRegistry } from './registry.js';
import { RpcErrorCode, rpcError, rpcResult } from './rpc.js';
import { invokeTool, toToolCallResult } from './tools.js';

export interface DispatchContext {
  registry: ToolRegistry;
  logger: Logger;
  serverInfo: {
    name: string;
    version: string;
  };
  protocolVersion: string;
}

const toolCallParamsSchema = z.object({
  name: z.string({ required_error: 'params.name is required', invalid_type_error: 'params.name must be a string' }),
  arguments: z.record(z.unknown()).optional()
});

function buildInitializeResult(context: DispatchContext): InitializeResult {
  return {
    protocolVersion: context.protocolVersion,
    capabilities: {
      tools: context.registry.size > 0 ? { listChanged: true } : {},
      resources: {},
      prompts: {}
    },
    serverInfo: { ...context.serverInfo }
  };
}

async function handleToolsCall(request: JsonRpcRequest, context: DispatchContext): Promise<JsonRpcResponse> {
  const parsed = toolCallParamsSchema.safeParse(request.params);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    return rpcError(request.id, RpcErrorCode.InvalidParams, `Invalid params: ${message}`);
  }

  const { name } = parsed.data;
  const registration = context.registry.lookup(name);
  if (!registration) {
    context.logger.warn({ event: 'mcp_tool_not_found', toolName: name }, 'mcp_tool_not_found');
    return rpcError(request.id, RpcErrorCode.InvalidRequest, `Tool not found: ${name}`);
  }

  let argument: string | undefined;
  if (registration.handler.kind === 'unary') {
    // Only the first supplied argument entry is passed; the rest are ignored.
    const first = Object.entries(parsed.data.arguments ?? {})[0];
    if (!first) {
      return rpcError(
        request.id,
        RpcErrorCode.InvalidParams,
        `Invalid params: tool ${name} requires argument '${registration.handler.parameter}'`
      );
    }
    if (typeof first[1] !== 'string') {
      return rpcError(request.id, RpcErrorCode.InvalidParams, `Invalid params: argument '${first[0]}' must be a string`);
    }
    argument = first[1];
  }

  try {
    const outcome = await invokeTool(name, registration.handler, argument, context.logger);
    return rpcResult(request.id, toToolCallResult(outcome));
  } catch (error) {
    const { message } = normalizeError(error);
    return rpcError(request.id, RpcErrorCode.InternalError, `Internal error executing tool ${name}: ${message}`);
  }
}

// This function handles one request and always produces a response.
export async function dispatchRequest(request: JsonRpcRequest, context: DispatchContext): Promise<JsonRpcResponse> {
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();

  context.logger.info(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: request.id,
      method: request.method,
      params: sanitizeForLog(request.params)
    },
    'mcp_rpc_request_received'
  );

  try {
    switch (request.method) {
      case 'initialize':
        return rpcResult(request.id, buildInitializeResult(context));

      case 'tools/list':
        return rpcResult(request.id, { tools: context.registry.list().map(describeTool) });

      case 'tools/call':
        return await handleToolsCall(request, context);

      default:
        return rpcError(request.id, RpcErrorCode.MethodNotFound, `Method not found: ${request.method}`);
    }
  } catch (error) {
    context.logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: request.id,
        method: request.method,
        error: errorForLog(error)
      },
      'mcp_rpc_request_failed'
    );
    const { message } = normalizeError(error);
    return rpcError(request.id, RpcErrorCode.InternalError, `Internal error: ${message}`);
  } finally {
    context.logger.info(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        rpcRequestId: request.id,
        method: request.method,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

export type NotificationHook = (notification: JsonRpcNotification) => void;

// Notifications never produce wire output, recognized or not.
export function dispatchNotification(
  notification: JsonRpcNotification,
  context: DispatchContext,
  onInitialized?: NotificationHook
): void {
  switch (notification.method) {
    case 'notifications/initialized':
      context.logger.info({ event: 'mcp_client_initialized' }, 'mcp_client_initialized');
      try {
        onInitialized?.(notification);
      } catch (error) {
        context.logger.error(
          { event: 'mcp_initialized_hook_failed', error: errorForLog(error) },
          'mcp_initialized_hook_failed'
        );
      }
      return;

    case 'notifications/cancelled':
      // In-flight handlers run to completion.
      context.logger.info(
        { event: 'mcp_cancel_ignored', params: sanitizeForLog(notification.params) },
        'mcp_cancel_ignored'
      );
      return;

    default:
      context.logger.warn(
        { event: 'mcp_unknown_notification', method: notification.method },
        'mcp_unknown_notification'
      );
  }
}
