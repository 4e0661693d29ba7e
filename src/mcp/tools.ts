// This module defines tool handler variants and runs one handler, separating reported tool failures from crashes.

import type { Logger } from 'pino';
import type { TextContent, ToolCallResult } from '../types/mcp.js';
import { ToolError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';

export type ToolReturn = string | undefined | null;

export interface NullaryToolHandler {
  kind: 'nullary';
  run: () => ToolReturn | Promise<ToolReturn>;
  documentation?: string;
}

export interface UnaryToolHandler {
  kind: 'unary';
  parameter: string;
  run: (argument: string) => ToolReturn | Promise<ToolReturn>;
  documentation?: string;
}

export type ToolHandler = NullaryToolHandler | UnaryToolHandler;

export type ToolOutcome = { kind: 'ok'; text: string } | { kind: 'tool_error'; message: string };

export function nullaryHandler(run: NullaryToolHandler['run'], documentation?: string): NullaryToolHandler {
  return { kind: 'nullary', run, documentation };
}

export function unaryHandler(parameter: string, run: UnaryToolHandler['run'], documentation?: string): UnaryToolHandler {
  return { kind: 'unary', parameter, run, documentation };
}

// This helper lists parameter names the way the schema deriver expects them.
export function declaredParameters(handler: ToolHandler): string[] {
  return handler.kind === 'unary' ? [handler.parameter] : [];
}

// This helper wraps a handler body so any generic failure is reported as a tool error instead of a crash.
export function guardToolErrors<A extends unknown[]>(
  body: (...args: A) => ToolReturn | Promise<ToolReturn>
): (...args: A) => Promise<ToolReturn> {
  return async (...args: A) => {
    try {
      return await body(...args);
    } catch (error) {
      if (error instanceof ToolError) {
        throw error;
      }
      throw new ToolError(error instanceof Error ? error.message : String(error));
    }
  };
}

function toText(toolName: string, value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }

  if (typeof value !== 'string') {
    throw new TypeError(`Tool ${toolName} returned ${typeof value}, expected a string`);
  }

  return value;
}

// This function runs one handler; anything other than a ToolError propagates to the caller as a crash.
export async function invokeTool(
  toolName: string,
  handler: ToolHandler,
  argument: string | undefined,
  logger: Logger
): Promise<ToolOutcome> {
  const startedAt = Date.now();
  logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      argument: sanitizeForLog(argument)
    },
    'mcp_tool_execution_started'
  );

  try {
    let value: ToolReturn;
    if (handler.kind === 'unary') {
      if (argument === undefined) {
        throw new TypeError(`Tool ${toolName} requires argument '${handler.parameter}'`);
      }
      value = await handler.run(argument);
    } else {
      value = await handler.run();
    }

    const text = toText(toolName, value);
    logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        resultLength: text.length
      },
      'mcp_tool_execution_completed'
    );
    return { kind: 'ok', text };
  } catch (error) {
    if (error instanceof ToolError) {
      logger.warn(
        {
          event: 'mcp_tool_reported_error',
          toolName,
          durationMs: Date.now() - startedAt,
          message: error.message
        },
        'mcp_tool_reported_error'
      );
      return { kind: 'tool_error', message: error.message };
    }

    logger.error(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );
    throw error;
  }
}

// This helper renders an outcome as the MCP tools/call result payload.
export function toToolCallResult(outcome: ToolOutcome): ToolCallResult {
  const content: TextContent[] = [
    { type: 'text', text: outcome.kind === 'ok' ? outcome.text : outcome.message }
  ];
  return { content, isError: outcome.kind === 'tool_error' };
}
