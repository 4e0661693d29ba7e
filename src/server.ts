// This module defines the server context: tool registry, lifecycle flag, and the message entry point.

import type { Logger } from 'pino';
import { loadConfig, type RuntimeConfig } from './config/config.js';
import { dispatchNotification, dispatchRequest, type DispatchContext, type NotificationHook } from './mcp/dispatcher.js';
import { ToolRegistry, type ToolRegistration, type ToolRegistrationInput } from './mcp/registry.js';
import { RpcErrorCode, rpcError, serializeResponse } from './mcp/rpc.js';
import { createLoggerTraceSink, type TraceSink } from './mcp/trace.js';
import { extractId, validateMessage } from './mcp/validator.js';
import type { JsonRpcResponse } from './types/mcp.js';
import { ServerStateError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, createLogger, errorForLog } from './utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface McpServerOptions {
  name?: string;
  version?: string;
  logger?: Logger;
  traceIo?: boolean;
  traceSink?: TraceSink;
  onInitialized?: NotificationHook;
}

// Decoded messages handed in by callers may not be JSON-safe (cycles, bigint).
function describeForTrace(message: unknown): string {
  try {
    return JSON.stringify(message) ?? String(message);
  } catch (error) {
    return `[unserializable message: ${normalizeError(error).message}]`;
  }
}

export class McpServer {
  public readonly registry = new ToolRegistry();
  private readonly logger: Logger;
  private readonly context: DispatchContext;
  private readonly traceIo: boolean;
  private readonly traceSink: TraceSink;
  private readonly onInitialized?: NotificationHook;
  private running = false;
  // Entry-point calls are chained so each message finishes before the next starts.
  private queue: Promise<unknown> = Promise.resolve();

  public constructor(options: McpServerOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.traceIo = options.traceIo ?? false;
    this.traceSink = options.traceSink ?? createLoggerTraceSink(this.logger);
    this.onInitialized = options.onInitialized;
    this.context = {
      registry: this.registry,
      logger: this.logger,
      serverInfo: {
        name: options.name ?? MCP_SERVER_NAME,
        version: options.version ?? MCP_SERVER_VERSION
      },
      protocolVersion: MCP_PROTOCOL_VERSION
    };
  }

  public registerTool(input: ToolRegistrationInput): ToolRegistration {
    const registration = this.registry.register(input);
    this.logger.info({ event: 'mcp_tool_registered', toolName: registration.id }, 'mcp_tool_registered');
    return registration;
  }

  public unregisterTool(id: string): boolean {
    const removed = this.registry.unregister(id);
    if (removed) {
      this.logger.info({ event: 'mcp_tool_unregistered', toolName: id }, 'mcp_tool_unregistered');
    }
    return removed;
  }

  public isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      throw new ServerStateError('MCP server is already running');
    }
    this.running = true;
    this.logger.info({ event: 'mcp_server_started', tools: this.registry.size }, 'mcp_server_started');
  }

  // Registered tools survive stop/start; stop only gates the entry point.
  public stop(): void {
    if (!this.running) {
      throw new ServerStateError('MCP server is not running');
    }
    this.running = false;
    this.logger.info({ event: 'mcp_server_stopped' }, 'mcp_server_stopped');
  }

  // Returns the serialized response, or undefined for notifications.
  public async process(raw: string): Promise<string | undefined> {
    this.assertRunning();
    return this.enqueue(async () => {
      this.trace('in', raw);

      let decoded: unknown;
      try {
        decoded = JSON.parse(raw);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return this.respond(rpcError(null, RpcErrorCode.ParseError, `Parse error: ${message}`));
      }

      const response = await this.handle(decoded);
      return response === undefined ? undefined : this.respond(response);
    });
  }

  // Same as process, for callers that already hold a decoded message.
  public async processMessage(message: unknown): Promise<JsonRpcResponse | undefined> {
    this.assertRunning();
    return this.enqueue(async () => {
      if (this.traceIo) {
        this.trace('in', describeForTrace(message));
      }

      const response = await this.handle(message);
      if (response !== undefined && this.traceIo) {
        this.trace('out', serializeResponse(response));
      }
      return response;
    });
  }

  private assertRunning(): void {
    if (!this.running) {
      throw new ServerStateError('MCP server is not running; call start() first');
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async handle(message: unknown): Promise<JsonRpcResponse | undefined> {
    try {
      const validation = validateMessage(message);
      switch (validation.kind) {
        case 'invalid':
          this.logger.warn(
            { event: 'mcp_invalid_request', message: validation.response.error.message },
            'mcp_invalid_request'
          );
          return validation.response;
        case 'notification':
          dispatchNotification(validation.notification, this.context, this.onInitialized);
          return undefined;
        case 'request':
          return await dispatchRequest(validation.request, this.context);
      }
    } catch (error) {
      this.logger.error({ event: 'mcp_process_failed', error: errorForLog(error) }, 'mcp_process_failed');
      return rpcError(extractId(message), RpcErrorCode.InternalError, `Internal error: ${normalizeError(error).message}`);
    }
  }

  private respond(response: JsonRpcResponse): string {
    const serialized = serializeResponse(response);
    this.trace('out', serialized);
    return serialized;
  }

  private trace(direction: 'in' | 'out', message: string): void {
    if (this.traceIo) {
      this.traceSink.record(direction, message);
    }
  }
}

// This helper builds a server from environment configuration; explicit options win over the environment.
export function createMcpServer(config: RuntimeConfig = loadConfig(), options: McpServerOptions = {}): McpServer {
  return new McpServer({
    name: config.serverName,
    version: config.serverVersion,
    traceIo: config.traceIo,
    logger: options.logger ?? createLogger(buildLoggerOptions(config.logLevel, config.serverName)),
    ...options
  });
}
