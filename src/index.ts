// Public entry point of the MCP tool dispatcher library.

export { McpServer, createMcpServer, type McpServerOptions } from './server.js';
export { ToolRegistry, describeTool, type ToolRegistration, type ToolRegistrationInput } from './mcp/registry.js';
export {
  guardToolErrors,
  nullaryHandler,
  unaryHandler,
  type NullaryToolHandler,
  type ToolHandler,
  type ToolReturn,
  type UnaryToolHandler
} from './mcp/tools.js';
export { PARAMETER_SECTION_MARKER, deriveInputSchema, parseParameterSection } from './mcp/schema-deriver.js';
export { RpcErrorCode, rpcError, rpcResult } from './mcp/rpc.js';
export { validateMessage, type ValidationResult } from './mcp/validator.js';
export { createToolsCallRequest, createToolsListRequest, type ToolArguments } from './mcp/requests.js';
export { MemoryTraceSink, createLoggerTraceSink, type TraceDirection, type TraceSink } from './mcp/trace.js';
export { createHttpTransport, type HttpTransportOptions } from './http/transport.js';
export { loadConfig, type RuntimeConfig } from './config/config.js';
export { AppError, RegistrationError, ServerStateError, ToolError } from './utils/errors.js';
export { createLogger, buildLoggerOptions } from './utils/logger.js';
export { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';
export type * from './types/mcp.js';
