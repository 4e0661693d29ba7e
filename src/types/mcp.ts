// This file defines JSON-RPC envelopes and MCP payload shapes produced by the dispatcher.

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string | number | null;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface StringPropertySchema {
  type: 'string';
  description?: string;
}

export interface ToolInputSchema {
  type: 'object';
  properties?: Record<string, StringPropertySchema>;
  required?: string[];
}

export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  annotations?: ToolAnnotations;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallResult {
  content: TextContent[];
  isError: boolean;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: {
    tools: { listChanged?: boolean };
    resources: Record<string, never>;
    prompts: Record<string, never>;
  };
  serverInfo: {
    name: string;
    version: string;
  };
}
