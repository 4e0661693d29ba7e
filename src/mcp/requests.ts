// This module builds tools/list and tools/call request strings for clients and tests.

export type ToolArguments = ReadonlyArray<readonly [string, unknown]>;

export function createToolsListRequest(id: string | number = 1): string {
  return JSON.stringify({
    jsonrpc: '2.0',
    method: 'tools/list',
    id
  });
}

// Argument order is kept; the dispatcher passes only the first entry to a one-parameter tool.
export function createToolsCallRequest(toolName: string, id: string | number = 1, args: ToolArguments = []): string {
  return JSON.stringify({
    jsonrpc: '2.0',
    method: 'tools/call',
    id,
    params: {
      name: toolName,
      arguments: Object.fromEntries(args)
    }
  });
}
