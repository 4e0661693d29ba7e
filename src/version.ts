// This module centralizes server identity values so handshake metadata and transports stay in sync.

export const MCP_SERVER_NAME = 'mcp-tool-dispatcher';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';
