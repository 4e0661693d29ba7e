// Shared fixtures for the dispatcher test suites.

import { pino } from 'pino';
import { McpServer, type McpServerOptions } from '../src/server.js';
import { unaryHandler } from '../src/mcp/tools.js';

export const silentLogger = pino({ level: 'silent' });

export const ECHO_DOC = `Return the input unchanged.

MCP Parameters:
  text - The text to echo back`;

export const echoHandler = unaryHandler('text', (text) => text, ECHO_DOC);

export function startedServer(options: McpServerOptions = {}): McpServer {
  const server = new McpServer({ logger: silentLogger, ...options });
  server.start();
  return server;
}

// Parses a response string the dispatcher produced; fails the test on a missing response.
export function parseResponse(raw: string | undefined): unknown {
  if (raw === undefined) {
    throw new Error('expected a response, got none');
  }
  return JSON.parse(raw);
}
