// This module exposes one McpServer over streamable HTTP; it moves raw strings and holds no protocol logic.

import { fastify, type FastifyInstance } from 'fastify';
import type { McpServer } from '../server.js';
import { buildLoggerOptions } from '../utils/logger.js';

export interface HttpTransportOptions {
  path?: string;
  logLevel?: string;
  bodyLimit?: number;
}

export function createHttpTransport(server: McpServer, options: HttpTransportOptions = {}): FastifyInstance {
  const path = options.path ?? '/mcp';
  const app = fastify({
    logger: buildLoggerOptions(options.logLevel),
    bodyLimit: options.bodyLimit ?? 1024 * 1024
  });

  // The dispatcher owns JSON decoding, so parse errors come back as JSON-RPC parse errors.
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.get(path, async () => ({
    transport: 'streamable-http',
    endpoint: path,
    methods: ['initialize', 'tools/list', 'tools/call'],
    running: server.isRunning()
  }));

  app.post(path, async (request, reply) => {
    const raw = typeof request.body === 'string' ? request.body : '';

    if (!server.isRunning()) {
      request.log.warn({ event: 'mcp_post_while_stopped' }, 'mcp_post_while_stopped');
      return reply.code(503).send({ error: 'server_stopped', message: 'MCP server is not running.' });
    }

    const response = await server.process(raw);
    if (response === undefined) {
      return reply.code(202).send();
    }

    return reply.code(200).header('content-type', 'application/json; charset=utf-8').send(response);
  });

  return app;
}
