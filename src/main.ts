// This is the process entrypoint that serves one MCP server over HTTP and handles graceful shutdown.

import { loadConfig } from './config/config.js';
import { createHttpTransport } from './http/transport.js';
import { createMcpServer } from './server.js';

const config = loadConfig();
const server = createMcpServer(config);
const app = createHttpTransport(server, { logLevel: config.logLevel });

server.start();

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');

  try {
    await app.close();
  } finally {
    if (server.isRunning()) {
      server.stop();
    }
  }

  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info({ host: config.host, port: config.port, tools: server.registry.size }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: error instanceof Error ? error.message : String(error) }, 'server_start_failed');
    process.exit(1);
  });
