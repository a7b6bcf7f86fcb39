#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { serveJama } from './server.js';

async function main() {
  const cfg = loadConfig(process.env);
  const log = createLogger(cfg);
  const transport = new StdioServerTransport();

  // Graceful shutdown: closing the transport ends serveJama, which releases the client
  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down...');
    transport.close().catch((err: unknown) => {
      log.error({ err }, 'Error while closing stdio transport');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await serveJama(process.env, { log, transport });
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Failed to start Jama MCP server:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
