#!/usr/bin/env node

// MCP servers must only output JSON-RPC messages to stdout; all logging goes to stderr

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { DocQaServer } from './server.js';
import { logger } from './util/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const server = new DocQaServer(config);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, discarding sessions and shutting down...`);
    server
      .close()
      .catch((error) => logger.error('Error during shutdown:', error))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Document QA MCP server running on stdio');
}

main().catch((err) => {
  logger.error('Server failed to start:', err);
  process.exit(1);
});
