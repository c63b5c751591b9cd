#!/usr/bin/env node
// Load environment variables before any module reads them
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createQueryServer } from './server/QueryServer.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const server = createQueryServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('Query compiler MCP server running on stdio');
}

main().catch((error) => {
  logger.error('Fatal error starting server', error);
  process.exit(1);
});
