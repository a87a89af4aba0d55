#!/usr/bin/env node
/**
 * tweetwright MCP server
 *
 * Exposes posting, relationships and metrics via Model Context Protocol.
 * Credentials come from AUTH_TOKEN and CT0 (a .env file in the working directory is read too).
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('tweetwright MCP server running on stdio');
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
