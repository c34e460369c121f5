#!/usr/bin/env node
/**
 * Stdio transport entry point for desktop MCP clients
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { SERVER_NAME, SERVER_VERSION } from './server.js';
import { ToolRegistry } from './tools/index.js';

async function main() {
  const config = loadConfig();

  const toolRegistry = new ToolRegistry({
    intervals: config.intervals,
    strava: config.strava,
  });

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  toolRegistry.registerTools(server);

  // stdout carries the protocol; send logs to stderr
  console.log = console.error;

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
