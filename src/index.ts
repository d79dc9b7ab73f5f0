/**
 * Twin Cities MCP Server
 *
 * Entry point for the MCP server using stdio transport. Opens the configured
 * graph database and exposes the twin cities tools over JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';

import { loadConfig } from './server/config.js';
import { closeSession, createSession } from './server/state.js';
import { createTwinCitiesTools } from './tools/twin-cities.js';

dotenv.config();

async function main(): Promise<void> {
  const session = createSession(loadConfig());

  const server = new McpServer({
    name: 'twin-cities-graph',
    version: '1.0.0',
  });

  const tools = createTwinCitiesTools(session);
  for (const [name, tool] of Object.entries(tools)) {
    server.tool(name, tool.description, tool.inputSchema, tool.handler);
  }

  const shutdown = (): void => {
    closeSession(session);
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Twin Cities MCP Server running on stdio');
  console.error(`Tools registered: ${Object.keys(tools).length}`);
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
