#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAtlasTool } from './tools/atlas.js';
import { logger } from './logger.js';

const server = new McpServer({
  name: 'atlaspack',
  version: '1.0.0',
});

registerAtlasTool(server);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.warn('atlaspack MCP server running on stdio');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
