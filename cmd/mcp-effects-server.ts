#!/usr/bin/env node
import dotenv from 'dotenv';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { PhotoFuniaClient } from '../src/client/photoFuniaClient';
import { NdjsonLogger, field } from '../src/common/logger';
import { loadConfigFromEnv } from '../src/config';
import { SerialQueue, TOOL_DEFINITIONS, callTool } from '../src/mcp/tools';

dotenv.config();

// Use MCP_ROOT from environment to confine which files tools may read
const root = process.env.MCP_ROOT || process.cwd();

const logger = new NdjsonLogger('mcp-effects');
const env = loadConfigFromEnv();

// One client per server. The client is not safe for concurrent use, so tool
// calls are queued and run one at a time.
const queue = new SerialQueue();
const client = new PhotoFuniaClient({
  logger,
  baseUrl: env.baseUrl,
  sessionId: env.sessionId,
  timeout: env.timeout,
});

const server = new Server(
  {
    name: 'mcp-effects-server',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOL_DEFINITIONS };
});

server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: args } = request.params;
  logger.info('tool call', field('tool', name));
  return queue.run(() => callTool(name, args, { client, root, signal: extra.signal, logger }));
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr so it doesn't interfere with stdio protocol
  console.error(`MCP Effects Server started (root: ${root})`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
