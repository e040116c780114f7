#!/usr/bin/env node

/**
 * Work Summary MCP Server
 *
 * Exposes the pull request work summary as an MCP tool over stdio.
 *
 * Tools:
 *   work_summary, get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { TOOL_DEFINITIONS, handleToolCall } from './tools.js';

const VERSION = '1.0.0';

const SERVER_INSTRUCTIONS = `work-summary reports a GitHub user's pull request activity over a time period.

Use work_summary when the user asks what they (or someone) worked on today, yesterday, this week,
this month, or between two dates. Use get_capabilities to check whether credentials are configured.`;

const server = new Server(
  { name: 'work-summary', version: VERSION },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

server.setRequestHandler(ListToolsRequestSchema, () => {
  return { tools: TOOL_DEFINITIONS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args);
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[work-summary] MCP server v${VERSION} started`);
}

main().catch((error) => {
  console.error('[work-summary] Fatal error:', error);
  process.exit(1);
});
