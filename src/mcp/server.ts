/**
 * tapdeck — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../context.js';
import { registerQueryTool } from './tools/query.js';
import { registerAnalyzeTool } from './tools/analyze.js';
import { registerAnnotateTool } from './tools/annotate.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server over one application context.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer({
    name: 'tapdeck',
    version: '0.1.0',
  });

  registerQueryTool(server, ctx);
  registerAnalyzeTool(server, ctx);
  registerAnnotateTool(server, ctx);

  registerResources(server, ctx);

  return server;
}
