/**
 * MCP server factory. Kept apart from the stdio entry point so tests can
 * build a server without touching process streams.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext } from './context.js';
import { registerTools } from './tools.js';

export const SERVER_NAME = 'meshbridge';
export const SERVER_VERSION = '0.1.0';

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      instructions:
        'Drive a 3D content application for mesh generation, inspection, export and printability analysis. ' +
        'The host application must be running with its bridge listening before these tools can reach it.',
    },
  );
  registerTools(server, ctx);
  return server;
}
