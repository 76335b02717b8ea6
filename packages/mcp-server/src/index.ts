#!/usr/bin/env node
/**
 * meshbridge MCP Server
 *
 * Exposes the host application as MCP tools over stdio. Logs go to stderr:
 * stdout carries the JSON-RPC stream.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadServerConfig } from './config.js';
import { ToolContext } from './context.js';
import { createServer } from './server.js';

const config = loadServerConfig();
const ctx = new ToolContext(config);
const server = createServer(ctx);

ctx.logger.info('meshbridge MCP server starting (host %s:%d, op log %s, %s)', config.host, config.port, config.logDir, ctx.debug.mode);

let stopping = false;
async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  ctx.logger.info('received %s, shutting down', signal);
  await server.close();
  await ctx.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      ctx.logger.error('shutdown failed: %s', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  });
}

const transport = new StdioServerTransport();
await server.connect(transport);
