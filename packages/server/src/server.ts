import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger, ToolDispatcher } from '@obsidian-vault-mcp/core';

export const SERVER_INFO = {
  name: 'obsidian-vault-mcp',
  version: '0.1.0'
} as const;

/**
 * Creates an MCP server whose `tools/list` and `tools/call` requests are
 * answered by the dispatcher. Failures are thrown so the SDK reports them as
 * JSON-RPC errors.
 */
export function createMcpServer(
  dispatcher: ToolDispatcher,
  logger: Logger
): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: { tools: {} }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools().map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema }
    }))
  }));

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    logger.log(`[mcp] tools/call ${name}`);
    const content = await dispatcher.callTool(name, args ?? {});
    return { content };
  });

  server.onerror = error => {
    logger.log(error);
  };

  return server;
}
