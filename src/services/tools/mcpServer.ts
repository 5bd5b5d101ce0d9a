/**
 * MCP Server
 *
 * Exposes a ToolRegistry to Model Context Protocol clients. Each tool keeps
 * its zod input schema; results are returned as one JSON text block.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from '../../utils/logger';
import type { ToolRegistry } from './registry';
import type { ToolDefinition } from './types';

const logger = createLogger('mcpServer');

export const MCP_SERVER_INFO = { name: 'weekly-report-stream', version: '1.0.0' } as const;

export function createMcpServer(tools: ToolRegistry): McpServer {
  const server = new McpServer({ ...MCP_SERVER_INFO });
  for (const tool of tools.all()) {
    registerTool(server, tool);
  }
  return server;
}

function registerTool(server: McpServer, tool: ToolDefinition): void {
  server.registerTool(
    tool.name,
    { description: tool.description, inputSchema: tool.inputSchema },
    async (args: unknown): Promise<CallToolResult> => {
      const output = await tool.execute(tool.inputSchema.parse(args));
      logger.debug({ tool: tool.name }, 'MCP tool call completed');
      return { content: [{ type: 'text', text: JSON.stringify(output) }] };
    },
  );
}
