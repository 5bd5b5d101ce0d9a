/**
 * MCP over streamable HTTP, stateless: every POST gets its own server and
 * transport, both closed when the response closes.
 */

import express, { type Request, type Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { asyncHandler } from '../middleware';
import { createMcpServer } from '../services/tools/mcpServer';
import type { ToolRegistry } from '../services/tools/registry';
import { createLogger, errorMessage } from '../utils/logger';

const logger = createLogger('mcp');

export function createMcpRouter(tools: ToolRegistry): express.Router {
  const router = express.Router();

  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const server = createMcpServer(tools);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        logger.warn({ error: errorMessage(err) }, 'Failed to close MCP transport');
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  }));

  // Stateless: there is no session stream to open or delete
  const methodNotAllowed = (_req: Request, res: Response): void => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  };
  router.get('/', methodNotAllowed);
  router.delete('/', methodNotAllowed);

  return router;
}
