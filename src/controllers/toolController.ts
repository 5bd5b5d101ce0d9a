import type { Request, Response } from 'express';
import { AppError } from '../errors';
import { formatZodErrors } from '../middleware/validateRequest';
import type { ToolRegistry } from '../services/tools/registry';
import { requireStringParam } from './helpers';

export function createToolController(tools: ToolRegistry) {
  function listTools(_req: Request, res: Response): void {
    res.json({ tools: tools.list() });
  }

  async function invokeTool(req: Request, res: Response): Promise<void> {
    const name = requireStringParam(req, 'name');
    const tool = tools.get(name);
    if (!tool) {
      throw AppError.notFound(`Unknown tool: ${name}`);
    }

    const parsed = tool.inputSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.badRequest('Invalid tool input', formatZodErrors(parsed.error));
    }

    const output = await tool.execute(parsed.data);
    res.json(output);
  }

  return { listTools, invokeTool };
}
