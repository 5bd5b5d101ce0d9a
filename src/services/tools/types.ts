import type { z } from 'zod';

/**
 * ToolDefinition: a named operation callable through `POST /api/tools/:name`.
 *
 * `inputSchema` validates the raw request body; `execute` receives the parsed
 * value and returns a JSON-serialisable result.
 */
export interface ToolDefinition<TSchema extends z.ZodType = z.ZodType, TOutput = unknown> {
  name: string;
  description: string;
  inputSchema: TSchema;
  execute(input: z.output<TSchema>): Promise<TOutput>;
}

/** Name + description, as returned by `GET /api/tools`. */
export interface ToolSummary {
  name: string;
  description: string;
}
