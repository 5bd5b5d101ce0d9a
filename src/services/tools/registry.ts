import type { ToolDefinition, ToolSummary } from './types';

/**
 * ToolRegistry: the tools one deployment mode exposes.
 *
 * - register() throws on duplicate names (no silent overwrites)
 * - list() returns only name + description
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  /**
   * @throws {Error} if a tool with the same name is already registered
   */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`ToolRegistry: tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Full definitions, in registration order, for transports that expose the tools. */
  all(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  list(): ToolSummary[] {
    return Array.from(this.tools.values()).map((t) => ({
      name: t.name,
      description: t.description,
    }));
  }

  count(): number {
    return this.tools.size;
  }
}
