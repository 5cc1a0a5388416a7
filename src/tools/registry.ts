/**
 * ToolRegistry: named tools behind IToolExecutor.
 * Tool failures are returned to the model as `Error: …` strings so the turn can continue;
 * they never abort the turn.
 */

import type { ToolDefinition } from "../adapters/llm";
import type { IToolExecutor, Tool, ToolContext } from "./types";
import { ToolArgumentError } from "./types";
import { logger } from "../logging";

export class ToolRegistry implements IToolExecutor {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): this {
    this.tools.set(tool.definition.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  async execute(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) return `Error: Tool '${name}' not found`;

    const missing = (tool.definition.parameters.required ?? []).filter((key) => args[key] === undefined);
    if (missing.length > 0) {
      return `Error: Invalid parameters for tool '${name}': missing ${missing.join(", ")}`;
    }

    try {
      return await tool.run(args, ctx);
    } catch (err) {
      if (err instanceof ToolArgumentError) {
        return `Error: Invalid parameters for tool '${name}': ${err.message}`;
      }
      const message = (err as Error).message;
      logger.warn({ event: "TOOL_FAILED", tool: name, session: ctx.sessionKey, err: message }, "Tool execution failed");
      return `Error executing ${name}: ${message}`;
    }
  }
}
