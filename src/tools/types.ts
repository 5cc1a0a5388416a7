/**
 * Tool execution types.
 * The orchestrator only sees IToolExecutor; tools themselves are registered on a ToolRegistry.
 */

import type { ToolDefinition } from "../adapters/llm";

/** Where the current turn came from; tools that deliver messages need it. */
export interface ToolContext {
  sessionKey: string;
  /** Origin channel tag (e.g. "ws", "api"). */
  channel: string;
  /** Origin chat/conversation address. */
  chatId: string;
}

export interface Tool {
  readonly definition: ToolDefinition;
  run(args: Record<string, unknown>, ctx: ToolContext): Promise<string>;
}

/** Executes model-requested tools and exposes the catalog offered to the model. */
export interface IToolExecutor {
  definitions(): ToolDefinition[];
  execute(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<string>;
}

/** Thrown by a tool when the model passed arguments it cannot use. */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolArgumentError";
  }
}

export function requireString(args: Record<string, unknown>, key: string): string {
  const v = args[key];
  if (typeof v !== "string" || !v.trim()) throw new ToolArgumentError(`'${key}' must be a non-empty string`);
  return v;
}
