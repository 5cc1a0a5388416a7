import type { Message } from "../adapters/llm";
import type { ConversationSnapshot } from "../memory/session";

export const ASSISTANT_SYSTEM_PROMPT = [
  "You are a helpful personal assistant with access to tools.",
  "Use tools to actually perform actions (run commands, send messages) instead of describing them; never invent tool results.",
  "When something is uncertain, say so plainly.",
  "Keep replies concise unless the user asks for detail.",
].join("\n");

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to ASSISTANT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Clock for the "current time" line; injectable for tests. */
  now?: () => Date;
}

export interface BuildPromptArgs {
  /** User content for this turn (already augmented and constrained). */
  userContent: string;
  snapshot: ConversationSnapshot;
  /** Long-term memory document; omitted from the prompt when empty. */
  longTermMemory?: string;
  channel: string;
  chatId: string;
}

/** Append the client's reply-style constraint after the message. */
export function applyConstraint(content: string, constraint?: string): string {
  const c = (constraint || "").trim();
  return c ? `${content}\n\n(Reply requirements: ${c})` : content;
}

/**
 * PromptManager
 *
 * Builds the initial context of a turn: system prompt (with long-term memory and
 * session info), the recent conversation, then the new user message.
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly now: () => Date;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? ASSISTANT_SYSTEM_PROMPT;
    this.now = cfg.now ?? (() => new Date());
  }

  buildSystemPrompt(args: Pick<BuildPromptArgs, "longTermMemory" | "channel" | "chatId">): string {
    const parts = [this.systemPrompt, `Current time: ${this.now().toISOString()}`];
    const memory = (args.longTermMemory || "").trim();
    if (memory) parts.push(`## Long-term memory\n${memory}`);
    parts.push(`## Current session\nChannel: ${args.channel}\nChat ID: ${args.chatId}`);
    return parts.join("\n\n");
  }

  buildMessages(args: BuildPromptArgs): Message[] {
    return [
      { role: "system", content: this.buildSystemPrompt(args) },
      ...args.snapshot.turns.map((t) => ({ role: t.role, content: t.content })),
      { role: "user", content: args.userContent },
    ];
  }
}
