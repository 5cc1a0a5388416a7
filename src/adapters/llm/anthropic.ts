/**
 * Anthropic Claude LLM adapter with tool use.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse, ToolCall } from "./types";
import { isRecord } from "./tool-args";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

/**
 * Map the provider-neutral history onto Anthropic messages: the system prompt
 * moves out of the list, tool calls become tool_use blocks and consecutive tool
 * results are folded into a single user message.
 */
export function toAnthropicMessages(messages: Message[]): { system?: string; messages: Anthropic.Messages.MessageParam[] } {
  const systemParts: string[] = [];
  const out: Anthropic.Messages.MessageParam[] = [];
  let pendingResults: Anthropic.Messages.ToolResultBlockParam[] = [];

  const flushResults = (): void => {
    if (pendingResults.length === 0) return;
    out.push({ role: "user", content: pendingResults });
    pendingResults = [];
  };

  for (const m of messages) {
    if (m.role === "system") {
      systemParts.push(m.content);
      continue;
    }
    if (m.role === "tool") {
      pendingResults.push({ type: "tool_result", tool_use_id: m.toolCallId, content: m.content });
      continue;
    }
    flushResults();
    if (m.role === "user") {
      out.push({ role: "user", content: m.content });
      continue;
    }
    const blocks: Array<Anthropic.Messages.TextBlockParam | Anthropic.Messages.ToolUseBlockParam> = [];
    if (m.content) blocks.push({ type: "text", text: m.content });
    for (const tc of m.toolCalls ?? []) {
      blocks.push({ type: "tool_use", id: tc.id, name: tc.name, input: tc.arguments });
    }
    out.push({ role: "assistant", content: blocks.length > 0 ? blocks : m.content });
  }
  flushResults();

  return { system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined, messages: out };
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const { system, messages: msgs } = toAnthropicMessages(messages);
    const tools = options?.tools ?? [];
    const response = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? this.cfg.maxTokens ?? 4096,
      system,
      messages: msgs,
      ...(tools.length > 0
        ? { tools: tools.map((t) => ({ name: t.name, description: t.description, input_schema: t.parameters })) }
        : {}),
    });

    const textParts: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        textParts.push(block.text);
      } else if (block.type === "tool_use") {
        toolCalls.push({ id: block.id, name: block.name, arguments: isRecord(block.input) ? block.input : {} });
      }
    }
    return { text: textParts.join("\n"), toolCalls };
  }
}
