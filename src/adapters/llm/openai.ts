/**
 * OpenAI Chat Completions LLM adapter with function calling.
 */

import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse, ToolCall, ToolDefinition } from "./types";
import { parseToolArguments } from "./tool-args";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  maxTokens?: number;
}

function toOpenAIMessage(m: Message): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "user":
      return { role: "user", content: m.content };
    case "tool":
      return { role: "tool", tool_call_id: m.toolCallId, content: m.content };
    case "assistant":
      if (m.toolCalls && m.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: m.content || null,
          tool_calls: m.toolCalls.map((tc) => ({
            id: tc.id,
            type: "function" as const,
            function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
          })),
        };
      }
      return { role: "assistant", content: m.content };
  }
}

function toOpenAITool(t: ToolDefinition): OpenAI.Chat.ChatCompletionTool {
  return {
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.parameters },
  };
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseUrl });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const tools = options?.tools ?? [];
    const response = await this.client.chat.completions.create({
      model: this.cfg.model,
      messages: messages.map(toOpenAIMessage),
      max_tokens: options?.maxTokens ?? this.cfg.maxTokens ?? 4096,
      ...(tools.length > 0 ? { tools: tools.map(toOpenAITool), tool_choice: "auto" as const } : {}),
    });
    const message = response.choices[0]?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: parseToolArguments(tc.function.arguments),
    }));
    return { text: message?.content ?? "", toolCalls };
  }
}
