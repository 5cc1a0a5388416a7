/**
 * LLM adapter types.
 * Implementations can be swapped via config (e.g. OpenAI, Anthropic, stub).
 */

/** A tool request issued by the model. Arguments are already parsed. */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** JSON-schema description of a tool, as offered to the model. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
  /** Raw tool-call descriptors when the model asked for tools in this round. */
  toolCalls?: ToolCall[];
}

export interface ToolMessage {
  role: "tool";
  /** Id of the call this result answers. */
  toolCallId: string;
  name: string;
  content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface ChatOptions {
  /** Tool catalog; omit or pass empty for a plain completion. */
  tools?: ToolDefinition[];
  /** Max tokens to generate. */
  maxTokens?: number;
}

export interface ChatResponse {
  /** Text of the assistant reply (may be empty when only tools were requested). */
  text: string;
  /** Tool invocations requested in this round, in the order the model listed them. */
  toolCalls: ToolCall[];
}

/**
 * LLM adapter interface: messages in, assistant reply (text and/or tool calls) out.
 */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
