/**
 * send_message: lets the agent address another channel (e.g. post to a Feishu group).
 * The message is only enqueued; delivery happens on the outbound bus and never blocks the turn.
 */

import type { Tool, ToolContext } from "./types";
import { requireString } from "./types";
import type { ToolDefinition } from "../adapters/llm";
import type { OutboundPublisher } from "../bus/types";

export class SendMessageTool implements Tool {
  readonly definition: ToolDefinition = {
    name: "send_message",
    description:
      "Send a message to a chat on another channel (for example a Feishu group). " +
      "Do not use this to answer the current conversation; reply directly instead.",
    parameters: {
      type: "object",
      properties: {
        channel: { type: "string", description: "Destination channel, e.g. 'feishu'" },
        chat_id: { type: "string", description: "Destination chat or group id" },
        content: { type: "string", description: "Message text" },
      },
      required: ["channel", "chat_id", "content"],
    },
  };

  constructor(private readonly publisher: OutboundPublisher) {}

  async run(args: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    const channel = requireString(args, "channel");
    const chatId = requireString(args, "chat_id");
    const content = requireString(args, "content");
    if (channel === ctx.channel && chatId === ctx.chatId) {
      return "Error: That is the current conversation; reply directly instead of sending a message.";
    }
    this.publisher.publish({ channel, chatId, content, metadata: { session: ctx.sessionKey } });
    return `Message queued for ${channel}:${chatId}`;
  }
}
