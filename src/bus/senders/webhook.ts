/**
 * Generic webhook sender: POSTs `{ chat_id, content, metadata }` as JSON to a fixed URL per channel.
 */

import type { ChannelSender, OutboundMessage } from "../types";

export class WebhookSender implements ChannelSender {
  constructor(
    readonly channel: string,
    private readonly url: string,
    private readonly timeoutMs: number = 10_000
  ) {}

  async send(message: OutboundMessage): Promise<void> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ chat_id: message.chatId, content: message.content, metadata: message.metadata ?? {} }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`webhook_http_${res.status}:${text.slice(0, 120)}`);
    }
  }
}
