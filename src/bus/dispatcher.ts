/**
 * OutboundDispatchBus: one consumer drains the shared queue and routes each message
 * to the sender registered for its channel.
 *
 * At-most-once, best-effort: unknown channels are dropped with a warning, sender
 * failures are logged and skipped, nothing is retried, and whatever is still queued
 * at stop() is discarded. Items published before start() wait in the queue.
 */

import { AsyncQueue } from "./queue";
import type { ChannelSender, OutboundMessage, OutboundPublisher } from "./types";
import { logger } from "../logging";

export class OutboundDispatchBus implements OutboundPublisher {
  private readonly queue = new AsyncQueue<OutboundMessage>();
  private readonly senders = new Map<string, ChannelSender>();
  private loop: Promise<void> | null = null;
  private stopped = false;

  registerSender(sender: ChannelSender): void {
    this.senders.set(sender.channel, sender);
  }

  channels(): string[] {
    return [...this.senders.keys()];
  }

  publish(message: OutboundMessage): void {
    if (!this.queue.push(message)) {
      logger.warn({ event: "OUTBOUND_DROPPED", channel: message.channel, reason: "bus_stopped" }, "Outbound bus stopped; message dropped");
      return;
    }
    logger.debug({ event: "OUTBOUND_ENQUEUED", channel: message.channel, chatId: message.chatId, pending: this.queue.size }, "Outbound message enqueued");
  }

  get pending(): number {
    return this.queue.size;
  }

  get running(): boolean {
    return this.loop !== null && !this.stopped;
  }

  /** Start the consumer. Idempotent; resolves when the loop exits after stop(). */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.consume();
      logger.info({ event: "OUTBOUND_BUS_STARTED", channels: this.channels() }, "Outbound dispatcher started");
    }
    return this.loop;
  }

  /** Stop consuming and discard queued messages. An in-flight delivery finishes on its own. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    const discarded = this.queue.clear();
    this.queue.close();
    if (discarded > 0) {
      logger.warn({ event: "OUTBOUND_DISCARDED", discarded }, "Outbound messages discarded at shutdown");
    }
  }

  private async consume(): Promise<void> {
    while (!this.stopped) {
      const message = await this.queue.next();
      if (message === undefined) break;
      await this.dispatch(message);
    }
  }

  private async dispatch(message: OutboundMessage): Promise<void> {
    const sender = this.senders.get(message.channel);
    if (!sender) {
      logger.warn({ event: "OUTBOUND_UNKNOWN_CHANNEL", channel: message.channel, chatId: message.chatId }, "No sender for channel; message dropped");
      return;
    }
    try {
      await sender.send(message);
      logger.info({ event: "OUTBOUND_DELIVERED", channel: message.channel, chatId: message.chatId }, "Outbound message delivered");
    } catch (err) {
      logger.error({ event: "OUTBOUND_FAILED", channel: message.channel, chatId: message.chatId, err: (err as Error).message }, "Outbound delivery failed");
    }
  }
}
