/**
 * Outbound dispatch types.
 */

/** Agent-produced content addressed to an external channel. */
export interface OutboundMessage {
  /** Destination channel tag, e.g. "feishu". */
  channel: string;
  /** Destination address on that channel (chat/group id). */
  chatId: string;
  content: string;
  metadata?: Record<string, unknown>;
}

/** Delivers messages for one channel tag. Throwing marks the delivery failed (it is not retried). */
export interface ChannelSender {
  readonly channel: string;
  send(message: OutboundMessage): Promise<void>;
}

/** Producer side of the bus, handed to tools. */
export interface OutboundPublisher {
  publish(message: OutboundMessage): void;
}
