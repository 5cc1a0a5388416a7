/**
 * Duplex channel: pull-based receive, push-based send.
 * The WebSocket adapter buffers inbound text frames so the session can take
 * one payload at a time while a turn is running.
 */

import WebSocket from "ws";
import type { OutboundFrame } from "../events/types";
import { AsyncQueue } from "../bus/queue";

export interface DuplexChannel {
  /** Next inbound payload; undefined once the peer has disconnected. */
  receive(): Promise<string | undefined>;
  /** Rejects when the channel is closed or the write fails. */
  send(frame: OutboundFrame): Promise<void>;
  readonly isOpen: boolean;
}

export class WebSocketChannel implements DuplexChannel {
  private readonly inbound = new AsyncQueue<string>();

  constructor(private readonly socket: WebSocket) {
    socket.on("message", (data, isBinary) => {
      if (isBinary) return;
      const buf = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
      this.inbound.push(buf.toString("utf8"));
    });
    socket.on("close", () => this.inbound.close());
    socket.on("error", () => this.inbound.close());
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  receive(): Promise<string | undefined> {
    return this.inbound.next();
  }

  send(frame: OutboundFrame): Promise<void> {
    if (!this.isOpen) return Promise.reject(new Error("channel closed"));
    return new Promise((resolve, reject) => {
      this.socket.send(JSON.stringify(frame), (err) => (err ? reject(err) : resolve()));
    });
  }
}
