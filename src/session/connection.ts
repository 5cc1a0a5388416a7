/**
 * ConnectionSession: owns one duplex connection for its lifetime.
 *
 * States: idle -> receiving -> turn_running -> idle ... -> closed.
 * Payloads are handled one at a time; a payload that arrives mid-turn waits in the
 * channel until the turn ends. While a turn runs, heartbeats go out every
 * `heartbeatIntervalMs`; the heartbeat and the progress sink are both shut off
 * before the terminal frame is sent, so nothing follows `final` or `error`.
 */

import type { DuplexChannel } from "./channel";
import { parseInboundFrame, type ChatRequest } from "./protocol";
import { executeTurn, type TurnDeps, type TurnOutcome } from "./turn";
import type { TurnOrchestrator } from "../pipeline/orchestrator";
import type { EventSink, OutboundFrame } from "../events/types";
import { nowSeconds } from "../events/types";
import { enrichEvent } from "../events/emotion";
import { recordTurnMetrics } from "../metrics";
import { logger, logTurn } from "../logging";

export type SessionState = "idle" | "receiving" | "turn_running" | "closed";

export interface ConnectionSessionConfig {
  heartbeatIntervalMs: number;
  /** Channel tag recorded on turns and passed to tools (default "ws"). */
  channelTag?: string;
}

export class ConnectionSession {
  private state: SessionState = "idle";
  private readonly heartbeatIntervalMs: number;
  private readonly channelTag: string;

  constructor(
    private readonly channel: DuplexChannel,
    private readonly deps: TurnDeps,
    config: ConnectionSessionConfig
  ) {
    this.heartbeatIntervalMs = config.heartbeatIntervalMs;
    this.channelTag = config.channelTag ?? "ws";
  }

  get currentState(): SessionState {
    return this.state;
  }

  /** Receive loop; resolves once the peer disconnects. */
  async serve(): Promise<void> {
    logger.info({ event: "SESSION_OPEN", channel: this.channelTag }, "Connection session opened");
    for (;;) {
      this.state = "receiving";
      const raw = await this.channel.receive();
      if (raw === undefined) break;
      await this.handlePayload(raw);
      this.state = "idle";
    }
    this.state = "closed";
    logger.info({ event: "SESSION_CLOSED", channel: this.channelTag }, "Connection session closed");
  }

  private async handlePayload(raw: string): Promise<void> {
    const parsed = parseInboundFrame(raw);
    if (!parsed.ok) {
      await this.send({ type: "error", message: parsed.error });
      return;
    }
    const agent = this.deps.runtime.agent;
    if (!agent) {
      await this.send({ type: "error", message: "Agent not ready" });
      return;
    }
    await this.runTurn(agent, parsed.request);
  }

  private async runTurn(agent: TurnOrchestrator, request: ChatRequest): Promise<void> {
    this.state = "turn_running";
    logTurn(logger, "start", request.session);
    const started = Date.now();

    let sinkActive = true;
    const sink: EventSink = async (event) => {
      if (sinkActive) await this.send(enrichEvent(event));
    };
    const heartbeat = setInterval(() => {
      void this.send({ type: "heartbeat", timestamp: nowSeconds() });
    }, this.heartbeatIntervalMs);

    let outcome: TurnOutcome | undefined;
    let failure: string | undefined;
    try {
      outcome = await executeTurn(this.deps, agent, request, this.channelTag, sink);
    } catch (err) {
      failure = (err as Error).message || String(err);
    } finally {
      sinkActive = false;
      clearInterval(heartbeat);
      logTurn(logger, "end", request.session);
    }

    if (outcome === undefined) {
      const message = failure ?? "Turn failed";
      logger.error({ event: "TURN_FAILED", session: request.session, err: message }, "Turn failed");
      recordTurnMetrics({
        session: request.session,
        channel: this.channelTag,
        iterations: 0,
        toolCalls: 0,
        durationMs: Date.now() - started,
        exhausted: false,
        failed: true,
      });
      await this.send({ type: "error", message });
      return;
    }

    recordTurnMetrics({
      session: request.session,
      channel: this.channelTag,
      iterations: outcome.result.iterations,
      toolCalls: outcome.result.toolsUsed.length,
      durationMs: Date.now() - started,
      exhausted: outcome.result.exhausted,
    });
    await this.send({
      type: "final",
      content: outcome.content,
      emotion: outcome.emotion,
      session: request.session,
      timestamp: nowSeconds(),
    });
  }

  /** Best-effort send; a closed or failing channel is logged and skipped. */
  private async send(frame: OutboundFrame): Promise<void> {
    if (!this.channel.isOpen) return;
    try {
      await this.channel.send(frame);
    } catch (err) {
      logger.debug({ event: "SESSION_SEND_FAILED", type: frame.type, err: (err as Error).message }, "Dropped outbound frame");
    }
  }
}
