/**
 * Per-turn metrics. Counters and latencies are logged; the last snapshot is kept for /ready.
 */

import { logger } from "../logging";

export interface TurnMetrics {
  session: string;
  /** Origin channel tag (ws, api). */
  channel: string;
  /** Model rounds used. */
  iterations: number;
  /** Tool calls executed. */
  toolCalls: number;
  /** Wall time from accepted payload to terminal event (ms). */
  durationMs: number;
  /** Iteration budget ran out. */
  exhausted: boolean;
  /** Turn ended with an error event. */
  failed?: boolean;
}

let lastTurnMetrics: TurnMetrics | undefined;
let turnsCompleted = 0;
let turnsFailed = 0;

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  if (metrics.failed) turnsFailed++;
  else turnsCompleted++;
  logger.info(
    {
      event: "TURN_METRICS",
      session: metrics.session,
      channel: metrics.channel,
      iterations: metrics.iterations,
      tool_calls: metrics.toolCalls,
      duration_ms: metrics.durationMs,
      exhausted: metrics.exhausted,
      failed: metrics.failed ?? false,
    },
    "Turn metrics"
  );
}

export function getLastTurnMetrics(): TurnMetrics | undefined {
  return lastTurnMetrics ? { ...lastTurnMetrics } : undefined;
}

export function getTurnCounts(): { completed: number; failed: number } {
  return { completed: turnsCompleted, failed: turnsFailed };
}
