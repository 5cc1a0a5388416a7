/**
 * Turn events: the typed progress notifications streamed to the originating connection.
 * Every frame is a JSON object whose `type` field selects the shape.
 */

export interface ThinkingEvent {
  type: "thinking";
  /** 1-based model round. */
  iteration: number;
}

export interface ToolCallEvent {
  type: "tool_call";
  /** Call identifier, unique within the turn. */
  id: string;
  name: string;
  /** JSON-encoded argument payload. */
  arguments: string;
}

export interface ToolResultEvent {
  type: "tool_result";
  id: string;
  name: string;
  result: string;
}

export interface FinalEvent {
  type: "final";
  content: string;
  emotion: string;
  session: string;
  /** Seconds since epoch. */
  timestamp: number;
}

export interface ErrorEvent {
  type: "error";
  message: string;
}

export interface HeartbeatEvent {
  type: "heartbeat";
  timestamp: number;
}

/** Events the orchestrator emits while a turn is in progress. */
export type ProgressEvent = ThinkingEvent | ToolCallEvent | ToolResultEvent;

export type TurnEvent = ProgressEvent | FinalEvent | ErrorEvent | HeartbeatEvent;

/** Progress event as sent: tagged with its fixed emotion. */
export type ProgressFrame = ProgressEvent & { emotion: string };

/** A frame on the wire. */
export type OutboundFrame =
  | ProgressFrame
  | FinalEvent
  | ErrorEvent
  | HeartbeatEvent;

/**
 * Delivery contract from the orchestrator to the owning connection.
 * Emissions are awaited in order, so a sink that sends synchronously or
 * returns a promise both preserve event ordering.
 */
export type EventSink = (event: ProgressEvent) => void | Promise<void>;

export function nowSeconds(): number {
  return Date.now() / 1000;
}
