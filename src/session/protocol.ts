/**
 * Inbound frame parsing for the duplex channel.
 * Frame: { message: string (required, non-blank), session?: string, constraint?: string }.
 */

export const DEFAULT_SESSION = "default";

export interface ChatRequest {
  /** Trimmed user message. */
  message: string;
  session: string;
  constraint?: string;
}

export type ParseResult = { ok: true; request: ChatRequest } | { ok: false; error: string };

/** Validate an already-decoded body (shared with the HTTP endpoint). */
export function parseChatRequest(value: unknown, defaultSession: string = DEFAULT_SESSION): ParseResult {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, error: "Invalid frame" };
  }
  const body: Record<string, unknown> = { ...value };
  const message = typeof body.message === "string" ? body.message.trim() : "";
  if (!message) return { ok: false, error: "Empty message" };

  const session = typeof body.session === "string" && body.session.trim() ? body.session.trim() : defaultSession;
  const constraint = typeof body.constraint === "string" && body.constraint.trim() ? body.constraint.trim() : undefined;
  return { ok: true, request: { message, session, constraint } };
}

export function parseInboundFrame(raw: string, defaultSession: string = DEFAULT_SESSION): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Invalid JSON" };
  }
  return parseChatRequest(parsed, defaultSession);
}
