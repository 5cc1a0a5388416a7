/**
 * HTTP + WebSocket front door.
 * GET /health -> 200 while the process is up.
 * GET /ready -> 200 once an agent is installed, else 503.
 * POST /api/chat -> one silent turn, JSON reply.
 * POST /v1/chat/completions, GET /v1/models -> OpenAI-compatible surface over the same turn.
 * WS /ws/chat -> one ConnectionSession per connection.
 */

import * as http from "http";
import { randomBytes } from "crypto";
import { WebSocketServer } from "ws";
import { ConnectionSession } from "./session/connection";
import { WebSocketChannel } from "./session/channel";
import { parseChatRequest, type ChatRequest } from "./session/protocol";
import { executeTurn, type TurnDeps, type TurnOutcome } from "./session/turn";
import type { TurnOrchestrator } from "./pipeline/orchestrator";
import { nowSeconds } from "./events/types";
import { getLastTurnMetrics, getTurnCounts, recordTurnMetrics } from "./metrics";
import { logger } from "./logging";

export const WS_PATH = "/ws/chat";
export const API_SESSION_DEFAULT = "api:default";
/** Model id reported by the OpenAI-compatible endpoints. */
export const MODEL_ID = "agent-turn-gateway";
const MAX_BODY_BYTES = 1024 * 1024;

export interface GatewayServerOptions {
  port: number;
  heartbeatIntervalMs: number;
  maxPayloadBytes: number;
}

export interface HttpReply {
  status: number;
  body: Record<string, unknown>;
}

/** Silent turn with metrics; failures are logged and rethrown. */
async function runRecordedTurn(deps: TurnDeps, agent: TurnOrchestrator, request: ChatRequest): Promise<TurnOutcome> {
  const started = Date.now();
  try {
    const outcome = await executeTurn(deps, agent, request, "api");
    recordTurnMetrics({
      session: request.session,
      channel: "api",
      iterations: outcome.result.iterations,
      toolCalls: outcome.result.toolsUsed.length,
      durationMs: Date.now() - started,
      exhausted: outcome.result.exhausted,
    });
    return outcome;
  } catch (err) {
    logger.error({ event: "TURN_FAILED", session: request.session, err: (err as Error).message }, "Turn failed");
    recordTurnMetrics({
      session: request.session,
      channel: "api",
      iterations: 0,
      toolCalls: 0,
      durationMs: Date.now() - started,
      exhausted: false,
      failed: true,
    });
    throw err;
  }
}

function failure(err: unknown): HttpReply {
  return { status: 500, body: { error: (err as Error).message || String(err) } };
}

/** Run a request/response turn. Body is the decoded JSON, or undefined when it did not parse. */
export async function handleChatRequest(deps: TurnDeps, body: unknown): Promise<HttpReply> {
  if (body === undefined) return { status: 400, body: { error: "Invalid JSON" } };
  const parsed = parseChatRequest(body, API_SESSION_DEFAULT);
  if (!parsed.ok) return { status: 400, body: { error: parsed.error } };

  const agent = deps.runtime.agent;
  if (!agent) return { status: 503, body: { error: "Agent not ready" } };

  const { request } = parsed;
  try {
    const outcome = await runRecordedTurn(deps, agent, request);
    return {
      status: 200,
      body: { response: outcome.content, session: request.session, timestamp: nowSeconds(), emotion: outcome.emotion },
    };
  } catch (err) {
    return failure(err);
  }
}

/** Content of the last `user` message in an OpenAI-style `messages` array ("" when none). */
export function lastUserMessage(body: unknown): string {
  if (typeof body !== "object" || body === null || !("messages" in body)) return "";
  const messages: unknown = body.messages;
  if (!Array.isArray(messages)) return "";
  for (let i = messages.length - 1; i >= 0; i--) {
    const m: unknown = messages[i];
    if (typeof m === "object" && m !== null && "role" in m && m.role === "user" && "content" in m && typeof m.content === "string") {
      return m.content.trim();
    }
  }
  return "";
}

/**
 * OpenAI-compatible completion: answers the last user message in a fresh `api:<hex8>` session
 * and wraps the reply in a `chat.completion` envelope. Streaming is not offered.
 */
export async function handleCompletionRequest(deps: TurnDeps, body: unknown): Promise<HttpReply> {
  if (body === undefined) return { status: 400, body: { error: "Invalid JSON" } };
  const agent = deps.runtime.agent;
  if (!agent) return { status: 503, body: { error: "Agent not ready" } };

  const message = lastUserMessage(body);
  if (!message) return { status: 400, body: { error: "No user message found" } };

  const session = `api:${randomBytes(4).toString("hex")}`;
  try {
    const outcome = await runRecordedTurn(deps, agent, { message, session });
    return {
      status: 200,
      body: {
        id: `chatcmpl-${randomBytes(6).toString("hex")}`,
        object: "chat.completion",
        created: Math.floor(Date.now() / 1000),
        model: MODEL_ID,
        choices: [{ index: 0, message: { role: "assistant", content: outcome.content }, finish_reason: "stop" }],
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
      },
    };
  } catch (err) {
    return failure(err);
  }
}

export function listModels(): HttpReply {
  return { status: 200, body: { object: "list", data: [{ id: MODEL_ID, object: "model", owned_by: "local" }] } };
}

function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      try {
        resolve(JSON.parse(Buffer.concat(chunks).toString("utf8")));
      } catch {
        resolve(undefined);
      }
    });
    req.on("error", reject);
  });
}

function writeJson(res: http.ServerResponse, reply: HttpReply): void {
  res.writeHead(reply.status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(reply.body));
}

export function createGatewayServer(deps: TurnDeps, options: GatewayServerOptions): http.Server {
  const server = http.createServer((req, res) => {
    const url = (req.url ?? "").split("?")[0];
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      writeJson(res, { status: 200, body: { ok: true } });
      return;
    }
    if (req.method === "GET" && url === "/ready") {
      const ready = deps.runtime.agent !== undefined;
      writeJson(res, {
        status: ready ? 200 : 503,
        body: { ok: ready, ready, sessions: deps.conversations.size, turns: getTurnCounts(), lastTurn: getLastTurnMetrics() ?? null },
      });
      return;
    }
    if (req.method === "GET" && url === "/v1/models") {
      writeJson(res, listModels());
      return;
    }
    const postHandler =
      req.method !== "POST" ? undefined : url === "/api/chat" ? handleChatRequest : url === "/v1/chat/completions" ? handleCompletionRequest : undefined;
    if (postHandler) {
      readJsonBody(req)
        .then((body) => postHandler(deps, body))
        .then((reply) => writeJson(res, reply))
        .catch((err: unknown) => {
          logger.warn({ event: "HTTP_REQUEST_FAILED", err: (err as Error).message }, "Chat request failed");
          if (!res.headersSent) writeJson(res, { status: 400, body: { error: (err as Error).message } });
        });
      return;
    }
    res.writeHead(404);
    res.end();
  });

  const wss = new WebSocketServer({ server, path: WS_PATH, maxPayload: options.maxPayloadBytes });
  wss.on("connection", (socket) => {
    const session = new ConnectionSession(new WebSocketChannel(socket), deps, {
      heartbeatIntervalMs: options.heartbeatIntervalMs,
    });
    session.serve().catch((err: unknown) => {
      logger.error({ event: "SESSION_FAILED", err: (err as Error).message }, "Connection session failed");
      socket.close();
    });
  });
  server.on("close", () => wss.close());

  return server;
}

/** Create the server and start listening. */
export function startGatewayServer(deps: TurnDeps, options: GatewayServerOptions): http.Server {
  const server = createGatewayServer(deps, options);
  server.listen(options.port, () => {
    logger.info({ event: "GATEWAY_STARTED", port: options.port, wsPath: WS_PATH }, "Gateway listening");
  });
  return server;
}
