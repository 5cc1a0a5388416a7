/**
 * Env-based configuration for the turn gateway.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type LlmProvider = "openai" | "anthropic" | "stub";

export interface AppConfig {
  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    /** Optional OpenAI-compatible endpoint (e.g. a local gateway). */
    openaiBaseUrl?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    /** Max tokens per model round. */
    maxTokens?: number;
  };

  /** Agent loop and workspace */
  agent: {
    /** Max model rounds per turn before the partial answer is returned. */
    maxIterations: number;
    /** Root for the history log and long-term memory document. */
    workspaceDir: string;
    /** Recent conversation turns replayed into each prompt, per session. */
    maxHistoryTurns: number;
    /** Conversation transcripts kept in memory before the least recently used is dropped. */
    maxSessions: number;
  };

  /** Duplex channel / HTTP server */
  server: {
    port: number;
    /** Interval between heartbeat frames while a turn runs. */
    heartbeatIntervalMs: number;
    /** Largest inbound frame accepted on the WebSocket. */
    maxPayloadBytes: number;
  };

  /** Retrieval and consolidation */
  memory: {
    /** Consolidate every N recorded turns. */
    consolidateEvery: number;
    /** History entries fed to each consolidation run. */
    historyWindow: number;
    /** Passages prepended to the user message. */
    retrievalTopK: number;
    /** Base URL of the retrieval service; unset disables augmentation. */
    retrievalUrl?: string;
  };

  /** Built-in tools */
  tools: {
    execTimeoutMs: number;
  };

  /** Outbound channel senders */
  channels: {
    feishu?: { appId: string; appSecret: string };
    /** channel name -> webhook URL */
    webhooks: Record<string, string>;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getPositiveInt(key: string, fallback: number): number {
  const v = getEnv(key);
  if (v === undefined) return fallback;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n <= 0 ? fallback : n;
}

function parseProvider(raw: string | undefined): LlmProvider {
  if (raw === "anthropic" || raw === "stub") return raw;
  return "openai";
}

/** Parse OUTBOUND_WEBHOOKS=slack=https://...,ops=https://... into a channel map. */
export function parseWebhooks(s: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!s) return out;
  for (const pair of s.split(",")) {
    const idx = pair.indexOf("=");
    if (idx <= 0) continue;
    const channel = pair.slice(0, idx).trim();
    const url = pair.slice(idx + 1).trim();
    if (channel && url) out[channel] = url;
  }
  return out;
}

/**
 * Build config from environment variables.
 * MODEL_PROVIDER (or LLM_PROVIDER) selects the adapter (openai, anthropic, stub).
 */
export function loadConfig(): AppConfig {
  const provider = parseProvider((getEnv("MODEL_PROVIDER") || getEnv("LLM_PROVIDER") || "openai").toLowerCase());
  const feishuAppId = getEnv("FEISHU_APP_ID");
  const feishuAppSecret = getEnv("FEISHU_APP_SECRET");

  return {
    llm: {
      provider,
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      openaiBaseUrl: getEnv("OPENAI_BASE_URL"),
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      maxTokens: getPositiveInt("LLM_MAX_TOKENS", 4096),
    },
    agent: {
      maxIterations: getPositiveInt("MAX_TOOL_ITERATIONS", 20),
      workspaceDir: path.resolve(getEnv("WORKSPACE_DIR") || path.join(process.cwd(), "workspace")),
      maxHistoryTurns: getPositiveInt("MAX_HISTORY_TURNS", 50),
      maxSessions: getPositiveInt("MAX_SESSIONS", 1000),
    },
    server: {
      port: getPositiveInt("PORT", 18790),
      heartbeatIntervalMs: getPositiveInt("HEARTBEAT_INTERVAL_MS", 15_000),
      maxPayloadBytes: getPositiveInt("MAX_PAYLOAD_BYTES", 65_536),
    },
    memory: {
      consolidateEvery: getPositiveInt("CONSOLIDATE_EVERY", 10),
      historyWindow: getPositiveInt("CONSOLIDATE_HISTORY_WINDOW", 50),
      retrievalTopK: getPositiveInt("RETRIEVAL_TOP_K", 3),
      retrievalUrl: getEnv("RETRIEVAL_URL"),
    },
    tools: {
      execTimeoutMs: getPositiveInt("EXEC_TIMEOUT_MS", 60_000),
    },
    channels: {
      feishu: feishuAppId && feishuAppSecret ? { appId: feishuAppId, appSecret: feishuAppSecret } : undefined,
      webhooks: parseWebhooks(getEnv("OUTBOUND_WEBHOOKS")),
    },
  };
}
