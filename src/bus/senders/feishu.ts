/**
 * Feishu (Lark) sender: posts text messages through the IM open API.
 * A tenant access token is fetched with the app credentials and cached until shortly before it expires.
 */

import type { ChannelSender, OutboundMessage } from "../types";
import { logger } from "../../logging";

const DEFAULT_API_BASE = "https://open.feishu.cn/open-apis";
/** Refresh this long before the server-side expiry. */
const TOKEN_REFRESH_MARGIN_MS = 60_000;
const REQUEST_TIMEOUT_MS = 10_000;

export interface FeishuSenderConfig {
  appId: string;
  appSecret: string;
  apiBase?: string;
}

interface FeishuEnvelope {
  code?: number;
  msg?: string;
  tenant_access_token?: string;
  /** Token lifetime in seconds. */
  expire?: number;
}

/** Group chats are addressed by chat_id (oc_…), users by open_id (ou_…). */
export function receiveIdType(chatId: string): "chat_id" | "open_id" {
  return chatId.startsWith("ou_") ? "open_id" : "chat_id";
}

export class FeishuSender implements ChannelSender {
  readonly channel = "feishu";
  private readonly apiBase: string;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly cfg: FeishuSenderConfig) {
    this.apiBase = (cfg.apiBase ?? DEFAULT_API_BASE).replace(/\/$/, "");
  }

  async send(message: OutboundMessage): Promise<void> {
    const token = await this.getToken();
    const idType = receiveIdType(message.chatId);
    const res = await fetch(`${this.apiBase}/im/v1/messages?receive_id_type=${idType}`, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=utf-8", Authorization: `Bearer ${token}` },
      body: JSON.stringify({
        receive_id: message.chatId,
        msg_type: "text",
        content: JSON.stringify({ text: message.content }),
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    const body = await this.readEnvelope(res);
    if (!res.ok || body.code !== 0) {
      throw new Error(`feishu_send_failed:${res.status}:${body.code ?? "?"}:${body.msg ?? ""}`);
    }
  }

  private async getToken(): Promise<string> {
    const now = Date.now();
    if (this.token && now < this.token.expiresAt) return this.token.value;

    const res = await fetch(`${this.apiBase}/auth/v3/tenant_access_token/internal`, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=utf-8" },
      body: JSON.stringify({ app_id: this.cfg.appId, app_secret: this.cfg.appSecret }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    const body = await this.readEnvelope(res);
    if (!res.ok || body.code !== 0 || !body.tenant_access_token) {
      throw new Error(`feishu_auth_failed:${res.status}:${body.code ?? "?"}:${body.msg ?? ""}`);
    }
    const lifetimeMs = (body.expire ?? 7200) * 1000;
    this.token = { value: body.tenant_access_token, expiresAt: now + Math.max(0, lifetimeMs - TOKEN_REFRESH_MARGIN_MS) };
    logger.debug({ event: "FEISHU_TOKEN_REFRESHED", expiresInMs: lifetimeMs }, "Feishu tenant token refreshed");
    return this.token.value;
  }

  private async readEnvelope(res: Response): Promise<FeishuEnvelope> {
    try {
      return (await res.json()) as FeishuEnvelope;
    } catch {
      return {};
    }
  }
}
