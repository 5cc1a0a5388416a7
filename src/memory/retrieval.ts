/**
 * Retrieval store client. Indexing and ranking live in the external service;
 * the gateway only asks for the top passages for a query.
 */

export interface IRetrievalStore {
  /** False while the store is unreachable; augmentation is skipped. */
  readonly ready: boolean;
  retrieve(query: string, limit: number): Promise<string[]>;
}

export interface HttpRetrievalConfig {
  baseUrl: string;
  timeoutMs?: number;
  /** After a failed request the store reports not-ready for this long (default 30s). */
  retryAfterMs?: number;
  /** Clock; injectable for tests. */
  now?: () => number;
}

interface SearchResponse {
  results?: Array<{ content?: unknown; text?: unknown }>;
}

/**
 * POST {baseUrl}/search with `{ query, limit }`; expects `{ results: [{ content }] }`.
 * A failed request marks the store down until `retryAfterMs` has passed.
 */
export class HttpRetrievalStore implements IRetrievalStore {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryAfterMs: number;
  private readonly now: () => number;
  private downUntil = 0;

  constructor(cfg: HttpRetrievalConfig) {
    this.baseUrl = cfg.baseUrl.replace(/\/$/, "");
    this.timeoutMs = cfg.timeoutMs ?? 5000;
    this.retryAfterMs = cfg.retryAfterMs ?? 30_000;
    this.now = cfg.now ?? Date.now;
  }

  get ready(): boolean {
    return this.now() >= this.downUntil;
  }

  async retrieve(query: string, limit: number): Promise<string[]> {
    try {
      const passages = await this.search(query, limit);
      this.downUntil = 0;
      return passages;
    } catch (err) {
      this.downUntil = this.now() + this.retryAfterMs;
      throw err;
    }
  }

  private async search(query: string, limit: number): Promise<string[]> {
    const res = await fetch(`${this.baseUrl}/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query, limit }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`retrieval_http_${res.status}`);
    }
    const data = (await res.json()) as SearchResponse;
    const results = Array.isArray(data.results) ? data.results : [];
    return results
      .map((r) => (typeof r.content === "string" ? r.content : typeof r.text === "string" ? r.text : ""))
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .slice(0, limit);
  }
}
