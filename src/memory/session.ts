/**
 * Per-session conversation transcripts replayed into prompts.
 * Each session keeps its last `maxTurns` turns; the store keeps at most
 * `maxSessions` sessions and evicts the least recently used.
 */

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
  /** ms since epoch */
  timestamp: number;
}

export interface ConversationSnapshot {
  /** Oldest first. */
  turns: ConversationTurn[];
}

export interface SessionMemoryConfig {
  maxTurns: number;
}

export class SessionMemory {
  private turns: ConversationTurn[] = [];
  private readonly maxTurns: number;

  constructor(config: SessionMemoryConfig) {
    this.maxTurns = config.maxTurns;
  }

  append(role: "user" | "assistant", content: string): void {
    if (!content.trim()) return;
    this.turns.push({
      role,
      content: content.trim(),
      timestamp: Date.now(),
    });
    while (this.turns.length > this.maxTurns) {
      this.turns.shift();
    }
  }

  getSnapshot(): ConversationSnapshot {
    return { turns: [...this.turns] };
  }
}

export interface ConversationStoreConfig extends SessionMemoryConfig {
  /** Sessions kept before the least recently used is dropped (default 1000). */
  maxSessions?: number;
}

const DEFAULT_MAX_SESSIONS = 1000;

/** Session key -> SessionMemory, created on first use. */
export class ConversationStore {
  /** Insertion order doubles as recency order. */
  private readonly sessions = new Map<string, SessionMemory>();
  private readonly maxSessions: number;

  constructor(private readonly config: ConversationStoreConfig) {
    this.maxSessions = config.maxSessions ?? DEFAULT_MAX_SESSIONS;
  }

  get(sessionKey: string): SessionMemory {
    const existing = this.sessions.get(sessionKey);
    if (existing) {
      this.sessions.delete(sessionKey);
      this.sessions.set(sessionKey, existing);
      return existing;
    }
    const created = new SessionMemory({ maxTurns: this.config.maxTurns });
    this.sessions.set(sessionKey, created);
    this.evict();
    return created;
  }

  /** Record one completed exchange. */
  appendExchange(sessionKey: string, userMessage: string, assistantMessage: string): void {
    const mem = this.get(sessionKey);
    mem.append("user", userMessage);
    mem.append("assistant", assistantMessage);
  }

  get size(): number {
    return this.sessions.size;
  }

  private evict(): void {
    for (const key of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(key);
    }
  }
}
