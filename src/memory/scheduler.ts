/**
 * MemoryScheduler: wraps each turn with retrieval augmentation (before) and
 * history recording plus periodic consolidation (after).
 *
 * Recording and consolidation are side channels: failures are logged, never raised.
 * Consolidation runs detached as a tracked task every `consolidateEvery` recorded turns.
 * Overlapping triggers are chained so runs never interleave; each run still rewrites
 * MEMORY.md in full.
 */

import type { ILLM } from "../adapters/llm";
import type { IRetrievalStore } from "./retrieval";
import type { RuntimeContext } from "../runtime/context";
import { MemoryFiles, formatTimestamp } from "./history-log";
import { consolidateMemory } from "./consolidation";
import { oneLine } from "../pipeline/text";
import { logger } from "../logging";

const DEFAULT_CONSOLIDATE_EVERY = 10;
const DEFAULT_HISTORY_WINDOW = 50;
const DEFAULT_TOP_K = 3;
const USER_ENTRY_MAX_CHARS = 200;
const ASSISTANT_ENTRY_MAX_CHARS = 300;

export const CONTEXT_BLOCK_START = "[Relevant context retrieved from the knowledge base, for reference only]";
export const CONTEXT_BLOCK_END = "[End of context]";

export interface MemorySchedulerConfig {
  workspaceDir: string;
  /** Consolidate when the turn counter is a multiple of this (default 10). */
  consolidateEvery?: number;
  /** Most recent history entries fed to consolidation (default 50). */
  historyWindow?: number;
  /** Passages to retrieve per message (default 3). */
  topK?: number;
}

export class MemoryScheduler {
  private readonly files: MemoryFiles;
  private readonly consolidateEvery: number;
  private readonly historyWindow: number;
  private readonly topK: number;
  /** Tail of the consolidation chain. */
  private consolidationTail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly llm: ILLM,
    private readonly retrieval: IRetrievalStore | undefined,
    private readonly runtime: RuntimeContext,
    config: MemorySchedulerConfig
  ) {
    this.files = new MemoryFiles(config.workspaceDir);
    this.consolidateEvery = config.consolidateEvery ?? DEFAULT_CONSOLIDATE_EVERY;
    this.historyWindow = config.historyWindow ?? DEFAULT_HISTORY_WINDOW;
    this.topK = config.topK ?? DEFAULT_TOP_K;
  }

  get memoryFiles(): MemoryFiles {
    return this.files;
  }

  /** Prepend retrieved context to the message; unchanged when nothing relevant is found. */
  async augment(message: string): Promise<string> {
    if (!this.retrieval || !this.retrieval.ready) return message;
    try {
      const passages = await this.retrieval.retrieve(message, this.topK);
      if (passages.length === 0) return message;
      return `${CONTEXT_BLOCK_START}\n${passages.join("\n\n")}\n${CONTEXT_BLOCK_END}\n\n${message}`;
    } catch (err) {
      logger.error({ event: "MEMORY_AUGMENT_FAILED", err: (err as Error).message }, "Memory augmentation failed");
      return message;
    }
  }

  /** Append the exchange to the history log and trigger consolidation on every Nth turn. */
  async record(session: string, userMessage: string, assistantMessage: string): Promise<void> {
    const line =
      `[${formatTimestamp(new Date())}] [${session}] ` +
      `Q: ${oneLine(userMessage, USER_ENTRY_MAX_CHARS)} | A: ${oneLine(assistantMessage, ASSISTANT_ENTRY_MAX_CHARS)}`;
    try {
      await this.files.appendHistory(line);
    } catch (err) {
      logger.warn({ event: "HISTORY_WRITE_FAILED", session, err: (err as Error).message }, "Failed to append history entry");
    }

    const count = this.runtime.turns.increment();
    if (count % this.consolidateEvery === 0) {
      logger.info({ event: "CONSOLIDATION_SCHEDULED", turn: count }, "Scheduling memory consolidation");
      void this.runtime.tasks.track("memory.consolidate", this.scheduleConsolidation());
    }
  }

  /** Queue a consolidation behind any run already in flight. */
  scheduleConsolidation(): Promise<boolean> {
    const run = this.consolidationTail.then(() => this.consolidate());
    this.consolidationTail = run;
    return run;
  }

  /**
   * Rewrite MEMORY.md from the last `historyWindow` entries and the current document.
   * Returns true when the document was replaced.
   */
  async consolidate(): Promise<boolean> {
    const started = Date.now();
    try {
      const [history, existing] = await Promise.all([this.files.readHistory(), this.files.readMemory()]);
      const entries = history.slice(-this.historyWindow);
      const updated = await consolidateMemory(this.llm, existing, entries);
      if (!updated) {
        logger.warn({ event: "CONSOLIDATION_EMPTY", entries: entries.length }, "Consolidation returned nothing; memory left unchanged");
        return false;
      }
      await this.files.writeMemory(updated);
      logger.info(
        { event: "CONSOLIDATION_DONE", entries: entries.length, chars: updated.length, durationMs: Date.now() - started },
        "Long-term memory consolidated"
      );
      return true;
    } catch (err) {
      logger.error({ event: "CONSOLIDATION_FAILED", err: (err as Error).message }, "Memory consolidation failed");
      return false;
    }
  }

  /** Current long-term memory document ("" when absent or unreadable). */
  async readLongTermMemory(): Promise<string> {
    try {
      return (await this.files.readMemory()).trim();
    } catch (err) {
      logger.warn({ event: "MEMORY_READ_FAILED", err: (err as Error).message }, "Failed to read long-term memory");
      return "";
    }
  }
}
