/**
 * Workspace memory files: the append-only history log (HISTORY.md, one entry per line)
 * and the long-term memory document (MEMORY.md, free text rewritten by consolidation).
 */

import * as fs from "fs";
import * as path from "path";

export const HISTORY_FILE = "HISTORY.md";
export const MEMORY_FILE = "MEMORY.md";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM`. */
export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

export class MemoryFiles {
  readonly dir: string;

  constructor(workspaceDir: string) {
    this.dir = path.join(workspaceDir, "memory");
  }

  get historyPath(): string {
    return path.join(this.dir, HISTORY_FILE);
  }

  get memoryPath(): string {
    return path.join(this.dir, MEMORY_FILE);
  }

  async appendHistory(line: string): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    await fs.promises.appendFile(this.historyPath, `${line}\n`, "utf8");
  }

  /** Non-empty history lines, oldest first; empty when the log does not exist. */
  async readHistory(): Promise<string[]> {
    const text = await readIfExists(this.historyPath);
    return text.split("\n").filter((l) => l.trim().length > 0);
  }

  /** Long-term memory document; empty string when absent. */
  async readMemory(): Promise<string> {
    return readIfExists(this.memoryPath);
  }

  async writeMemory(content: string): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    await fs.promises.writeFile(this.memoryPath, content.endsWith("\n") ? content : `${content}\n`, "utf8");
  }
}

async function readIfExists(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return "";
    throw err;
  }
}
