/**
 * exec: run a shell command in the workspace and return its combined output.
 */

import { spawn } from "child_process";
import type { Tool, ToolContext } from "./types";
import { requireString } from "./types";
import type { ToolDefinition } from "../adapters/llm";

const MAX_OUTPUT_CHARS = 10_000;

const DENY_PATTERNS = [
  /\brm\s+-[rf]{1,2}\s+\/(\s|$)/,
  /\b(shutdown|reboot|poweroff|halt)\b/,
  /\bmkfs(\.\w+)?\b/,
  /\bdd\s+if=/,
  /:\(\)\s*\{\s*:\|:&\s*\};:/,
];

export interface ExecToolConfig {
  workingDir: string;
  timeoutMs: number;
}

export class ExecTool implements Tool {
  readonly definition: ToolDefinition = {
    name: "exec",
    description: "Execute a shell command in the workspace and return its output. Use with caution.",
    parameters: {
      type: "object",
      properties: {
        command: { type: "string", description: "The shell command to execute" },
      },
      required: ["command"],
    },
  };

  constructor(private readonly cfg: ExecToolConfig) {}

  async run(args: Record<string, unknown>, _ctx: ToolContext): Promise<string> {
    const command = requireString(args, "command");
    if (DENY_PATTERNS.some((re) => re.test(command))) {
      return "Error: Command blocked by safety guard";
    }
    const { stdout, stderr, code, timedOut } = await this.spawnShell(command);
    if (timedOut) return `Error: Command timed out after ${this.cfg.timeoutMs}ms`;

    const parts: string[] = [];
    if (stdout) parts.push(stdout);
    if (stderr.trim()) parts.push(`STDERR:\n${stderr}`);
    if (code !== 0) parts.push(`\nExit code: ${code}`);
    const result = parts.length > 0 ? parts.join("\n") : "(no output)";
    return result.length > MAX_OUTPUT_CHARS
      ? `${result.slice(0, MAX_OUTPUT_CHARS)}\n... (truncated, ${result.length - MAX_OUTPUT_CHARS} more chars)`
      : result;
  }

  /**
   * The shell runs in its own process group so a timeout kills everything it started.
   * On timeout the promise settles immediately instead of waiting for the pipes to close.
   */
  private spawnShell(command: string): Promise<{ stdout: string; stderr: string; code: number | null; timedOut: boolean }> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        shell: true,
        cwd: this.cfg.workingDir,
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });
      const out: Buffer[] = [];
      const err: Buffer[] = [];
      let settled = false;
      const finish = (code: number | null, timedOut: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          stdout: Buffer.concat(out).toString("utf8"),
          stderr: Buffer.concat(err).toString("utf8"),
          code,
          timedOut,
        });
      };
      const timer = setTimeout(() => {
        killGroup(child.pid);
        child.stdout.destroy();
        child.stderr.destroy();
        finish(null, true);
      }, this.cfg.timeoutMs);
      child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => err.push(chunk));
      child.on("error", (e) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(e);
      });
      child.on("close", (code) => finish(code, false));
    });
  }
}

function killGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, "SIGKILL");
  } catch (err) {
    // ESRCH: the group already exited
    if ((err as NodeJS.ErrnoException).code !== "ESRCH") throw err;
  }
}
