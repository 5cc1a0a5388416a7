/**
 * In-process stand-ins shared by the unit and integration tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { ChatOptions, ChatResponse, ILLM, Message, ToolCall } from "../../src/adapters/llm";
import type { Tool, ToolContext } from "../../src/tools/types";
import type { DuplexChannel } from "../../src/session/channel";
import type { OutboundFrame } from "../../src/events/types";
import { AsyncQueue } from "../../src/bus/queue";

export function reply(text: string, toolCalls: ToolCall[] = []): ChatResponse {
  return { text, toolCalls };
}

export function call(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
  return { id, name, arguments: args };
}

/** Returns scripted responses in order and records every request. */
export class ScriptedLLM implements ILLM {
  readonly requests: Array<{ messages: Message[]; options?: ChatOptions }> = [];
  private readonly script: Array<ChatResponse | Error>;

  constructor(script: Array<ChatResponse | Error>) {
    this.script = [...script];
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.requests.push({ messages: [...messages], options });
    const next = this.script.shift();
    if (next === undefined) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

/** Tool that records its calls and returns a fixed string (or the result of `respond`). */
export class RecordingTool implements Tool {
  readonly calls: Array<{ args: Record<string, unknown>; ctx: ToolContext }> = [];

  constructor(
    readonly definition: Tool["definition"],
    private readonly respond: (args: Record<string, unknown>) => string | Promise<string>
  ) {}

  async run(args: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    this.calls.push({ args, ctx });
    return this.respond(args);
  }
}

export function echoTool(): RecordingTool {
  return new RecordingTool(
    {
      name: "echo",
      description: "Echo the text argument",
      parameters: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
    },
    (args) => `echo:${String(args.text)}`
  );
}

/** Duplex channel driven by the test: deliver() inbound payloads, read `sent` frames. */
export class FakeChannel implements DuplexChannel {
  readonly sent: OutboundFrame[] = [];
  private readonly inbound = new AsyncQueue<string>();
  private open = true;
  private listeners: Array<() => void> = [];

  get isOpen(): boolean {
    return this.open;
  }

  deliver(raw: string): void {
    this.inbound.push(raw);
  }

  disconnect(): void {
    this.open = false;
    this.inbound.close();
  }

  receive(): Promise<string | undefined> {
    return this.inbound.next();
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (!this.open) throw new Error("channel closed");
    this.sent.push(frame);
    const listeners = this.listeners;
    this.listeners = [];
    listeners.forEach((l) => l());
  }

  types(): string[] {
    return this.sent.map((f) => f.type);
  }

  /** Resolve once `count` frames matching `type` have been sent. */
  async waitFor(type: OutboundFrame["type"], count = 1): Promise<void> {
    while (this.sent.filter((f) => f.type === type).length < count) {
      await new Promise<void>((resolve) => this.listeners.push(resolve));
    }
  }
}

export function makeTempWorkspace(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "turn-gateway-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
