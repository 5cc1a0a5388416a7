/**
 * Unit tests for LLM adapters (stub, factory and message mapping).
 */

import { StubLLM, OpenAILLM, AnthropicLLM, createLLM } from "../../../src/adapters/llm";
import { toAnthropicMessages } from "../../../src/adapters/llm/anthropic";
import { parseToolArguments } from "../../../src/adapters/llm/tool-args";
import type { AppConfig } from "../../../src/config";

function configWith(llm: AppConfig["llm"]): AppConfig {
  return {
    llm,
    agent: { maxIterations: 20, workspaceDir: "/tmp/ws", maxHistoryTurns: 50, maxSessions: 1000 },
    server: { port: 0, heartbeatIntervalMs: 15000, maxPayloadBytes: 65536 },
    memory: { consolidateEvery: 10, historyWindow: 50, retrievalTopK: 3 },
    tools: { execTimeoutMs: 60000 },
    channels: { webhooks: {} },
  };
}

describe("StubLLM", () => {
  it("returns its fixed reply and no tool calls", async () => {
    const result = await new StubLLM("pong").chat([{ role: "user", content: "ping" }]);
    expect(result).toEqual({ text: "pong", toolCalls: [] });
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(configWith({ provider: "stub" }))).toBeInstanceOf(StubLLM);
  });

  it("returns StubLLM when the selected provider has no key", () => {
    expect(createLLM(configWith({ provider: "openai" }))).toBeInstanceOf(StubLLM);
  });

  it("builds the configured provider", () => {
    expect(createLLM(configWith({ provider: "openai", openaiApiKey: "test-key" }))).toBeInstanceOf(OpenAILLM);
    expect(createLLM(configWith({ provider: "anthropic", anthropicApiKey: "test-key" }))).toBeInstanceOf(AnthropicLLM);
  });
});

describe("toAnthropicMessages", () => {
  it("lifts the system prompt and folds consecutive tool results", () => {
    const mapped = toAnthropicMessages([
      { role: "system", content: "sys" },
      { role: "user", content: "do two things" },
      {
        role: "assistant",
        content: "",
        toolCalls: [
          { id: "t1", name: "exec", arguments: { command: "ls" } },
          { id: "t2", name: "exec", arguments: { command: "pwd" } },
        ],
      },
      { role: "tool", toolCallId: "t1", name: "exec", content: "a.txt" },
      { role: "tool", toolCallId: "t2", name: "exec", content: "/work" },
      { role: "assistant", content: "Done." },
    ]);
    expect(mapped.system).toBe("sys");
    expect(mapped.messages).toEqual([
      { role: "user", content: "do two things" },
      {
        role: "assistant",
        content: [
          { type: "tool_use", id: "t1", name: "exec", input: { command: "ls" } },
          { type: "tool_use", id: "t2", name: "exec", input: { command: "pwd" } },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", tool_use_id: "t1", content: "a.txt" },
          { type: "tool_result", tool_use_id: "t2", content: "/work" },
        ],
      },
      { role: "assistant", content: [{ type: "text", text: "Done." }] },
    ]);
  });
});

describe("parseToolArguments", () => {
  it("parses objects and keeps unusable payloads raw", () => {
    expect(parseToolArguments('{"command":"ls"}')).toEqual({ command: "ls" });
    expect(parseToolArguments("")).toEqual({});
    expect(parseToolArguments('{"command":')).toEqual({ _raw: '{"command":' });
    expect(parseToolArguments("[1]")).toEqual({ _raw: "[1]" });
  });
});
