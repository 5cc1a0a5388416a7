import { PromptManager, applyConstraint } from "../../../src/prompts/prompt-manager";
import type { ConversationSnapshot } from "../../../src/memory/session";

describe("PromptManager", () => {
  const emptySnapshot: ConversationSnapshot = { turns: [] };
  const fixedNow = () => new Date("2025-03-01T08:30:00.000Z");

  it("builds the system prompt with time and session info", () => {
    const pm = new PromptManager({ systemPrompt: "You help.", now: fixedNow });
    expect(pm.buildSystemPrompt({ channel: "ws", chatId: "s1" })).toBe(
      "You help.\n\nCurrent time: 2025-03-01T08:30:00.000Z\n\n## Current session\nChannel: ws\nChat ID: s1"
    );
  });

  it("includes long-term memory only when present", () => {
    const pm = new PromptManager({ systemPrompt: "You help.", now: fixedNow });
    const withMemory = pm.buildSystemPrompt({ channel: "ws", chatId: "s1", longTermMemory: "  - likes tea\n" });
    expect(withMemory).toContain("\n\n## Long-term memory\n- likes tea\n\n## Current session");
    expect(pm.buildSystemPrompt({ channel: "ws", chatId: "s1", longTermMemory: "  " })).not.toContain("Long-term memory");
  });

  it("replays history between the system prompt and the new message", () => {
    const pm = new PromptManager({ systemPrompt: "You help.", now: fixedNow });
    const msgs = pm.buildMessages({
      userContent: "And tomorrow?",
      snapshot: {
        turns: [
          { role: "user", content: "Weather today?", timestamp: 0 },
          { role: "assistant", content: "Sunny.", timestamp: 1 },
        ],
      },
      channel: "ws",
      chatId: "s1",
    });
    expect(msgs.map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(msgs.slice(1)).toEqual([
      { role: "user", content: "Weather today?" },
      { role: "assistant", content: "Sunny." },
      { role: "user", content: "And tomorrow?" },
    ]);
  });

  it("uses the default prompt when none is given", () => {
    const msgs = new PromptManager().buildMessages({ userContent: "hi", snapshot: emptySnapshot, channel: "api", chatId: "x" });
    expect(msgs[0].content.startsWith("You are a helpful personal assistant")).toBe(true);
  });
});

describe("applyConstraint", () => {
  it("appends a reply requirement", () => {
    expect(applyConstraint("hello", " keep it short ")).toBe("hello\n\n(Reply requirements: keep it short)");
  });

  it("leaves the message alone without one", () => {
    expect(applyConstraint("hello")).toBe("hello");
    expect(applyConstraint("hello", "  ")).toBe("hello");
  });
});
