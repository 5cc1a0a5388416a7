/**
 * Unit tests for the request/response chat handler.
 */

import { handleChatRequest, handleCompletionRequest, lastUserMessage, listModels, MODEL_ID } from "../../../src/server";
import type { TurnDeps } from "../../../src/session/turn";
import { RuntimeContext } from "../../../src/runtime/context";
import { MemoryScheduler } from "../../../src/memory/scheduler";
import { ConversationStore } from "../../../src/memory/session";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import { TurnOrchestrator } from "../../../src/pipeline/orchestrator";
import { ToolRegistry } from "../../../src/tools/registry";
import type { ChatResponse } from "../../../src/adapters/llm";
import { ScriptedLLM, call, echoTool, makeTempWorkspace, removeDir, reply } from "../../helpers/fakes";

describe("handleChatRequest", () => {
  let workspace: string;
  let runtime: RuntimeContext;

  beforeEach(() => {
    workspace = makeTempWorkspace();
    runtime = new RuntimeContext();
  });

  afterEach(async () => {
    await runtime.tasks.drain(1000);
    removeDir(workspace);
  });

  function deps(script?: Array<ChatResponse | Error>): TurnDeps {
    if (script) {
      runtime.installAgent(new TurnOrchestrator(new ScriptedLLM(script), new ToolRegistry().register(echoTool()), { maxIterations: 4 }));
    }
    return {
      runtime,
      memory: new MemoryScheduler(new ScriptedLLM([]), undefined, runtime, { workspaceDir: workspace }),
      conversations: new ConversationStore({ maxTurns: 10 }),
      prompts: new PromptManager(),
    };
  }

  it("runs a silent turn and returns the cleaned reply", async () => {
    const reply1 = await handleChatRequest(deps([reply("", [call("a", "echo", { text: "x" })]), reply("Done:\n- one")]), {
      message: "go",
    });
    expect(reply1.status).toBe(200);
    expect(reply1.body).toMatchObject({ response: "Done:\none", session: "api:default", emotion: "neutral" });
    expect(typeof reply1.body.timestamp).toBe("number");
  });

  it("rejects bodies that did not parse or lack a message", async () => {
    await expect(handleChatRequest(deps([]), undefined)).resolves.toEqual({ status: 400, body: { error: "Invalid JSON" } });
    await expect(handleChatRequest(deps([]), { message: "" })).resolves.toEqual({ status: 400, body: { error: "Empty message" } });
  });

  it("answers 503 before an agent is installed", async () => {
    await expect(handleChatRequest(deps(), { message: "hi" })).resolves.toEqual({ status: 503, body: { error: "Agent not ready" } });
  });

  it("answers 500 when the turn fails", async () => {
    await expect(handleChatRequest(deps([new Error("upstream 500")]), { message: "hi" })).resolves.toEqual({
      status: 500,
      body: { error: "upstream 500" },
    });
  });

  describe("OpenAI-compatible completion", () => {
    it("answers the last user message in a chat.completion envelope", async () => {
      const result = await handleCompletionRequest(deps([reply("Paris.")]), {
        model: "any",
        messages: [
          { role: "system", content: "be terse" },
          { role: "user", content: "capital of Italy?" },
          { role: "assistant", content: "Rome." },
          { role: "user", content: "and France?" },
        ],
      });
      expect(result.status).toBe(200);
      expect(result.body).toMatchObject({
        object: "chat.completion",
        model: MODEL_ID,
        choices: [{ index: 0, message: { role: "assistant", content: "Paris." }, finish_reason: "stop" }],
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
      });
      expect(String(result.body.id)).toMatch(/^chatcmpl-[0-9a-f]{12}$/);
    });

    it("runs each request in a fresh api session", async () => {
      const llm = new ScriptedLLM([reply("one"), reply("two")]);
      runtime.installAgent(new TurnOrchestrator(llm, new ToolRegistry(), { maxIterations: 2 }));
      const d = deps();
      await handleCompletionRequest(d, { messages: [{ role: "user", content: "first" }] });
      await handleCompletionRequest(d, { messages: [{ role: "user", content: "second" }] });

      const systems = llm.requests.map((r) => r.messages[0].content);
      const chatIds = systems.map((text) => /Chat ID: (api:[0-9a-f]{8})/.exec(text)?.[1]);
      expect(chatIds[0]).toBeDefined();
      expect(chatIds[1]).toBeDefined();
      expect(chatIds[0]).not.toBe(chatIds[1]);
      expect(llm.requests[1].messages).toHaveLength(2);
    });

    it("rejects a request without a user message", async () => {
      await expect(handleCompletionRequest(deps([]), { messages: [{ role: "system", content: "x" }] })).resolves.toEqual({
        status: 400,
        body: { error: "No user message found" },
      });
    });

    it("answers 503 before an agent is installed", async () => {
      await expect(handleCompletionRequest(deps(), { messages: [{ role: "user", content: "hi" }] })).resolves.toEqual({
        status: 503,
        body: { error: "Agent not ready" },
      });
    });

    it("finds the last user message and ignores malformed entries", () => {
      expect(lastUserMessage({ messages: [{ role: "user", content: " a " }, { role: "user", content: 5 }, "junk"] })).toBe("a");
      expect(lastUserMessage({ messages: "nope" })).toBe("");
      expect(lastUserMessage(null)).toBe("");
    });

    it("lists the served model", () => {
      expect(listModels()).toEqual({
        status: 200,
        body: { object: "list", data: [{ id: MODEL_ID, object: "model", owned_by: "local" }] },
      });
    });
  });
});
