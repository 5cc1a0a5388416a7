/**
 * Integration test: gateway server on an ephemeral loopback port with a real WebSocket client.
 * The model is scripted in process; nothing leaves the test process.
 */

import * as http from "http";
import WebSocket from "ws";
import { createGatewayServer, WS_PATH } from "../../src/server";
import { RuntimeContext } from "../../src/runtime/context";
import { MemoryScheduler } from "../../src/memory/scheduler";
import { ConversationStore } from "../../src/memory/session";
import { PromptManager } from "../../src/prompts/prompt-manager";
import { TurnOrchestrator } from "../../src/pipeline/orchestrator";
import { ToolRegistry } from "../../src/tools/registry";
import { SendMessageTool } from "../../src/tools/send-message";
import type { ChannelSender, OutboundMessage } from "../../src/bus/types";
import { ScriptedLLM, call, makeTempWorkspace, removeDir, reply } from "../helpers/fakes";

class MemorySender implements ChannelSender {
  readonly channel = "feishu";
  readonly delivered: OutboundMessage[] = [];
  async send(message: OutboundMessage): Promise<void> {
    this.delivered.push(message);
  }
}

describe("Gateway server", () => {
  let workspace: string;
  let runtime: RuntimeContext;
  let server: http.Server;
  let baseUrl: string;
  let llm: ScriptedLLM;
  const feishu = new MemorySender();

  beforeAll(async () => {
    workspace = makeTempWorkspace();
    runtime = new RuntimeContext();
    runtime.bus.registerSender(feishu);
    runtime.startBus();
    llm = new ScriptedLLM([
      reply("", [call("c1", "send_message", { channel: "feishu", chat_id: "oc_team", content: "Heads up" })]),
      reply("I let the team know."),
      reply("Pong."),
    ]);
    runtime.installAgent(new TurnOrchestrator(llm, new ToolRegistry().register(new SendMessageTool(runtime.bus)), { maxIterations: 5 }));
    server = createGatewayServer(
      {
        runtime,
        memory: new MemoryScheduler(new ScriptedLLM([]), undefined, runtime, { workspaceDir: workspace }),
        conversations: new ConversationStore({ maxTurns: 10 }),
        prompts: new PromptManager(),
      },
      { port: 0, heartbeatIntervalMs: 60_000, maxPayloadBytes: 65_536 }
    );
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const addr = server.address();
    const port = typeof addr === "object" && addr ? addr.port : 0;
    baseUrl = `127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await runtime.shutdown(1000);
    removeDir(workspace);
  });

  it("GET /ready reports ready once an agent is installed", async () => {
    const res = await fetch(`http://${baseUrl}/ready`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, ready: true });
  });

  it("streams a turn over the WebSocket and delivers cross-channel output", async () => {
    const ws = new WebSocket(`ws://${baseUrl}${WS_PATH}`);
    const frames: Array<Record<string, unknown>> = [];
    const done = new Promise<void>((resolve, reject) => {
      ws.on("message", (data) => {
        const frame = JSON.parse(data.toString()) as Record<string, unknown>;
        frames.push(frame);
        if (frame.type === "final" || frame.type === "error") resolve();
      });
      ws.on("error", reject);
    });
    await new Promise<void>((resolve) => ws.on("open", () => resolve()));
    ws.send(JSON.stringify({ message: "tell the team", session: "s1" }));
    await done;
    ws.close();

    expect(frames.map((f) => f.type)).toEqual(["thinking", "tool_call", "tool_result", "thinking", "final"]);
    expect(frames[2]).toMatchObject({ result: "Message queued for feishu:oc_team", emotion: "cool" });
    expect(frames[4]).toMatchObject({ content: "I let the team know.", session: "s1" });

    await runtime.tasks.drain(50);
    expect(feishu.delivered).toEqual([
      { channel: "feishu", chatId: "oc_team", content: "Heads up", metadata: { session: "s1" } },
    ]);
  });

  it("POST /api/chat answers with a JSON reply", async () => {
    const res = await fetch(`http://${baseUrl}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message: "ping", session: "api:s2" }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ response: "Pong.", session: "api:s2" });
  });
});
