/**
 * Entry point: load config, wire the runtime, start the gateway.
 * With no model key configured the stub adapter answers, which is enough to exercise the channel.
 */

import * as fs from "fs";
import { loadConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { ToolRegistry } from "./tools/registry";
import { ExecTool } from "./tools/exec";
import { SendMessageTool } from "./tools/send-message";
import { FeishuSender } from "./bus/senders/feishu";
import { WebhookSender } from "./bus/senders/webhook";
import { RuntimeContext } from "./runtime/context";
import { HttpRetrievalStore } from "./memory/retrieval";
import { MemoryScheduler } from "./memory/scheduler";
import { ConversationStore } from "./memory/session";
import { PromptManager } from "./prompts/prompt-manager";
import { TurnOrchestrator } from "./pipeline/orchestrator";
import { startGatewayServer } from "./server";
import { logger, logError } from "./logging";

const SHUTDOWN_TIMEOUT_MS = 5000;

async function main(): Promise<void> {
  const config = loadConfig();
  await fs.promises.mkdir(config.agent.workspaceDir, { recursive: true });

  const llm = createLLM(config);
  const runtime = new RuntimeContext();

  if (config.channels.feishu) {
    runtime.bus.registerSender(new FeishuSender(config.channels.feishu));
  }
  for (const [channel, url] of Object.entries(config.channels.webhooks)) {
    runtime.bus.registerSender(new WebhookSender(channel, url));
  }
  runtime.startBus();

  const tools = new ToolRegistry()
    .register(new ExecTool({ workingDir: config.agent.workspaceDir, timeoutMs: config.tools.execTimeoutMs }))
    .register(new SendMessageTool(runtime.bus));

  const retrieval = config.memory.retrievalUrl ? new HttpRetrievalStore({ baseUrl: config.memory.retrievalUrl }) : undefined;
  const memory = new MemoryScheduler(llm, retrieval, runtime, {
    workspaceDir: config.agent.workspaceDir,
    consolidateEvery: config.memory.consolidateEvery,
    historyWindow: config.memory.historyWindow,
    topK: config.memory.retrievalTopK,
  });

  runtime.installAgent(
    new TurnOrchestrator(llm, tools, { maxIterations: config.agent.maxIterations, maxTokens: config.llm.maxTokens })
  );
  logger.info(
    {
      event: "AGENT_READY",
      provider: config.llm.provider,
      tools: tools.definitions().map((t) => t.name),
      outboundChannels: runtime.bus.channels(),
      retrieval: retrieval !== undefined,
    },
    "Agent installed"
  );

  const server = startGatewayServer(
    {
      runtime,
      memory,
      conversations: new ConversationStore({ maxTurns: config.agent.maxHistoryTurns, maxSessions: config.agent.maxSessions }),
      prompts: new PromptManager(),
    },
    {
      port: config.server.port,
      heartbeatIntervalMs: config.server.heartbeatIntervalMs,
      maxPayloadBytes: config.server.maxPayloadBytes,
    }
  );

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    runtime.installAgent(undefined);
    server.close();
    runtime
      .shutdown(SHUTDOWN_TIMEOUT_MS)
      .then((remaining) => {
        if (remaining.length > 0) {
          logger.warn({ event: "SHUTDOWN_TASKS_ABANDONED", tasks: remaining }, "Background tasks still running at exit");
        }
        process.exit(0);
      })
      .catch((err: unknown) => {
        logError(logger, err as Error);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logError(logger, err as Error);
  process.exit(1);
});
