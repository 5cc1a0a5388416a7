/**
 * One user turn from accepted message to spoken-ready reply.
 * Shared by the WebSocket session (streaming) and the HTTP endpoint (silent).
 */

import type { TurnOrchestrator, TurnResult } from "../pipeline/orchestrator";
import type { MemoryScheduler } from "../memory/scheduler";
import type { ConversationStore } from "../memory/session";
import type { RuntimeContext } from "../runtime/context";
import type { EventSink } from "../events/types";
import { PromptManager, applyConstraint } from "../prompts/prompt-manager";
import { cleanForSpeech } from "../pipeline/text";
import { detectEmotion } from "../events/emotion";
import type { ChatRequest } from "./protocol";

export interface TurnDeps {
  runtime: RuntimeContext;
  memory: MemoryScheduler;
  conversations: ConversationStore;
  prompts: PromptManager;
}

export interface TurnOutcome {
  /** Reply cleaned for speech. */
  content: string;
  emotion: string;
  result: TurnResult;
}

/**
 * Augment, build context, run the orchestrator, then clean and classify the reply.
 * History recording is scheduled as a tracked background task and not awaited.
 */
export async function executeTurn(
  deps: TurnDeps,
  agent: TurnOrchestrator,
  request: ChatRequest,
  channel: string,
  onEvent?: EventSink
): Promise<TurnOutcome> {
  const augmented = await deps.memory.augment(request.message);
  const userContent = applyConstraint(augmented, request.constraint);
  const longTermMemory = await deps.memory.readLongTermMemory();

  const messages = deps.prompts.buildMessages({
    userContent,
    snapshot: deps.conversations.get(request.session).getSnapshot(),
    longTermMemory,
    channel,
    chatId: request.session,
  });

  const result = await agent.run(messages, {
    context: { sessionKey: request.session, channel, chatId: request.session },
    onEvent,
  });

  const content = cleanForSpeech(result.content);
  const emotion = detectEmotion(content);
  deps.conversations.appendExchange(request.session, request.message, content);
  void deps.runtime.tasks.track("memory.record", deps.memory.record(request.session, request.message, content));
  return { content, emotion, result };
}
