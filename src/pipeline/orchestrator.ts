/**
 * TurnOrchestrator: runs one bounded tool-calling turn.
 * Each round asks the model for the next step; tool requests are executed in the order
 * listed and fed back, until the model answers without tools or the iteration budget runs out.
 *
 * Streaming is a capability, not a mode: pass `onEvent` to receive progress events.
 * Without it the turn runs silently and returns the same result.
 */

import type { ILLM, Message, ToolCall } from "../adapters/llm";
import type { IToolExecutor, ToolContext } from "../tools/types";
import type { EventSink, ProgressEvent } from "../events/types";
import { stripThinking } from "./text";
import { logger, logLlmCall } from "../logging";

/** Returned when the budget runs out before the model produced any text. */
export const BUDGET_EXHAUSTED_REPLY = "I've completed processing but have no response to give.";

export interface TurnOrchestratorConfig {
  /** Max model rounds per turn. */
  maxIterations: number;
  /** Max tokens per model round (adapter default when unset). */
  maxTokens?: number;
}

export interface RunOptions {
  /** Origin of the turn, passed to every tool call. */
  context: ToolContext;
  /** Progress sink; omit for silent mode. */
  onEvent?: EventSink;
}

export interface TurnResult {
  /** Final answer, or the last partial text when `exhausted`. */
  content: string;
  /** Tool names in execution order (repeats kept). */
  toolsUsed: string[];
  /** Model rounds used. */
  iterations: number;
  /** True when the iteration budget ended the turn. Degraded, not failed. */
  exhausted: boolean;
}

/** Re-key missing or repeated call ids so ids stay unique within the turn. */
function assignUniqueIds(calls: ToolCall[], seen: Set<string>): ToolCall[] {
  return calls.map((call) => {
    let id = call.id.trim() || "call";
    if (seen.has(id)) {
      let n = 2;
      while (seen.has(`${id}-${n}`)) n++;
      id = `${id}-${n}`;
    }
    seen.add(id);
    return id === call.id ? call : { ...call, id };
  });
}

export class TurnOrchestrator {
  constructor(
    private readonly llm: ILLM,
    private readonly tools: IToolExecutor,
    private readonly config: TurnOrchestratorConfig
  ) {}

  async run(initialContext: Message[], options: RunOptions): Promise<TurnResult> {
    const history: Message[] = [...initialContext];
    const toolsUsed: string[] = [];
    const seenIds = new Set<string>();
    const catalog = this.tools.definitions();
    let partial = "";

    const emit = async (event: ProgressEvent): Promise<void> => {
      if (options.onEvent) await options.onEvent(event);
    };

    for (let iteration = 1; iteration <= this.config.maxIterations; iteration++) {
      await emit({ type: "thinking", iteration });

      const llmStart = Date.now();
      const response = await this.llm.chat(history, { tools: catalog, maxTokens: this.config.maxTokens });
      logLlmCall(logger, history.length, response.toolCalls.length, Date.now() - llmStart);

      if (response.toolCalls.length === 0) {
        return { content: stripThinking(response.text), toolsUsed, iterations: iteration, exhausted: false };
      }

      const calls = assignUniqueIds(response.toolCalls, seenIds);
      const text = stripThinking(response.text);
      if (text) partial = text;
      history.push({ role: "assistant", content: response.text, toolCalls: calls });

      for (const call of calls) {
        await emit({ type: "tool_call", id: call.id, name: call.name, arguments: JSON.stringify(call.arguments) });
        logger.info({ event: "TOOL_CALL", tool: call.name, callId: call.id, session: options.context.sessionKey }, "Tool call");
        const result = await this.tools.execute(call.name, call.arguments, options.context);
        await emit({ type: "tool_result", id: call.id, name: call.name, result });
        history.push({ role: "tool", toolCallId: call.id, name: call.name, content: result });
        toolsUsed.push(call.name);
      }
    }

    logger.warn(
      { event: "TURN_BUDGET_EXHAUSTED", session: options.context.sessionKey, maxIterations: this.config.maxIterations, toolsUsed },
      "Iteration budget exhausted; returning partial answer"
    );
    return {
      content: partial || BUDGET_EXHAUSTED_REPLY,
      toolsUsed,
      iterations: this.config.maxIterations,
      exhausted: true,
    };
  }
}
