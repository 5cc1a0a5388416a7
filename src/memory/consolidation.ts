/**
 * Long-term memory consolidation: distill recent history entries plus the current
 * memory document into a complete replacement document with one non-tool model call.
 */

import type { ILLM, Message } from "../adapters/llm";

const CONSOLIDATION_MAX_TOKENS = 2048;

const SYSTEM_PROMPT =
  "You maintain the long-term memory document of a personal assistant. " +
  "Output only the document itself, in Markdown, with no preamble and no code fences.";

export function buildConsolidationMessages(existingMemory: string, entries: string[]): Message[] {
  const current = existingMemory.trim() || "(empty)";
  const recent = entries.length > 0 ? entries.join("\n") : "(no recent conversations)";
  const user = [
    "Update the long-term memory document using the recent conversation history below.",
    "",
    "Rules:",
    "1. Keep every durable fact already in the document that is still true.",
    "2. Add newly learned durable facts: user preferences, personal details, projects, decisions, recurring tasks.",
    "3. Drop facts that are stale or contradicted by newer conversations.",
    "4. Ignore small talk and one-off requests.",
    "5. Return the complete replacement document, not a diff.",
    "",
    "## Current memory document",
    current,
    "",
    "## Recent conversation history",
    recent,
  ].join("\n");
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: user },
  ];
}

/** Remove a surrounding ``` / ```markdown fence pair, if the model added one. */
export function stripCodeFences(text: string): string {
  let t = text.trim();
  const open = t.match(/^```[\w-]*[ \t]*\n?/);
  if (!open) return t;
  t = t.slice(open[0].length);
  const close = t.match(/\n?```\s*$/);
  if (close && close.index !== undefined) t = t.slice(0, close.index);
  return t.trim();
}

/** One consolidation call. Returns the new document, or "" when the model produced nothing usable. */
export async function consolidateMemory(llm: ILLM, existingMemory: string, entries: string[]): Promise<string> {
  const response = await llm.chat(buildConsolidationMessages(existingMemory, entries), {
    maxTokens: CONSOLIDATION_MAX_TOKENS,
  });
  return stripCodeFences(response.text);
}
