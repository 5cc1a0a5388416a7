/**
 * Text shaping for model output before it leaves the gateway.
 */

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g;

/** Remove internal reasoning markup (`<think>…</think>`) some models interleave with the answer. */
export function stripThinking(text: string): string {
  return text.replace(THINK_BLOCK, "").trim();
}

const LIST_MARKERS = ["-", "*", "•", "·", "—"];

/**
 * Flatten a reply for speech output: drop bullet and numbered-list prefixes and
 * collapse blank lines, keeping the sentences themselves.
 */
export function cleanForSpeech(text: string): string {
  let clean = text.trim();
  for (const ch of LIST_MARKERS) {
    clean = clean.split(`\n${ch} `).join("\n");
    clean = clean.split(`\n${ch}`).join("\n");
  }
  clean = clean.replace(/\n\d+[.)、]\s*/g, "\n");
  return clean.replace(/\n{2,}/g, "\n").trim();
}

/** Single-line form of a message for log-style records, capped at `maxChars` code points. */
export function oneLine(text: string, maxChars: number): string {
  const flat = text.replace(/\s*\n\s*/g, " ").trim();
  const chars = Array.from(flat);
  return chars.length > maxChars ? chars.slice(0, maxChars).join("") : flat;
}
