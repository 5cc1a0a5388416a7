/** Helpers for the loosely-typed tool argument payloads providers hand back. */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON-encoded argument string. Providers occasionally emit an empty
 * string or truncated JSON; both come back as an empty record with the raw
 * text under `_raw` so the tool can report it.
 */
export function parseToolArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : { _raw: raw };
  } catch {
    return { _raw: raw };
  }
}
