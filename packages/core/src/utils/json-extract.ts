// packages/core/src/utils/json-extract.ts — JSON object recovery from free-form model text

const FENCED_OBJECT = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;
// One level of nested braces tolerated
const BRACED_SPAN = /\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/;

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Pull the first JSON object out of a model reply.
 *
 * Tries, in order: the first fenced code block (```json or plain), the whole
 * trimmed reply, then the first brace-delimited span. Returns null when none of
 * them yields an object. Never throws.
 */
export function extractJsonObject(raw: string): JsonObject | null {
  if (!raw) return null;

  const fenced = FENCED_OBJECT.exec(raw);
  if (fenced) {
    const parsed = tryParseObject(fenced[1]);
    if (parsed) return parsed;
  }

  const direct = tryParseObject(raw.trim());
  if (direct) return direct;

  const span = BRACED_SPAN.exec(raw);
  if (span) {
    return tryParseObject(span[0]);
  }
  return null;
}
