import { ParseError, ok, fail, type Result } from "@echopost/core";

// One level of nested braces, matching how the model usually wraps JSON in prose.
const JSON_OBJECT = /\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull a JSON object out of a model response. Tries the first
 * brace-balanced block, then the whole response.
 */
export function extractJsonObject(
  text: string
): Result<Record<string, unknown>, ParseError> {
  const match = text.match(JSON_OBJECT);
  if (match) {
    const parsed = tryParse(match[0]);
    if (isRecord(parsed)) return ok(parsed);
  }

  const whole = tryParse(text.trim());
  if (isRecord(whole)) return ok(whole);

  return fail(new ParseError("Could not extract JSON from model response", text));
}
