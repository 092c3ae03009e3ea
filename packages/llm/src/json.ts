import { LlmResponseError } from '@caselens/core';

const FENCE_PATTERN = /^\s*```(?:json|JSON)?\s*\n?([\s\S]*?)\n?\s*```\s*$/;

/**
 * Strip a surrounding markdown code fence
 */
export function stripCodeFence(raw: string): string {
  const match = FENCE_PATTERN.exec(raw);
  return (match?.[1] ?? raw).trim();
}

/**
 * Parse a model response as JSON.
 * Accepts fenced output and leading or trailing prose around one JSON object.
 */
export function parseJsonResponse(raw: string): unknown {
  const cleaned = stripCodeFence(raw);
  try {
    return JSON.parse(cleaned);
  } catch {
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start !== -1 && end > start) {
      try {
        return JSON.parse(cleaned.slice(start, end + 1));
      } catch {
        // fall through to the error below
      }
    }
    throw new LlmResponseError('Invalid JSON response from LLM', raw.substring(0, 500));
  }
}
