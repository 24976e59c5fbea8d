/**
 * Parsers for language-model output.
 *
 * Both are best-effort: they report failure as a value and leave logging and
 * fallback decisions to the caller.
 */

export type JsonArrayResult =
  | { ok: true; items: unknown[] }
  | { ok: false; error: string };

const CODE_FENCE = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

/**
 * Remove a single surrounding markdown code fence, if present.
 */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = trimmed.match(CODE_FENCE);
  return match ? match[1].trim() : trimmed;
}

/**
 * Parse the whole response as a JSON array.
 */
export function parseJsonArray(raw: string): JsonArrayResult {
  const body = stripCodeFence(raw);
  if (!body) {
    return { ok: false, error: 'empty response' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (!Array.isArray(parsed)) {
    return { ok: false, error: `expected a JSON array, got ${parsed === null ? 'null' : typeof parsed}` };
  }
  return { ok: true, items: parsed };
}

export interface TemplateExtraction {
  /** Trimmed second line, or null when the response does not follow the template. */
  key: string | null;
  /** Whole response, trimmed. Still usable as post text when `key` is null. */
  text: string;
  warning?: string;
}

/**
 * Pull the key out of a fixed multi-line template: the first line must carry
 * `marker` and the key is the second line.
 */
export function extractTemplateKey(raw: string, marker: string): TemplateExtraction {
  const text = raw.trim();
  const lines = text.split(/\r?\n/);

  if (!lines[0]?.includes(marker)) {
    return { key: null, text, warning: `first line does not contain the marker "${marker}"` };
  }

  const key = lines[1]?.trim() ?? '';
  if (!key) {
    return { key: null, text, warning: 'second line is missing or empty' };
  }

  return { key, text };
}
