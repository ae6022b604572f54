import type { ExtractedPayload } from "../domain/types";
import { ExtractionError } from "../errors";

const FENCED_BLOCKS = /```[^\n`]*\n?([\s\S]*?)```/g;

/**
 * Pulls a JSON payload out of free-form model output. Tries, in order:
 * the whole text, every fenced code block holding an object, then every top-level balanced
 * `{...}` span; the first candidate that parses wins. Never throws.
 */
export function extractPayload(rawText: string): ExtractedPayload {
  const text = rawText.trim();
  if (text === "") {
    return { ok: false, raw: rawText, reason: "empty response" };
  }

  const whole = tryParse(text);
  if (whole.ok) return { ok: true, value: whole.value, strategy: "whole" };

  for (const fence of text.matchAll(FENCED_BLOCKS)) {
    const fenced = tryParse(fence[1].trim());
    // a fence of shell or prose can still parse ("true", "42"); only objects count
    if (fenced.ok && isJsonObject(fenced.value)) return { ok: true, value: fenced.value, strategy: "fenced" };
  }

  for (const span of topLevelObjectSpans(text)) {
    const parsed = tryParse(span);
    if (parsed.ok) return { ok: true, value: parsed.value, strategy: "braces" };
  }

  return { ok: false, raw: rawText, reason: "no parseable JSON object" };
}

/**
 * Same as extractPayload but throws an ExtractionError on failure.
 */
export function requirePayload(rawText: string): unknown {
  const extracted = extractPayload(rawText);
  if (!extracted.ok) throw new ExtractionError(extracted.raw, extracted.reason);
  return extracted.value;
}

function isJsonObject(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Yields every top-level `{...}` span in order. Braces inside JSON string
 * literals are ignored; an unterminated span ends the scan.
 */
export function* topLevelObjectSpans(text: string): Generator<string> {
  let start = -1;
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (depth === 0) {
      if (ch === "{") {
        start = i;
        depth = 1;
        inString = false;
        escaped = false;
      }
      continue;
    }

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) yield text.slice(start, i + 1);
    }
  }
}
