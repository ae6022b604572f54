import {
  extractPayload,
  requirePayload,
  topLevelObjectSpans,
} from "@src/analysis/business/response_extractor";
import { ExtractionError } from "@src/analysis/errors";

describe("extractPayload", () => {
  test("parses a bare JSON object", () => {
    const result = extractPayload('  {"confidence": 0.7}\n');
    expect(result).toEqual({
      ok: true,
      value: { confidence: 0.7 },
      strategy: "whole",
    });
  });

  test("takes the first fenced block when prose surrounds it", () => {
    const raw = [
      "Here is my analysis:",
      "```json",
      '{"recommendation": "BUY"}',
      "```",
      "Let me know if you need more.",
    ].join("\n");
    expect(extractPayload(raw)).toEqual({
      ok: true,
      value: { recommendation: "BUY" },
      strategy: "fenced",
    });
  });

  test("accepts a fence without a language tag", () => {
    const raw = 'Result:\n```\n{"a": 1}\n```';
    expect(extractPayload(raw)).toEqual({
      ok: true,
      value: { a: 1 },
      strategy: "fenced",
    });
  });

  test("skips code fences that are not JSON objects", () => {
    const raw = [
      "Sample code:",
      "```python",
      "cfg = {}",
      "```",
      "Shell:",
      "```bash",
      "true",
      "```",
      "Answer:",
      "```json",
      '{"recommendation": "SELL", "confidence": 0.4}',
      "```",
    ].join("\n");
    expect(extractPayload(raw)).toEqual({
      ok: true,
      value: { recommendation: "SELL", confidence: 0.4 },
      strategy: "fenced",
    });
  });

  test("falls back to a balanced brace span inside prose", () => {
    const raw = 'Sure! {"risk_notes": "gap } risk", "n": {"x": 2}} Thanks.';
    expect(extractPayload(raw)).toEqual({
      ok: true,
      value: { risk_notes: "gap } risk", n: { x: 2 } },
      strategy: "braces",
    });
  });

  test("skips spans that do not parse", () => {
    const raw = 'Draft {not json} final {"a": 1}';
    expect(extractPayload(raw)).toEqual({
      ok: true,
      value: { a: 1 },
      strategy: "braces",
    });
  });

  test("reports empty responses", () => {
    expect(extractPayload("   ")).toEqual({
      ok: false,
      raw: "   ",
      reason: "empty response",
    });
  });

  test("reports text with no JSON object", () => {
    expect(extractPayload("I cannot analyse this holding.")).toEqual({
      ok: false,
      raw: "I cannot analyse this holding.",
      reason: "no parseable JSON object",
    });
  });
});

describe("requirePayload", () => {
  test("returns the extracted value", () => {
    expect(requirePayload('{"b": true}')).toEqual({ b: true });
  });

  test("throws ExtractionError carrying the raw text", () => {
    let caught: unknown;
    try {
      requirePayload("no json here");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ExtractionError);
    if (caught instanceof ExtractionError) {
      expect(caught.raw).toBe("no json here");
      expect(caught.code).toBe("EXTRACTION_FAILED");
      expect(caught.message).toBe(
        "No JSON payload found: no parseable JSON object"
      );
    }
  });
});

describe("topLevelObjectSpans", () => {
  test("yields each top-level object in order", () => {
    expect([...topLevelObjectSpans('a {"x": "{"} b {"y": 1}')]).toEqual([
      '{"x": "{"}',
      '{"y": 1}',
    ]);
  });

  test("stops at an unterminated span", () => {
    expect([...topLevelObjectSpans('{"x": 1')]).toEqual([]);
  });

  test("handles escaped quotes inside strings", () => {
    expect([...topLevelObjectSpans('{"q": "say \\"}\\" now"}')]).toEqual([
      '{"q": "say \\"}\\" now"}',
    ]);
  });
});
