import { z } from "zod";
import type {
  AnalysisShape,
  FailedValidation,
  FieldIssue,
  HoldingAnalysis,
  PortfolioAnalysis,
  ValidationOutcome,
} from "../domain/types";
import {
  HOLDING_ANALYSIS_FIELDS,
  HoldingAnalysisZodSchema,
  PORTFOLIO_ANALYSIS_FIELDS,
  PortfolioAnalysisZodSchema,
} from "../prompts/schema";

/**
 * Field name used when the payload as a whole is unusable.
 */
export const ENTIRE_PAYLOAD = "entire payload";

export function validatePayload(
  payload: unknown,
  shape: "per_holding"
): ValidationOutcome<HoldingAnalysis>;
export function validatePayload(
  payload: unknown,
  shape: "single",
  expectedSymbols?: readonly string[]
): ValidationOutcome<PortfolioAnalysis>;
export function validatePayload(
  payload: unknown,
  shape: AnalysisShape,
  expectedSymbols: readonly string[] = []
): ValidationOutcome<HoldingAnalysis> | ValidationOutcome<PortfolioAnalysis> {
  if (!isPlainObject(payload)) {
    return failed([
      {
        field: ENTIRE_PAYLOAD,
        reason: "wrong_type",
        detail: `expected a JSON object, got ${describeType(payload)}`,
      },
    ]);
  }
  return shape === "single"
    ? validatePortfolio(payload, expectedSymbols)
    : validateHolding(payload);
}

/**
 * Outcome for a response with no parseable JSON at all.
 */
export function noJsonOutcome(): FailedValidation {
  return failed([
    { field: ENTIRE_PAYLOAD, reason: "no_json", detail: "no JSON found" },
  ]);
}

function validateHolding(
  payload: Record<string, unknown>
): ValidationOutcome<HoldingAnalysis> {
  const parsed = HoldingAnalysisZodSchema.safeParse(payload);
  if (!parsed.success) {
    return failed(toFieldIssues(parsed.error, HOLDING_ANALYSIS_FIELDS));
  }
  const clampedFields: string[] = [];
  const value = clampConfidence(parsed.data, "", clampedFields);
  return { ok: true, value, clampedFields };
}

function validatePortfolio(
  payload: Record<string, unknown>,
  expectedSymbols: readonly string[]
): ValidationOutcome<PortfolioAnalysis> {
  const parsed = PortfolioAnalysisZodSchema.safeParse(payload);
  const issues = parsed.success
    ? []
    : toFieldIssues(parsed.error, PORTFOLIO_ANALYSIS_FIELDS);

  if (Array.isArray(payload.holdings)) {
    const present = collectSymbols(payload.holdings);
    for (const symbol of expectedSymbols) {
      if (!present.has(symbol.trim().toUpperCase())) {
        issues.push({
          field: `holdings[${symbol}]`,
          reason: "missing",
          detail: `no entry for ${symbol}`,
        });
      }
    }
  }

  if (!parsed.success || issues.length > 0) return failed(dedupe(issues));

  const clampedFields: string[] = [];
  const holdings = parsed.data.holdings.map((entry, index) =>
    clampConfidence(entry, `holdings[${index}].`, clampedFields)
  );
  return { ok: true, value: { holdings }, clampedFields };
}

/**
 * Out-of-range confidence is clamped into [0, 1] rather than rejected; the
 * clamped field paths are reported so callers can log them.
 */
function clampConfidence<T extends HoldingAnalysis>(
  analysis: T,
  prefix: string,
  clampedFields: string[]
): T {
  const confidence = Math.min(1, Math.max(0, analysis.confidence));
  if (confidence === analysis.confidence) return analysis;
  clampedFields.push(`${prefix}confidence`);
  return { ...analysis, confidence };
}

function toFieldIssues(
  error: z.ZodError,
  fieldOrder: readonly string[]
): FieldIssue[] {
  const rank = (issue: FieldIssue): number => {
    const top = issue.field.split(/[.[]/)[0];
    const index = fieldOrder.indexOf(top);
    return index === -1 ? fieldOrder.length : index;
  };
  const issues = error.issues.map(toFieldIssue);
  // Array.prototype.sort is stable, so nested issues keep zod's order
  return dedupe(issues.sort((a, b) => rank(a) - rank(b)));
}

function toFieldIssue(issue: z.ZodIssue): FieldIssue {
  const field = formatPath(issue.path);
  if (issue.code === z.ZodIssueCode.invalid_type) {
    if (issue.received === z.ZodParsedType.undefined) {
      return { field, reason: "missing", detail: "required field is missing" };
    }
    return {
      field,
      reason: "wrong_type",
      detail: `expected ${issue.expected}, got ${issue.received}`,
    };
  }
  if (issue.code === z.ZodIssueCode.invalid_enum_value) {
    return {
      field,
      reason: "out_of_enum",
      detail: `expected one of ${issue.options.join(", ")}, got ${String(issue.received)}`,
    };
  }
  return { field, reason: "wrong_type", detail: issue.message };
}

function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return ENTIRE_PAYLOAD;
  return path.reduce<string>((acc, part) => {
    if (typeof part === "number") return `${acc}[${part}]`;
    return acc === "" ? part : `${acc}.${part}`;
  }, "");
}

function dedupe(issues: FieldIssue[]): FieldIssue[] {
  const seen = new Set<string>();
  return issues.filter((issue) => {
    if (seen.has(issue.field)) return false;
    seen.add(issue.field);
    return true;
  });
}

function failed(issues: FieldIssue[]): FailedValidation {
  return { ok: false, issues, missingFields: issues.map((i) => i.field) };
}

function collectSymbols(entries: unknown[]): Set<string> {
  const symbols = new Set<string>();
  for (const entry of entries) {
    if (isPlainObject(entry) && typeof entry.symbol === "string") {
      symbols.add(entry.symbol.trim().toUpperCase());
    }
  }
  return symbols;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
