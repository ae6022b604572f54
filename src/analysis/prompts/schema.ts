import { z } from "zod";
import { RECOMMENDATIONS } from "../domain/types";

/**
 * Required fields of one holding analysis, in the order they are reported
 * back to the model.
 */
export const HOLDING_ANALYSIS_FIELDS = [
  "recommendation",
  "estimated_return",
  "confidence",
  "risk_notes",
  "sources",
] as const;

export const PORTFOLIO_ANALYSIS_FIELDS = ["holdings"] as const;

function upperTrimmed(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toUpperCase() : value;
}

// Models often quote numbers ("0.8") or append a percent sign ("12%").
function numericString(allowPercent: boolean) {
  return (value: unknown): unknown => {
    if (typeof value !== "string") return value;
    let text = value.trim();
    if (allowPercent && text.endsWith("%")) text = text.slice(0, -1).trim();
    if (text === "") return value;
    const n = Number(text);
    return Number.isFinite(n) ? n : value;
  };
}

function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
}

export const RecommendationZodSchema = z.preprocess(
  upperTrimmed,
  z.enum(RECOMMENDATIONS)
);

export const HoldingAnalysisZodSchema = z.object({
  recommendation: RecommendationZodSchema,
  estimated_return: z.preprocess(
    numericString(true),
    z.number().finite().nullable()
  ),
  confidence: z.preprocess(numericString(false), z.number().finite()),
  risk_notes: z.string(),
  sources: z.preprocess(
    (value) => (typeof value === "string" ? [value] : value),
    z.array(z.string())
  ),
  follow_up_question: z.preprocess(blankToUndefined, z.string().optional()),
  follow_up_answer: z.preprocess(blankToUndefined, z.string().optional()),
});

export const SymbolAnalysisZodSchema = HoldingAnalysisZodSchema.extend({
  symbol: z.string().trim().min(1),
});

export const PortfolioAnalysisZodSchema = z.object({
  holdings: z.array(SymbolAnalysisZodSchema),
});

/**
 * JSON examples embedded in prompts.
 */
export const HOLDING_ANALYSIS_EXAMPLE = {
  recommendation: "BUY | SELL | RETAIN",
  estimated_return: "<expected 1-year return in percent, number or null>",
  confidence: "<number between 0.0 and 1.0>",
  risk_notes: "<key risks in one or two sentences>",
  sources: ["<source of evidence>"],
  follow_up_question: "<optional question that needs further research>",
};

export const PORTFOLIO_ANALYSIS_EXAMPLE = {
  holdings: [{ symbol: "<holding symbol>", ...HOLDING_ANALYSIS_EXAMPLE }],
};

export const FOLLOW_UP_ANALYSIS_EXAMPLE = {
  ...HOLDING_ANALYSIS_EXAMPLE,
  follow_up_question: "<leave empty unless a deeper question emerges>",
  follow_up_answer: "<your answer to the follow-up question>",
};
