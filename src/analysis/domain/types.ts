/**
 * Domain types for holdings analysis.
 */

export interface Holding {
  symbol: string;
  companyName?: string;
  quantity: number;
  price: number;
  value: number;
  sector?: string;
  exchange?: string;
  // Prior close, used for day-over-day variation filtering
  previousPrice?: number;
}

export interface MarketIndex {
  name: string;
  level: number;
  changePercent?: number;
}

/**
 * Auxiliary facts passed to the prompt alongside holdings.
 */
export interface MarketFacts {
  asOfDate: string;
  indices?: MarketIndex[];
  notes?: string[];
}

export const RECOMMENDATIONS = ["BUY", "SELL", "RETAIN"] as const;
export type Recommendation = (typeof RECOMMENDATIONS)[number];

/**
 * Validated per-holding analysis. Field names follow the JSON the model is
 * asked to produce.
 */
export interface HoldingAnalysis {
  recommendation: Recommendation;
  estimated_return: number | null;
  confidence: number;
  risk_notes: string;
  sources: string[];
  follow_up_question?: string;
  // present on analyses consolidated after a follow-up question
  follow_up_answer?: string;
}

export interface SymbolAnalysis extends HoldingAnalysis {
  symbol: string;
}

export interface PortfolioAnalysis {
  holdings: SymbolAnalysis[];
}

export type AnalysisShape = "single" | "per_holding";

export type DispatchMode = "whole_portfolio" | "per_entity";

export type AnalysisContext =
  | { kind: "portfolio"; holdings: Holding[]; facts?: MarketFacts }
  | { kind: "holding"; holding: Holding; facts?: MarketFacts }
  | {
      kind: "follow_up";
      holding: Holding;
      original: HoldingAnalysis;
      question: string;
      facts?: MarketFacts;
    };

export type FieldIssueReason = "missing" | "wrong_type" | "out_of_enum" | "no_json";

export interface FieldIssue {
  field: string;
  reason: FieldIssueReason;
  detail: string;
}

export interface PassedValidation<T> {
  ok: true;
  value: T;
  clampedFields: string[];
}

export interface FailedValidation {
  ok: false;
  issues: FieldIssue[];
  missingFields: string[];
}

export type ValidationOutcome<T> = PassedValidation<T> | FailedValidation;

export type ExtractionStrategy = "whole" | "fenced" | "braces";

export type ExtractedPayload =
  | { ok: true; value: unknown; strategy: ExtractionStrategy }
  | { ok: false; raw: string; reason: string };

export type AnalysisStatus = "ACCEPTED" | "EXHAUSTED" | "LLM_ERROR" | "TIMED_OUT";

export type FailureCode =
  | "RETRIES_EXHAUSTED"
  | "LLM_INVOCATION_ERROR"
  | "TIMEOUT";

/**
 * Failure marker carried instead of recommendation fields.
 */
export interface AnalysisFailure {
  code: FailureCode;
  error: string;
  missing_fields: string[];
}

interface AnalysisResultBase {
  symbol: string;
  holding: Holding;
  attempts: number;
}

/**
 * A follow-up question that was answered and folded into the analysis.
 */
export interface ResolvedFollowUp {
  question: string;
  answer?: string;
  attempts: number;
}

export interface AcceptedResult extends AnalysisResultBase {
  status: "ACCEPTED";
  analysis: HoldingAnalysis;
  clampedFields: string[];
  followUp?: ResolvedFollowUp;
}

export interface FailedResult extends AnalysisResultBase {
  status: Exclude<AnalysisStatus, "ACCEPTED">;
  failure: AnalysisFailure;
  validation?: FailedValidation;
  lastRawResponse?: string;
}

export type AnalysisResult = AcceptedResult | FailedResult;

export interface SectorSummaryEntry {
  sector: string;
  holdings: number;
  value: number;
}

export interface AnalysisReport {
  reportId: string;
  asOfDate: string;
  createdAt: string;
  mode: DispatchMode;
  // set on reports produced by re-running the failures of another report
  redriveOf?: string;
  results: readonly AnalysisResult[];
  overallConfidence: number;
  sectorSummary: readonly SectorSummaryEntry[];
  needsFollowUp: boolean;
  followUpQuestions: readonly string[];
  failedSymbols: readonly string[];
  counts: {
    total: number;
    accepted: number;
    failed: number;
  };
}

export function isAccepted(result: AnalysisResult): result is AcceptedResult {
  return result.status === "ACCEPTED";
}
