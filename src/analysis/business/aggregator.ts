import type {
  AnalysisReport,
  AnalysisResult,
  DispatchMode,
  SectorSummaryEntry,
} from "../domain/types";
import { isAccepted } from "../domain/types";
import { AggregationError } from "../errors";

export const UNSPECIFIED_SECTOR = "UNSPECIFIED";

export interface CombineOptions {
  mode: DispatchMode;
  confidenceThreshold: number;
  asOfDate?: string;
  reportId?: string;
  // id of the report whose failed entities were re-run
  redriveOf?: string;
  now?: Date;
}

/**
 * Throws AggregationError when two entities share a symbol.
 */
export function assertUniqueSymbols(symbols: readonly string[]): void {
  const seen = new Set<string>();
  for (const symbol of symbols) {
    const key = symbol.trim().toUpperCase();
    if (seen.has(key)) {
      throw new AggregationError(`Duplicate entity slot for symbol ${symbol}`);
    }
    seen.add(key);
  }
}

/**
 * Merges per-entity results into a portfolio-level report. Failed entities
 * stay in the report with their diagnostics; result order is preserved.
 * Results are copied, and the report is frozen all the way down.
 */
export function combineResults(
  results: readonly AnalysisResult[],
  options: CombineOptions
): AnalysisReport {
  assertUniqueSymbols(results.map((r) => r.symbol));

  const accepted = results.filter(isAccepted);
  const failedSymbols = results
    .filter((r) => !isAccepted(r))
    .map((r) => r.symbol);

  const overallConfidence =
    accepted.length === 0
      ? 0
      : accepted.reduce((sum, r) => sum + r.analysis.confidence, 0) /
        accepted.length;

  const sectors = new Map<string, SectorSummaryEntry>();
  for (const result of accepted) {
    const sector = result.holding.sector?.trim() || UNSPECIFIED_SECTOR;
    const entry = sectors.get(sector) ?? { sector, holdings: 0, value: 0 };
    entry.holdings += 1;
    entry.value += result.holding.value;
    sectors.set(sector, entry);
  }

  const followUpQuestions = accepted
    .filter((r) => r.analysis.follow_up_question)
    .map((r) => `${r.symbol}: ${r.analysis.follow_up_question}`);

  const needsFollowUp =
    accepted.length === 0 ||
    failedSymbols.length > 0 ||
    overallConfidence < options.confidenceThreshold ||
    followUpQuestions.length > 0;

  const now = options.now ?? new Date();
  const createdAt = now.toISOString();

  const report: AnalysisReport = {
    reportId: options.reportId ?? generateReportId(now),
    asOfDate: options.asOfDate ?? createdAt.slice(0, 10),
    createdAt,
    mode: options.mode,
    results: results.map((r) => structuredClone(r)),
    overallConfidence,
    sectorSummary: [...sectors.values()],
    needsFollowUp,
    followUpQuestions,
    failedSymbols,
    counts: {
      total: results.length,
      accepted: accepted.length,
      failed: failedSymbols.length,
    },
  };
  if (options.redriveOf !== undefined) report.redriveOf = options.redriveOf;
  return deepFreeze(report);
}

export function findResult(
  report: AnalysisReport,
  symbol: string
): AnalysisResult | undefined {
  const key = symbol.trim().toUpperCase();
  return report.results.find((r) => r.symbol.trim().toUpperCase() === key);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function generateReportId(now: Date): string {
  // Timestamp plus random suffix keeps ids unique across concurrent runs
  const randomSuffix = Math.random().toString(36).substring(2, 8).toUpperCase();
  return `REPORT#${now.getTime()}#${randomSuffix}`;
}
