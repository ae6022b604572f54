import type { AnalysisReport, Holding } from "../domain/types";

/**
 * LLM invocation capability. Resolves with the raw model text; rejects with
 * an LlmInvocationError on transport failures or timeouts.
 */
export interface LlmInvoker {
  invoke(
    prompt: string,
    temperature: number,
    signal?: AbortSignal
  ): Promise<string>;
}

/**
 * Ordered, read-only supply of holdings
 */
export interface HoldingsSource {
  loadHoldings(): Promise<Holding[]>;
}

/**
 * Report persistence
 */
export interface ReportRepository {
  save(report: AnalysisReport): Promise<void>;
}

/**
 * Outbound delivery of a rendered report (messaging channel, file writer)
 */
export interface ReportNotifier {
  deliver(report: AnalysisReport, text: string): Promise<void>;
}
