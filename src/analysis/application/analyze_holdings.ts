import type { Logger } from "../../util/logger";
import { getLogger } from "../../util/logger";
import { combineResults } from "../business/aggregator";
import type { EntityDispatcher } from "../business/entity_dispatcher";
import { createEntityDispatcher } from "../business/entity_dispatcher";
import { filterByPriceVariation } from "../business/holdings_filter";
import { renderReportText } from "../business/report_renderer";
import { createRetryController } from "../business/retry_controller";
import type { PipelineConfig } from "../config";
import type {
  AnalysisReport,
  DispatchMode,
  MarketFacts,
} from "../domain/types";
import { isAccepted } from "../domain/types";
import { errorMessage } from "../errors";
import type {
  HoldingsSource,
  LlmInvoker,
  ReportNotifier,
  ReportRepository,
} from "../types/contracts";

export interface PipelineDeps {
  llm: LlmInvoker;
  config: PipelineConfig;
  repository?: ReportRepository;
  notifier?: ReportNotifier;
  logger?: Logger;
}

export interface AnalyzeHoldingsDeps extends PipelineDeps {
  source: HoldingsSource;
}

export interface AnalyzeHoldingsOptions {
  mode?: DispatchMode;
  facts?: MarketFacts;
  deadlineMs?: number;
  signal?: AbortSignal;
  asOfDate?: string;
  now?: Date;
}

export interface DeliveryStatus {
  saved: boolean;
  notified: boolean;
  errors: string[];
}

export interface AnalyzeHoldingsResult {
  report: AnalysisReport;
  text: string;
  delivery: DeliveryStatus;
}

function createDispatcher(deps: PipelineDeps): EntityDispatcher {
  const controller = createRetryController({
    llm: deps.llm,
    config: deps.config,
  });
  return createEntityDispatcher({ controller, config: deps.config });
}

/**
 * Load → filter → dispatch → aggregate → deliver.
 * The report is always returned; delivery failures are reported in
 * `delivery.errors`.
 */
export async function analyzeHoldings(
  deps: AnalyzeHoldingsDeps,
  options: AnalyzeHoldingsOptions = {}
): Promise<AnalyzeHoldingsResult> {
  const logger = deps.logger ?? getLogger("analysis/analyze_holdings");
  const { config } = deps;

  const loaded = await deps.source.loadHoldings();
  const holdings =
    config.minVariationPercent === undefined
      ? loaded
      : filterByPriceVariation(loaded, config.minVariationPercent);
  logger.info(
    {
      loaded: loaded.length,
      selected: holdings.length,
      minVariationPercent: config.minVariationPercent,
    },
    "Holdings loaded"
  );

  const mode = options.mode ?? config.mode;
  const dispatcher = createDispatcher(deps);
  const runOptions = {
    deadlineMs: options.deadlineMs,
    signal: options.signal,
    facts: options.facts,
  };
  const analysed = await dispatcher.runAll(holdings, mode, runOptions);
  const results = config.resolveFollowUps
    ? await dispatcher.runFollowUps(analysed, runOptions)
    : analysed;

  const report = combineResults(results, {
    mode,
    confidenceThreshold: config.confidenceThreshold,
    asOfDate: options.asOfDate ?? options.facts?.asOfDate,
    now: options.now,
  });
  return publish(report, deps, logger);
}

/**
 * Re-runs only the failed entities of `report` (per entity) and returns a
 * new report with the same entity order.
 */
export async function redriveFailures(
  report: AnalysisReport,
  deps: PipelineDeps,
  options: Omit<AnalyzeHoldingsOptions, "mode"> = {}
): Promise<AnalyzeHoldingsResult> {
  const logger = deps.logger ?? getLogger("analysis/redrive_failures");
  const failed = report.results.filter((r) => !isAccepted(r));
  if (failed.length === 0) {
    logger.info({ reportId: report.reportId }, "Nothing to re-drive");
    return {
      report,
      text: renderReportText(report),
      delivery: { saved: false, notified: false, errors: [] },
    };
  }

  logger.info(
    { reportId: report.reportId, symbols: failed.map((r) => r.symbol) },
    "Re-driving failed entities"
  );
  const rerun = await createDispatcher(deps).runAll(
    failed.map((r) => r.holding),
    "per_entity",
    { deadlineMs: options.deadlineMs, signal: options.signal, facts: options.facts }
  );
  const replacements = new Map(rerun.map((r) => [r.symbol, r]));
  const merged = report.results.map((r) => replacements.get(r.symbol) ?? r);

  const next = combineResults(merged, {
    // mode describes the original run; redriveOf marks the per-entity re-run
    mode: report.mode,
    redriveOf: report.reportId,
    confidenceThreshold: deps.config.confidenceThreshold,
    asOfDate: options.asOfDate ?? report.asOfDate,
    now: options.now,
  });
  return publish(next, deps, logger);
}

/**
 * Answers the follow-up questions raised in `report` and returns a new report
 * with the consolidated analyses. A result whose follow-up run fails keeps its
 * original analysis.
 */
export async function resolveFollowUps(
  report: AnalysisReport,
  deps: PipelineDeps,
  options: Omit<AnalyzeHoldingsOptions, "mode"> = {}
): Promise<AnalyzeHoldingsResult> {
  const logger = deps.logger ?? getLogger("analysis/resolve_follow_ups");
  const pending = report.results.filter(
    (r) => isAccepted(r) && r.analysis.follow_up_question
  );
  if (pending.length === 0) {
    logger.info({ reportId: report.reportId }, "No follow-up questions to resolve");
    return {
      report,
      text: renderReportText(report),
      delivery: { saved: false, notified: false, errors: [] },
    };
  }

  const results = await createDispatcher(deps).runFollowUps(report.results, {
    deadlineMs: options.deadlineMs,
    signal: options.signal,
    facts: options.facts,
  });
  const next = combineResults(results, {
    mode: report.mode,
    redriveOf: report.redriveOf,
    confidenceThreshold: deps.config.confidenceThreshold,
    asOfDate: options.asOfDate ?? report.asOfDate,
    now: options.now,
  });
  return publish(next, deps, logger);
}

async function publish(
  report: AnalysisReport,
  deps: PipelineDeps,
  logger: Logger
): Promise<AnalyzeHoldingsResult> {
  const text = renderReportText(report);
  const delivery: DeliveryStatus = { saved: false, notified: false, errors: [] };

  if (deps.repository) {
    try {
      await deps.repository.save(report);
      delivery.saved = true;
    } catch (error) {
      const msg = errorMessage(error);
      logger.error({ reportId: report.reportId, error: msg }, "Report save failed");
      delivery.errors.push(`save: ${msg}`);
    }
  }

  if (deps.notifier) {
    try {
      await deps.notifier.deliver(report, text);
      delivery.notified = true;
    } catch (error) {
      const msg = errorMessage(error);
      logger.error(
        { reportId: report.reportId, error: msg },
        "Report delivery failed"
      );
      delivery.errors.push(`deliver: ${msg}`);
    }
  }

  logger.info(
    {
      reportId: report.reportId,
      accepted: report.counts.accepted,
      failed: report.counts.failed,
      overallConfidence: report.overallConfidence,
      needsFollowUp: report.needsFollowUp,
    },
    "Analysis report ready"
  );
  return { report, text, delivery };
}
