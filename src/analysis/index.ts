export * from "./domain/types";
export * from "./errors";
export * from "./types/contracts";
export {
  createPipelineConfig,
  loadPipelineConfig,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from "./config";

export {
  buildCorrectivePrompt,
  buildFollowUpPrompt,
  buildInitialPrompt,
} from "./business/prompt_builder";
export { extractPayload, requirePayload } from "./business/response_extractor";
export { ENTIRE_PAYLOAD, validatePayload } from "./business/schema_validator";
export {
  createRetryController,
  type RetryController,
  type RetryOutcome,
  type RetryState,
  type RetryTask,
} from "./business/retry_controller";
export {
  createEntityDispatcher,
  type EntityDispatcher,
  type RunAllOptions,
} from "./business/entity_dispatcher";
export { combineResults, findResult, type CombineOptions } from "./business/aggregator";
export { renderReportText, type RenderOptions } from "./business/report_renderer";
export {
  filterByPriceVariation,
  priceVariationPercent,
} from "./business/holdings_filter";

export {
  analyzeHoldings,
  redriveFailures,
  resolveFollowUps,
  type AnalyzeHoldingsDeps,
  type AnalyzeHoldingsOptions,
  type AnalyzeHoldingsResult,
  type DeliveryStatus,
  type PipelineDeps,
} from "./application/analyze_holdings";

export { createAiLlmInvoker } from "./infrastructure/llm_invoker";
export {
  createJsonHoldingsSource,
  parseHoldings,
} from "./infrastructure/json_holdings_source";
export { createLogNotifier } from "./infrastructure/log_notifier";
export { createDynamoReportRepository } from "./db/dynamo_report_repository";
