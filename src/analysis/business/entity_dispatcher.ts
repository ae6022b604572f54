import type { Logger } from "../../util/logger";
import { getLogger } from "../../util/logger";
import type { PipelineConfig } from "../config";
import type {
  AcceptedResult,
  AnalysisResult,
  DispatchMode,
  FailedResult,
  FailedValidation,
  Holding,
  HoldingAnalysis,
  MarketFacts,
  SymbolAnalysis,
} from "../domain/types";
import { isAccepted } from "../domain/types";
import {
  AggregationError,
  LlmInvocationError,
  PipelineTimeoutError,
} from "../errors";
import { assertUniqueSymbols } from "./aggregator";
import type { RetryController } from "./retry_controller";
import { validatePayload } from "./schema_validator";

export interface RunAllOptions {
  // Overrides config.deadlineMs for this run
  deadlineMs?: number;
  signal?: AbortSignal;
  facts?: MarketFacts;
}

export interface EntityDispatcher {
  runAll(
    holdings: readonly Holding[],
    mode: DispatchMode,
    options?: RunAllOptions
  ): Promise<AnalysisResult[]>;
  /**
   * Answers the follow_up_question of every accepted result and replaces its
   * analysis with the consolidated one. A follow-up that is exhausted, fails
   * or times out keeps the original result. Order is preserved.
   */
  runFollowUps(
    results: readonly AnalysisResult[],
    options?: RunAllOptions
  ): Promise<AnalysisResult[]>;
}

export interface EntityDispatcherDeps {
  controller: RetryController;
  config: Pick<PipelineConfig, "concurrency" | "deadlineMs">;
  logger?: Logger;
}

export function createEntityDispatcher(
  deps: EntityDispatcherDeps
): EntityDispatcher {
  const { controller, config } = deps;
  const logger = deps.logger ?? getLogger("analysis/entity_dispatcher");

  async function runHolding(
    holding: Holding,
    signal: AbortSignal,
    facts: MarketFacts | undefined
  ): Promise<AnalysisResult> {
    let attempts = 0;
    try {
      const outcome = await raceAbort(
        () =>
          controller.run(
            {
              entityId: holding.symbol,
              context: { kind: "holding", holding, facts },
              validate: (payload) => validatePayload(payload, "per_holding"),
              onAttempt: (attempt) => {
                attempts = attempt;
              },
            },
            signal
          ),
        signal
      );
      if (outcome.state === "ACCEPTED") {
        return acceptedResult(
          holding,
          outcome.value,
          outcome.clampedFields,
          outcome.attempts
        );
      }
      return exhaustedResult(
        holding,
        outcome.validation,
        outcome.attempts,
        outcome.lastRawResponse
      );
    } catch (error) {
      return failedFromError(holding, error, attempts, logger);
    }
  }

  async function runPerEntity(
    holdings: readonly Holding[],
    signal: AbortSignal,
    facts: MarketFacts | undefined
  ): Promise<AnalysisResult[]> {
    // Pre-sized slots indexed by input position keep input order
    const slots = new Array<AnalysisResult | undefined>(holdings.length).fill(
      undefined
    );
    await runWithConcurrency(
      holdings.map((_, index) => index),
      async (index) => {
        slots[index] = await runHolding(holdings[index], signal, facts);
      },
      config.concurrency
    );
    return slots.map((slot, index) => {
      if (!slot) {
        throw new AggregationError(`No result recorded for entity #${index}`);
      }
      return slot;
    });
  }

  async function runWholePortfolio(
    holdings: readonly Holding[],
    signal: AbortSignal,
    facts: MarketFacts | undefined
  ): Promise<AnalysisResult[]> {
    const symbols = holdings.map((h) => h.symbol);
    let attempts = 0;
    try {
      const outcome = await raceAbort(
        () =>
          controller.run(
            {
              entityId: "portfolio",
              context: { kind: "portfolio", holdings: [...holdings], facts },
              validate: (payload) => validatePayload(payload, "single", symbols),
              onAttempt: (attempt) => {
                attempts = attempt;
              },
            },
            signal
          ),
        signal
      );
      if (outcome.state === "EXHAUSTED") {
        return holdings.map((holding) =>
          exhaustedResult(
            holding,
            outcome.validation,
            outcome.attempts,
            outcome.lastRawResponse
          )
        );
      }

      const entries = new Map<string, { entry: SymbolAnalysis; index: number }>();
      outcome.value.holdings.forEach((entry, index) => {
        const key = entry.symbol.toUpperCase();
        if (!entries.has(key)) entries.set(key, { entry, index });
      });

      return holdings.map((holding) => {
        const found = entries.get(holding.symbol.trim().toUpperCase());
        if (!found) {
          throw new AggregationError(
            `Validated portfolio analysis has no entry for ${holding.symbol}`
          );
        }
        const prefix = `holdings[${found.index}].`;
        const clamped = outcome.clampedFields
          .filter((field) => field.startsWith(prefix))
          .map((field) => field.slice(prefix.length));
        return acceptedResult(
          holding,
          toHoldingAnalysis(found.entry),
          clamped,
          outcome.attempts
        );
      });
    } catch (error) {
      if (error instanceof AggregationError) throw error;
      return holdings.map((holding) =>
        failedFromError(holding, error, attempts, logger)
      );
    }
  }

  async function runAll(
    holdings: readonly Holding[],
    mode: DispatchMode,
    options: RunAllOptions = {}
  ): Promise<AnalysisResult[]> {
    assertUniqueSymbols(holdings.map((h) => h.symbol));
    if (holdings.length === 0) return [];

    const deadlineMs = options.deadlineMs ?? config.deadlineMs;
    const run = createRunSignal(deadlineMs, options.signal);
    const startedAt = Date.now();
    logger.info(
      { mode, entities: holdings.length, concurrency: config.concurrency, deadlineMs },
      "Dispatching analysis"
    );
    try {
      const results =
        mode === "whole_portfolio"
          ? await runWholePortfolio(holdings, run.signal, options.facts)
          : await runPerEntity(holdings, run.signal, options.facts);
      logger.info(
        {
          mode,
          entities: results.length,
          accepted: results.filter((r) => r.status === "ACCEPTED").length,
          elapsedMs: Date.now() - startedAt,
        },
        "Dispatch completed"
      );
      return results;
    } finally {
      run.dispose();
    }
  }

  async function resolveFollowUp(
    result: AcceptedResult,
    question: string,
    signal: AbortSignal,
    facts: MarketFacts | undefined
  ): Promise<AnalysisResult> {
    const entityId = `${result.symbol}#follow-up`;
    try {
      const outcome = await raceAbort(
        () =>
          controller.run(
            {
              entityId,
              context: {
                kind: "follow_up",
                holding: result.holding,
                original: result.analysis,
                question,
                facts,
              },
              validate: (payload) => validatePayload(payload, "per_holding"),
            },
            signal
          ),
        signal
      );
      if (outcome.state === "EXHAUSTED") {
        logger.warn(
          { entity: entityId, missingFields: outcome.validation.missingFields },
          "Follow-up exhausted, keeping original analysis"
        );
        return result;
      }
      return {
        ...result,
        analysis: outcome.value,
        clampedFields: outcome.clampedFields,
        followUp: {
          question,
          answer: outcome.value.follow_up_answer,
          attempts: outcome.attempts,
        },
      };
    } catch (error) {
      if (
        !(error instanceof PipelineTimeoutError) &&
        !(error instanceof LlmInvocationError)
      ) {
        throw error;
      }
      logger.warn(
        { entity: entityId, error: error.message },
        "Follow-up failed, keeping original analysis"
      );
      return result;
    }
  }

  async function runFollowUps(
    results: readonly AnalysisResult[],
    options: RunAllOptions = {}
  ): Promise<AnalysisResult[]> {
    const slots = [...results];
    const pending = results.flatMap((result, index) =>
      isAccepted(result) && result.analysis.follow_up_question
        ? [{ index, result, question: result.analysis.follow_up_question }]
        : []
    );
    if (pending.length === 0) return slots;

    const run = createRunSignal(
      options.deadlineMs ?? config.deadlineMs,
      options.signal
    );
    logger.info({ followUps: pending.length }, "Resolving follow-up questions");
    try {
      await runWithConcurrency(
        pending,
        async ({ index, result, question }) => {
          slots[index] = await resolveFollowUp(
            result,
            question,
            run.signal,
            options.facts
          );
        },
        config.concurrency
      );
      return slots;
    } finally {
      run.dispose();
    }
  }

  return { runAll, runFollowUps };
}

function toHoldingAnalysis(entry: SymbolAnalysis): HoldingAnalysis {
  const {
    recommendation,
    estimated_return,
    confidence,
    risk_notes,
    sources,
    follow_up_question,
  } = entry;
  const analysis: HoldingAnalysis = {
    recommendation,
    estimated_return,
    confidence,
    risk_notes,
    sources,
  };
  if (follow_up_question !== undefined) {
    analysis.follow_up_question = follow_up_question;
  }
  return analysis;
}

function acceptedResult(
  holding: Holding,
  analysis: HoldingAnalysis,
  clampedFields: string[],
  attempts: number
): AcceptedResult {
  return {
    status: "ACCEPTED",
    symbol: holding.symbol,
    holding,
    attempts,
    analysis,
    clampedFields,
  };
}

function exhaustedResult(
  holding: Holding,
  validation: FailedValidation,
  attempts: number,
  lastRawResponse: string
): FailedResult {
  return {
    status: "EXHAUSTED",
    symbol: holding.symbol,
    holding,
    attempts,
    failure: {
      code: "RETRIES_EXHAUSTED",
      error: `Validation failed after ${attempts} attempts`,
      missing_fields: validation.missingFields,
    },
    validation,
    lastRawResponse,
  };
}

function failedFromError(
  holding: Holding,
  error: unknown,
  attempts: number,
  logger: Logger
): FailedResult {
  if (error instanceof PipelineTimeoutError) {
    logger.warn({ entity: holding.symbol, attempts }, "Entity timed out");
    return {
      status: "TIMED_OUT",
      symbol: holding.symbol,
      holding,
      attempts,
      failure: { code: "TIMEOUT", error: error.message, missing_fields: [] },
    };
  }
  if (error instanceof LlmInvocationError) {
    logger.error(
      { entity: holding.symbol, attempts, error: error.message },
      "LLM invocation failed"
    );
    return {
      status: "LLM_ERROR",
      symbol: holding.symbol,
      holding,
      attempts,
      failure: {
        code: "LLM_INVOCATION_ERROR",
        error: error.message,
        missing_fields: [],
      },
    };
  }
  throw error;
}

/**
 * Settles with `start()` or rejects with PipelineTimeoutError once `signal`
 * aborts, whichever happens first. Nothing is started after an abort.
 */
function raceAbort<T>(start: () => Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new PipelineTimeoutError());
      return;
    }
    const onAbort = () => reject(new PipelineTimeoutError());
    signal.addEventListener("abort", onAbort, { once: true });
    void start()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}

function createRunSignal(
  deadlineMs: number | undefined,
  external: AbortSignal | undefined
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort(new PipelineTimeoutError());
  const timer =
    deadlineMs === undefined ? undefined : setTimeout(abort, deadlineMs);

  if (external?.aborted) abort();
  else external?.addEventListener("abort", abort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      external?.removeEventListener("abort", abort);
    },
  };
}

async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T) => Promise<void>,
  concurrency: number
): Promise<void> {
  let index = 0;
  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    async () => {
      while (index < items.length) {
        const current = items[index];
        index += 1;
        await worker(current);
      }
    }
  );

  await Promise.all(workers);
}
