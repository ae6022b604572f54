import type { Logger } from "../../util/logger";
import { getLogger } from "../../util/logger";
import type { PipelineConfig } from "../config";
import type {
  AnalysisContext,
  FailedValidation,
  ValidationOutcome,
} from "../domain/types";
import {
  ExtractionError,
  LlmInvocationError,
  PipelineTimeoutError,
  ValidationError,
  errorMessage,
} from "../errors";
import type { LlmInvoker } from "../types/contracts";
import { buildCorrectivePrompt, buildInitialPrompt } from "./prompt_builder";
import { requirePayload } from "./response_extractor";
import { noJsonOutcome } from "./schema_validator";

export type RetryState =
  | "BUILDING"
  | "AWAITING_RESPONSE"
  | "EXTRACTING"
  | "VALIDATING"
  | "RETRYING"
  | "ACCEPTED"
  | "EXHAUSTED";

export interface RetryTask<T> {
  entityId: string;
  context: AnalysisContext;
  validate: (payload: unknown) => ValidationOutcome<T>;
  // Called before each invocation with the 1-based attempt number
  onAttempt?: (attempt: number) => void;
}

export type RetryOutcome<T> =
  | {
      state: "ACCEPTED";
      value: T;
      clampedFields: string[];
      attempts: number;
      transitions: RetryState[];
      rawResponse: string;
    }
  | {
      state: "EXHAUSTED";
      validation: FailedValidation;
      attempts: number;
      transitions: RetryState[];
      lastRawResponse: string;
    };

export interface RetryController {
  /**
   * Runs one entity to a terminal state. Rejects with LlmInvocationError on
   * transport failures and PipelineTimeoutError when `signal` aborts.
   */
  run<T>(task: RetryTask<T>, signal?: AbortSignal): Promise<RetryOutcome<T>>;
}

export interface RetryControllerDeps {
  llm: LlmInvoker;
  config: Pick<PipelineConfig, "maxRetries" | "temperature">;
  logger?: Logger;
}

/**
 * Bounded validate-and-retry loop. `maxRetries` counts corrective retries,
 * so an entity makes at most `maxRetries + 1` invocations.
 */
export function createRetryController(deps: RetryControllerDeps): RetryController {
  const { llm, config } = deps;
  const logger = deps.logger ?? getLogger("analysis/retry_controller");

  async function invoke(
    prompt: string,
    attempt: number,
    signal: AbortSignal | undefined
  ): Promise<string> {
    try {
      return await llm.invoke(prompt, config.temperature, signal);
    } catch (error) {
      if (signal?.aborted) throw new PipelineTimeoutError();
      const message =
        error instanceof LlmInvocationError
          ? error.message
          : `LLM invocation failed: ${errorMessage(error)}`;
      throw new LlmInvocationError(message, { cause: error, attempt });
    }
  }

  async function run<T>(
    task: RetryTask<T>,
    signal?: AbortSignal
  ): Promise<RetryOutcome<T>> {
    const log = logger.child({ entity: task.entityId });
    const transitions: RetryState[] = [];
    const moveTo = (state: RetryState, attempt: number) => {
      transitions.push(state);
      log.debug({ state, attempt }, "Retry state transition");
    };

    moveTo("BUILDING", 1);
    let prompt = buildInitialPrompt(task.context);

    for (let attempt = 1; ; attempt++) {
      moveTo("AWAITING_RESPONSE", attempt);
      if (signal?.aborted) throw new PipelineTimeoutError();
      task.onAttempt?.(attempt);
      const raw = await invoke(prompt, attempt, signal);

      const outcome = evaluate(raw, task, (state) => moveTo(state, attempt));
      if (outcome.ok) {
        moveTo("ACCEPTED", attempt);
        if (outcome.clampedFields.length > 0) {
          log.warn(
            { clampedFields: outcome.clampedFields },
            "Out-of-range confidence clamped into [0, 1]"
          );
        }
        log.info({ attempts: attempt }, "Analysis accepted");
        return {
          state: "ACCEPTED",
          value: outcome.value,
          clampedFields: outcome.clampedFields,
          attempts: attempt,
          transitions,
          rawResponse: raw,
        };
      }

      log.info(
        { attempt, missingFields: outcome.missingFields },
        "Analysis attempt rejected"
      );

      if (attempt > config.maxRetries) {
        moveTo("EXHAUSTED", attempt);
        log.warn(
          { attempts: attempt, missingFields: outcome.missingFields },
          "Retries exhausted"
        );
        return {
          state: "EXHAUSTED",
          validation: outcome,
          attempts: attempt,
          transitions,
          lastRawResponse: raw,
        };
      }

      moveTo("RETRYING", attempt);
      prompt = buildCorrectivePrompt(task.context, raw, outcome.issues);
    }
  }

  return { run };
}

function evaluate<T>(
  raw: string,
  task: RetryTask<T>,
  moveTo: (state: RetryState) => void
): ValidationOutcome<T> {
  moveTo("EXTRACTING");
  try {
    const payload = requirePayload(raw);
    moveTo("VALIDATING");
    const outcome = task.validate(payload);
    if (!outcome.ok) throw new ValidationError(outcome);
    return outcome;
  } catch (error) {
    if (error instanceof ExtractionError) return noJsonOutcome();
    if (error instanceof ValidationError) return error.outcome;
    throw error;
  }
}
