/**
 * Error taxonomy for the analysis pipeline.
 *
 * Extraction and validation errors are recovered inside the retry loop and
 * only surface as failure-marked results. LlmInvocationError and
 * PipelineTimeoutError are converted to failure-marked results per entity.
 * AggregationError signals a broken invariant and is thrown to the caller.
 */
import type { FailedValidation } from "./domain/types";

export type AnalysisErrorCode =
  | "EXTRACTION_FAILED"
  | "VALIDATION_FAILED"
  | "LLM_INVOCATION_ERROR"
  | "TIMEOUT"
  | "AGGREGATION_ERROR";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(
    code: AnalysisErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ExtractionError extends AnalysisError {
  readonly raw: string;

  constructor(raw: string, reason: string) {
    super("EXTRACTION_FAILED", `No JSON payload found: ${reason}`);
    this.raw = raw;
  }
}

export class ValidationError extends AnalysisError {
  readonly outcome: FailedValidation;

  constructor(outcome: FailedValidation) {
    super(
      "VALIDATION_FAILED",
      `Invalid or missing fields: ${outcome.missingFields.join(", ")}`
    );
    this.outcome = outcome;
  }

  get missingFields(): string[] {
    return this.outcome.missingFields;
  }
}

export class LlmInvocationError extends AnalysisError {
  readonly attempt?: number;

  constructor(message: string, options?: { cause?: unknown; attempt?: number }) {
    super("LLM_INVOCATION_ERROR", message, { cause: options?.cause });
    this.attempt = options?.attempt;
  }
}

export class PipelineTimeoutError extends AnalysisError {
  constructor(message = "Analysis deadline exceeded") {
    super("TIMEOUT", message);
  }
}

export class AggregationError extends AnalysisError {
  constructor(message: string) {
    super("AGGREGATION_ERROR", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
