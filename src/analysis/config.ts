import { z } from "zod";
import { getBoolean, getNumber, getString } from "../util/env";

export const PipelineConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  confidenceThreshold: z.number().min(0).max(1).default(0.5),
  concurrency: z.number().int().min(1).default(5),
  temperature: z.number().min(0).max(2).default(0.5),
  deadlineMs: z.number().int().positive().optional(),
  mode: z.enum(["whole_portfolio", "per_entity"]).default("per_entity"),
  minVariationPercent: z.number().min(0).optional(),
  // second pass answering each accepted follow_up_question
  resolveFollowUps: z.boolean().default(false),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function createPipelineConfig(
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  return PipelineConfigSchema.parse(overrides);
}

/**
 * Builds the pipeline configuration from ANALYSIS_* env vars, applying
 * explicit overrides last.
 */
export function loadPipelineConfig(
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  const fromEnv: PipelineConfigInput = {
    maxRetries: getNumber("ANALYSIS_MAX_RETRIES"),
    confidenceThreshold: getNumber("ANALYSIS_CONFIDENCE_THRESHOLD"),
    concurrency: getNumber("ANALYSIS_CONCURRENCY"),
    temperature: getNumber("ANALYSIS_TEMPERATURE"),
    deadlineMs: getNumber("ANALYSIS_DEADLINE_MS"),
    mode: parseMode(getString("ANALYSIS_MODE")),
    minVariationPercent: getNumber("ANALYSIS_MIN_VARIATION_PERCENT"),
    resolveFollowUps: getBoolean("ANALYSIS_RESOLVE_FOLLOW_UPS"),
  };
  return PipelineConfigSchema.parse({ ...fromEnv, ...overrides });
}

function parseMode(raw: string | undefined): PipelineConfig["mode"] | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase().replace(/-/g, "_");
  if (normalized === "whole_portfolio" || normalized === "per_entity") {
    return normalized;
  }
  throw new Error(`Env var ANALYSIS_MODE is not a dispatch mode: ${raw}`);
}
