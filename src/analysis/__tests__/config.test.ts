import {
  createPipelineConfig,
  loadPipelineConfig,
} from "@src/analysis/config";

describe("pipeline config", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("ANALYSIS_")) delete process.env[key];
    }
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("applies defaults", () => {
    expect(createPipelineConfig()).toEqual({
      maxRetries: 3,
      confidenceThreshold: 0.5,
      concurrency: 5,
      temperature: 0.5,
      mode: "per_entity",
      resolveFollowUps: false,
    });
  });

  test("reads ANALYSIS_* variables", () => {
    process.env.ANALYSIS_MAX_RETRIES = "1";
    process.env.ANALYSIS_CONCURRENCY = "2";
    process.env.ANALYSIS_DEADLINE_MS = "30000";
    process.env.ANALYSIS_MODE = "whole-portfolio";
    process.env.ANALYSIS_MIN_VARIATION_PERCENT = "2.5";
    process.env.ANALYSIS_RESOLVE_FOLLOW_UPS = "yes";

    expect(loadPipelineConfig()).toEqual({
      maxRetries: 1,
      confidenceThreshold: 0.5,
      concurrency: 2,
      temperature: 0.5,
      deadlineMs: 30000,
      mode: "whole_portfolio",
      minVariationPercent: 2.5,
      resolveFollowUps: true,
    });
  });

  test("explicit overrides win over the environment", () => {
    process.env.ANALYSIS_MAX_RETRIES = "1";
    expect(loadPipelineConfig({ maxRetries: 0 }).maxRetries).toBe(0);
  });

  test("rejects a follow-up flag that is not a boolean", () => {
    process.env.ANALYSIS_RESOLVE_FOLLOW_UPS = "sometimes";
    expect(() => loadPipelineConfig()).toThrow(
      "Env var ANALYSIS_RESOLVE_FOLLOW_UPS is not a boolean: sometimes"
    );
  });

  test("rejects an unknown mode", () => {
    process.env.ANALYSIS_MODE = "batch";
    expect(() => loadPipelineConfig()).toThrow(
      "Env var ANALYSIS_MODE is not a dispatch mode: batch"
    );
  });

  test("rejects out-of-range values", () => {
    expect(() => createPipelineConfig({ concurrency: 0 })).toThrow();
    expect(() => createPipelineConfig({ confidenceThreshold: 1.5 })).toThrow();
  });
});
