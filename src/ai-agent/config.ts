import { getNumber, getStage, getString, isProduction, readEnvVar } from "../util/env";

export const AI_PROVIDERS = ["google", "openai"] as const;
export type AiProvider = (typeof AI_PROVIDERS)[number];

const DEFAULT_MODELS: Record<AiProvider, string> = {
  google: "gemini-2.5-flash",
  openai: "gpt-4o-mini",
};

const API_KEY_VARS: Record<AiProvider, string> = {
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
  openai: "OPENAI_API_KEY",
};

export interface AiConfig {
  provider: AiProvider;
  model: string;
  apiKey: string | undefined;
  maxOutputTokens: number | undefined;
  // transport-level retries done by the ai SDK itself
  maxRetries: number;
  stage: string;
  production: boolean;
}

function isProvider(value: string): value is AiProvider {
  return AI_PROVIDERS.some((p) => p === value);
}

export function parseProvider(raw: string): AiProvider {
  const normalized = raw.trim().toLowerCase();
  if (!isProvider(normalized)) {
    throw new Error(
      `Unsupported MODEL_PROVIDER: ${raw} (expected ${AI_PROVIDERS.join(" or ")})`
    );
  }
  return normalized;
}

export function loadAiConfig(overrides: Partial<AiConfig> = {}): AiConfig {
  const provider =
    overrides.provider ?? parseProvider(getString("MODEL_PROVIDER", "google"));
  return {
    provider,
    model: overrides.model ?? getString("MODEL_NAME", DEFAULT_MODELS[provider]),
    apiKey: overrides.apiKey ?? readEnvVar(API_KEY_VARS[provider]),
    maxOutputTokens:
      overrides.maxOutputTokens ?? getNumber("MODEL_MAX_OUTPUT_TOKENS"),
    maxRetries: overrides.maxRetries ?? getNumber("MODEL_MAX_RETRIES", 2),
    stage: getStage(),
    production: isProduction(),
  };
}
