import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import {
  startActiveObservation,
  updateActiveObservation,
} from "@langfuse/tracing";
import { generateText, type LanguageModel } from "ai";

import { getLogger } from "../util/logger";
import { loadAiConfig, type AiConfig, type AiProvider } from "./config";
import { instrumentationConfig } from "./telemetry/instrumentation";

export interface TextAgentConfig {
  provider?: AiProvider;
  model?: string;
  apiKey?: string;
  temperature?: number;
  maxOutputTokens?: number;
  maxRetries?: number;
  systemPrompt?: string;
  // Langfuse observation name and telemetry function id
  name?: string;
}

export interface GenerateOptions {
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface TextAgent {
  readonly provider: AiProvider;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

function resolveModel(config: AiConfig): LanguageModel {
  switch (config.provider) {
    case "openai":
      return createOpenAI({ apiKey: config.apiKey })(config.model);
    case "google":
      return createGoogleGenerativeAI({ apiKey: config.apiKey })(config.model);
  }
}

/**
 * Plain-text agent over the ai SDK. Each call is wrapped in a Langfuse
 * observation; tracing is a no-op when Langfuse keys are absent.
 */
export function createTextAgent(config: TextAgentConfig = {}): TextAgent {
  const aiConfig = loadAiConfig({
    provider: config.provider,
    model: config.model,
    apiKey: config.apiKey,
    maxOutputTokens: config.maxOutputTokens,
    maxRetries: config.maxRetries,
  });
  const {
    temperature: defaultTemperature = 0.5,
    systemPrompt,
    name = "text-agent",
  } = config;
  const languageModel = resolveModel(aiConfig);
  const logger = getLogger("ai-agent/agent");

  return {
    provider: aiConfig.provider,
    model: aiConfig.model,
    generate(prompt, options = {}) {
      const temperature = options.temperature ?? defaultTemperature;
      return startActiveObservation(name, async () => {
        updateActiveObservation({
          input: prompt,
          metadata: {
            provider: aiConfig.provider,
            model: aiConfig.model,
            temperature,
          },
        });

        const startedAt = Date.now();
        const result = await generateText({
          model: languageModel,
          system: systemPrompt,
          prompt,
          temperature,
          maxOutputTokens: aiConfig.maxOutputTokens,
          maxRetries: aiConfig.maxRetries,
          abortSignal: options.abortSignal,
          ...instrumentationConfig(name),
        });

        logger.debug(
          {
            model: aiConfig.model,
            durationMs: Date.now() - startedAt,
            finishReason: result.finishReason,
            chars: result.text.length,
          },
          "Generation finished"
        );
        updateActiveObservation({ output: result.text });
        return result.text;
      });
    },
  };
}
