export {
  createTextAgent,
  type GenerateOptions,
  type TextAgent,
  type TextAgentConfig,
} from "./agent";

export {
  AI_PROVIDERS,
  loadAiConfig,
  parseProvider,
  type AiConfig,
  type AiProvider,
} from "./config";

export { ensureTracing, forceFlushLangfuse } from "./telemetry/instrumentation";
