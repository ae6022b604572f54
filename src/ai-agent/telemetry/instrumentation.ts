import { LangfuseSpanProcessor } from "@langfuse/otel";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";

import { readEnvVar } from "../../util/env";
import { getLogger } from "../../util/logger";

const logger = getLogger("ai-agent/telemetry");

let spanProcessor: LangfuseSpanProcessor | undefined;

/**
 * Registers the Langfuse span processor on first use. Tracing stays off
 * unless both LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY are set.
 */
export function ensureTracing(): boolean {
  if (spanProcessor) return true;

  const publicKey = readEnvVar("LANGFUSE_PUBLIC_KEY");
  const secretKey = readEnvVar("LANGFUSE_SECRET_KEY");
  if (!publicKey || !secretKey) return false;

  spanProcessor = new LangfuseSpanProcessor({
    publicKey,
    secretKey,
    baseUrl: readEnvVar("LANGFUSE_HOST"),
  });
  const tracerProvider = new NodeTracerProvider({
    spanProcessors: [spanProcessor],
  });
  tracerProvider.register();
  logger.debug("Langfuse tracing registered");
  return true;
}

export async function forceFlushLangfuse(): Promise<void> {
  if (!spanProcessor) return;
  try {
    await spanProcessor.forceFlush();
  } catch (error) {
    // short-lived runtimes: a lost trace must not fail the invocation
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Langfuse flush failed"
    );
  }
}

export function instrumentationConfig(functionId: string) {
  return {
    experimental_telemetry: {
      isEnabled: ensureTracing(),
      functionId,
    },
  };
}
