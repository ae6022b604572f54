import { createTextAgent, type TextAgent, type TextAgentConfig } from "../../ai-agent";
import { LlmInvocationError, PipelineTimeoutError, errorMessage } from "../errors";
import type { LlmInvoker } from "../types/contracts";

const SYSTEM_PROMPT = [
  "You are a professional investment research assistant.",
  "Answer with a single JSON object and nothing else.",
].join("\n");

/**
 * LlmInvoker over the ai SDK text agent. Aborts surface as
 * PipelineTimeoutError, every other failure as LlmInvocationError.
 */
export function createAiLlmInvoker(
  params: { agent?: TextAgent; agentConfig?: TextAgentConfig } = {}
): LlmInvoker {
  const agent =
    params.agent ??
    createTextAgent({
      systemPrompt: SYSTEM_PROMPT,
      name: "holdings-analysis",
      ...params.agentConfig,
    });

  return {
    async invoke(prompt, temperature, signal) {
      try {
        return await agent.generate(prompt, { temperature, abortSignal: signal });
      } catch (error) {
        if (signal?.aborted) {
          throw new PipelineTimeoutError();
        }
        throw new LlmInvocationError(
          `${agent.model} request failed: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    },
  };
}
