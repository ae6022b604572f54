// Load envs from .env
// node dist/src/analysis/script/run_analysis.js [holdings.json] [--whole-portfolio]
import "dotenv/config";

import { analyzeHoldings } from "../application/analyze_holdings";
import { loadPipelineConfig } from "../config";
import { createAiLlmInvoker } from "../infrastructure/llm_invoker";
import { createJsonHoldingsSource } from "../infrastructure/json_holdings_source";

async function main() {
  const args = process.argv.slice(2);
  const filePath =
    args.find((a) => !a.startsWith("--")) ??
    process.env.HOLDINGS_FILE ??
    "holdings.json";
  const config = loadPipelineConfig(
    args.includes("--whole-portfolio") ? { mode: "whole_portfolio" } : {}
  );

  const { report, text } = await analyzeHoldings({
    source: createJsonHoldingsSource({ filePath }),
    llm: createAiLlmInvoker(),
    config,
  });
  // eslint-disable-next-line no-console
  console.log(text);
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(report, null, 2));
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
