// Lambda handler for the holdings analysis run (Node.js)
// Thin wrapper over the analysis application layer.

import { forceFlushLangfuse } from "../../src/ai-agent";
import {
  analyzeHoldings,
  createAiLlmInvoker,
  createDynamoReportRepository,
  createJsonHoldingsSource,
  createLogNotifier,
  loadPipelineConfig,
} from "../../src/analysis";
import { DynamoTable, getDynamoTableName } from "../../src/util/dynamodb";
import { requireString } from "../../src/util/env";
import { withRequestContext } from "../../src/util/logger";

interface LambdaContext {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

/**
 * AWS Lambda entrypoint. Holdings come from the JSON file at HOLDINGS_FILE;
 * the report is stored in the analysis reports table.
 */
export const handler = async (_event: unknown, context: LambdaContext = {}) => {
  const logger = withRequestContext("functions/analyze_holdings", context);
  const config = loadPipelineConfig();

  try {
    const { report, delivery } = await analyzeHoldings({
      source: createJsonHoldingsSource({ filePath: requireString("HOLDINGS_FILE") }),
      llm: createAiLlmInvoker(),
      config,
      repository: createDynamoReportRepository({
        tableName: getDynamoTableName(DynamoTable.AnalysisReports),
      }),
      notifier: createLogNotifier(logger),
      logger,
    });

    return {
      statusCode: 200,
      body: JSON.stringify({
        status: "ok",
        reportId: report.reportId,
        counts: report.counts,
        needsFollowUp: report.needsFollowUp,
        failedSymbols: report.failedSymbols,
        delivery,
      }),
    };
  } finally {
    // Ensure spans are exported in short-lived environments (Lambda)
    await forceFlushLangfuse();
  }
};
