import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand } from "@aws-sdk/lib-dynamodb";

import { errorMessage } from "../errors";
import type { AnalysisReport } from "../domain/types";
import type { ReportRepository } from "../types/contracts";

export const REPORT_PARTITION_KEY = "REPORT#HOLDINGS";

export function reportSortKey(report: AnalysisReport): string {
  return `${report.asOfDate}#${report.reportId}`;
}

// Narrow view of the document client so tests can pass a fake
export interface ReportTableClient {
  send(command: PutCommand): Promise<unknown>;
}

/**
 * Reports are stored under one partition, sorted by date then id, so the
 * latest report is the last item of a descending query.
 */
export function createDynamoReportRepository(params: {
  tableName: string;
  client?: ReportTableClient;
}): ReportRepository {
  const doc: ReportTableClient =
    params.client ??
    DynamoDBDocumentClient.from(new DynamoDBClient({}), {
      marshallOptions: { removeUndefinedValues: true },
    });
  const { tableName } = params;

  return {
    async save(report) {
      try {
        await doc.send(
          new PutCommand({
            TableName: tableName,
            Item: {
              pk: REPORT_PARTITION_KEY,
              sk: reportSortKey(report),
              reportId: report.reportId,
              asOfDate: report.asOfDate,
              createdAt: report.createdAt,
              mode: report.mode,
              redriveOf: report.redriveOf,
              overallConfidence: report.overallConfidence,
              needsFollowUp: report.needsFollowUp,
              failedSymbols: report.failedSymbols,
              counts: report.counts,
              content: JSON.stringify(report),
            },
          })
        );
      } catch (error) {
        throw new Error(
          `Failed to save analysis report ${report.reportId}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    },
  };
}
