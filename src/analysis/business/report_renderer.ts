import type { AnalysisReport, AnalysisResult } from "../domain/types";

// WhatsApp Business API caps text bodies at 4096 characters
export const DEFAULT_MAX_MESSAGE_LENGTH = 4096;

export interface RenderOptions {
  maxLength?: number;
}

/**
 * Plain-text rendering of a report for message delivery.
 */
export function renderReportText(
  report: AnalysisReport,
  options: RenderOptions = {}
): string {
  const maxLength = options.maxLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
  const lines = [
    `Holdings analysis ${report.asOfDate}`,
    `Entities: ${report.counts.total} | accepted: ${report.counts.accepted} | failed: ${report.counts.failed}`,
    `Overall confidence: ${report.overallConfidence.toFixed(2)}`,
    `Needs follow-up: ${report.needsFollowUp ? "yes" : "no"}`,
    ...(report.redriveOf ? [`Re-drive of: ${report.redriveOf}`] : []),
    "",
    "Holdings:",
    ...report.results.map(renderResultLine),
  ];

  if (report.sectorSummary.length > 0) {
    lines.push("", "Sectors:");
    for (const entry of report.sectorSummary) {
      lines.push(
        `- ${entry.sector}: ${entry.holdings} holdings, ${entry.value.toFixed(2)}`
      );
    }
  }

  if (report.followUpQuestions.length > 0) {
    lines.push("", "Follow-up:");
    for (const question of report.followUpQuestions) {
      lines.push(`- ${question}`);
    }
  }

  const answered = report.results.flatMap((r) =>
    r.status === "ACCEPTED" && r.followUp?.answer
      ? [`- ${r.symbol}: ${r.followUp.question}`, `  ${r.followUp.answer}`]
      : []
  );
  if (answered.length > 0) {
    lines.push("", "Answered follow-ups:", ...answered);
  }

  const text = lines.join("\n");
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}

function renderResultLine(result: AnalysisResult): string {
  if (result.status === "ACCEPTED") {
    const { recommendation, confidence, estimated_return } = result.analysis;
    const estimated =
      estimated_return === null ? "n/a" : `${estimated_return.toFixed(2)}%`;
    return `- ${result.symbol}: ${recommendation} (confidence ${confidence.toFixed(2)}, est. return ${estimated})`;
  }
  const missing =
    result.failure.missing_fields.length > 0
      ? `; missing: ${result.failure.missing_fields.join(", ")}`
      : "";
  return `- ${result.symbol}: FAILED ${result.failure.code} (${result.failure.error}${missing})`;
}
