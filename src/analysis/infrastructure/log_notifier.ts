import type { Logger } from "../../util/logger";
import { getLogger } from "../../util/logger";
import type { ReportNotifier } from "../types/contracts";

// Local stand-in for a messaging channel
export function createLogNotifier(
  logger: Logger = getLogger("analysis/notifier")
): ReportNotifier {
  return {
    async deliver(report, text) {
      logger.info({ reportId: report.reportId, text }, "Holdings report");
    },
  };
}
