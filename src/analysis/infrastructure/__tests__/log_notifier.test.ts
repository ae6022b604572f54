import pino from "pino";

import { combineResults } from "@src/analysis/business/aggregator";
import { createLogNotifier } from "@src/analysis/infrastructure/log_notifier";
import { accepted } from "../../__tests__/support/results";

test("log notifier writes the rendered text with the report id", async () => {
  const lines: string[] = [];
  const logger = pino(
    { messageKey: "message" },
    { write: (line: string) => lines.push(line) }
  );
  const report = combineResults([accepted("AAA")], {
    mode: "per_entity",
    confidenceThreshold: 0.5,
    reportId: "REPORT#1#ABC",
  });

  await createLogNotifier(logger).deliver(report, "Holdings analysis");

  expect(lines).toHaveLength(1);
  expect(JSON.parse(lines[0])).toMatchObject({
    message: "Holdings report",
    reportId: "REPORT#1#ABC",
    text: "Holdings analysis",
  });
});
