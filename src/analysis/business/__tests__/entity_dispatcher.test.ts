import { createEntityDispatcher } from "@src/analysis/business/entity_dispatcher";
import { createRetryController } from "@src/analysis/business/retry_controller";
import type {
  AnalysisFailure,
  AnalysisResult,
  DispatchMode,
} from "@src/analysis/domain/types";
import { isAccepted } from "@src/analysis/domain/types";
import { AggregationError } from "@src/analysis/errors";
import {
  ScriptedLlm,
  analysis,
  bySymbol,
  delayed,
  hangUntilAborted,
  holding,
  validReply,
} from "../../__tests__/support/fake_llm";
import { accepted, exhausted } from "../../__tests__/support/results";

function dispatcherFor(
  llm: ScriptedLlm,
  config: { concurrency?: number; deadlineMs?: number; maxRetries?: number } = {}
) {
  const controller = createRetryController({
    llm,
    config: { maxRetries: config.maxRetries ?? 3, temperature: 0.5 },
  });
  return createEntityDispatcher({
    controller,
    config: { concurrency: config.concurrency ?? 5, deadlineMs: config.deadlineMs },
  });
}

function failure(result: AnalysisResult): AnalysisFailure | undefined {
  return isAccepted(result) ? undefined : result.failure;
}

const symbols = ["AAA", "BBB", "CCC", "DDD", "EEE"];
const PER_ENTITY: DispatchMode = "per_entity";

describe("EntityDispatcher per entity", () => {
  test("returns results in input order whatever the completion order", async () => {
    const llm = bySymbol({
      AAA: [delayed(30, validReply())],
      BBB: [delayed(1, validReply())],
      CCC: [delayed(15, validReply())],
    });
    const results = await dispatcherFor(llm).runAll(
      ["AAA", "BBB", "CCC"].map((s) => holding(s)),
      PER_ENTITY
    );
    expect(results.map((r) => r.symbol)).toEqual(["AAA", "BBB", "CCC"]);
    expect(results.every(isAccepted)).toBe(true);
  });

  test("isolates entities whose responses never validate", async () => {
    const llm = bySymbol({
      BBB: ["no json at all"],
      DDD: ['{"recommendation": "BUY"}'],
    });
    const results = await dispatcherFor(llm).runAll(
      symbols.map((s) => holding(s)),
      PER_ENTITY
    );

    expect(results.map((r) => r.status)).toEqual([
      "ACCEPTED",
      "EXHAUSTED",
      "ACCEPTED",
      "EXHAUSTED",
      "ACCEPTED",
    ]);
    expect(llm.callsFor("BBB")).toHaveLength(4);
    expect(llm.callsFor("AAA")).toHaveLength(1);
    expect(failure(results[1])).toEqual({
      code: "RETRIES_EXHAUSTED",
      error: "Validation failed after 4 attempts",
      missing_fields: ["entire payload"],
    });
    expect(failure(results[3])?.missing_fields).toEqual([
      "estimated_return",
      "confidence",
      "risk_notes",
      "sources",
    ]);
    expect(results[3].attempts).toBe(4);
  });

  test("marks an entity whose model call fails without affecting the others", async () => {
    const llm = bySymbol({ BBB: [new Error("upstream timeout")] });
    const results = await dispatcherFor(llm).runAll(
      ["AAA", "BBB", "CCC"].map((s) => holding(s)),
      PER_ENTITY
    );

    expect(results.map((r) => r.status)).toEqual([
      "ACCEPTED",
      "LLM_ERROR",
      "ACCEPTED",
    ]);
    expect(failure(results[1])).toEqual({
      code: "LLM_INVOCATION_ERROR",
      error: "LLM invocation failed: upstream timeout",
      missing_fields: [],
    });
    expect(results[1].attempts).toBe(1);
  });

  test("times out entities still running at the deadline", async () => {
    const llm = bySymbol({ BBB: [hangUntilAborted()] });
    const results = await dispatcherFor(llm, { deadlineMs: 50 }).runAll(
      ["AAA", "BBB"].map((s) => holding(s)),
      PER_ENTITY
    );

    expect(results[0].status).toBe("ACCEPTED");
    expect(results[1].status).toBe("TIMED_OUT");
    expect(failure(results[1])).toEqual({
      code: "TIMEOUT",
      error: "Analysis deadline exceeded",
      missing_fields: [],
    });
  });

  test("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const llm = new ScriptedLlm(() => async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return validReply();
    });
    const results = await dispatcherFor(llm, { concurrency: 2 }).runAll(
      symbols.map((s) => holding(s)),
      PER_ENTITY
    );

    expect(results).toHaveLength(5);
    expect(peak).toBe(2);
  });

  test("marks every entity timed out when the caller already aborted", async () => {
    const llm = new ScriptedLlm(() => validReply());
    const controller = new AbortController();
    controller.abort();
    const results = await dispatcherFor(llm).runAll(
      ["AAA", "BBB"].map((s) => holding(s)),
      PER_ENTITY,
      { signal: controller.signal }
    );

    expect(results.map((r) => r.status)).toEqual(["TIMED_OUT", "TIMED_OUT"]);
    expect(llm.calls).toHaveLength(0);
  });

  test("returns nothing for an empty portfolio", async () => {
    const llm = new ScriptedLlm(() => validReply());
    await expect(dispatcherFor(llm).runAll([], PER_ENTITY)).resolves.toEqual([]);
    expect(llm.calls).toHaveLength(0);
  });

  test("rejects duplicate symbols", async () => {
    const llm = new ScriptedLlm(() => validReply());
    await expect(
      dispatcherFor(llm).runAll([holding("AAA"), holding("aaa")], PER_ENTITY)
    ).rejects.toBeInstanceOf(AggregationError);
  });
});

describe("EntityDispatcher whole portfolio", () => {
  function portfolioReply(entries: Array<{ symbol: string; confidence?: number }>) {
    return JSON.stringify({
      holdings: entries.map(({ symbol, confidence }) => ({
        symbol,
        ...analysis(confidence === undefined ? {} : { confidence }),
      })),
    });
  }

  test("splits one response back into per-holding results", async () => {
    const llm = new ScriptedLlm(() =>
      portfolioReply([{ symbol: "bbb", confidence: 1.5 }, { symbol: "AAA" }])
    );
    const results = await dispatcherFor(llm).runAll(
      [holding("AAA"), holding("BBB")],
      "whole_portfolio"
    );

    expect(llm.calls).toHaveLength(1);
    expect(results.map((r) => r.symbol)).toEqual(["AAA", "BBB"]);
    expect(results.every(isAccepted)).toBe(true);
    const [first, second] = results;
    if (isAccepted(first) && isAccepted(second)) {
      expect(first.analysis).toEqual(analysis());
      expect(second.analysis.confidence).toBe(1);
      expect(second.clampedFields).toEqual(["confidence"]);
      expect(first.clampedFields).toEqual([]);
    }
  });

  test("asks again when a holding is missing from the response", async () => {
    const llm = new ScriptedLlm((_prompt, call) =>
      call === 1
        ? portfolioReply([{ symbol: "AAA" }])
        : portfolioReply([{ symbol: "AAA" }, { symbol: "BBB" }])
    );
    const results = await dispatcherFor(llm).runAll(
      [holding("AAA"), holding("BBB")],
      "whole_portfolio"
    );

    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1].prompt).toContain("- holdings[BBB]: no entry for BBB");
    expect(results.map((r) => r.attempts)).toEqual([2, 2]);
  });

  test("shares an exhausted failure across every holding", async () => {
    const llm = new ScriptedLlm(() => "nothing useful");
    const results = await dispatcherFor(llm, { maxRetries: 1 }).runAll(
      [holding("AAA"), holding("BBB")],
      "whole_portfolio"
    );

    expect(llm.calls).toHaveLength(2);
    expect(results.map((r) => r.status)).toEqual(["EXHAUSTED", "EXHAUSTED"]);
    expect(failure(results[0])).toEqual({
      code: "RETRIES_EXHAUSTED",
      error: "Validation failed after 2 attempts",
      missing_fields: ["entire payload"],
    });
  });

  test("shares an invocation failure across every holding", async () => {
    const llm = new ScriptedLlm(() => new Error("rate limited"));
    const results = await dispatcherFor(llm).runAll(
      [holding("AAA"), holding("BBB")],
      "whole_portfolio"
    );
    expect(results.map((r) => r.status)).toEqual(["LLM_ERROR", "LLM_ERROR"]);
  });
});

describe("EntityDispatcher follow-ups", () => {
  const question = "How exposed is AAA to rates?";
  const answer = "Mostly through its floating-rate debt.";

  function pending(): AnalysisResult[] {
    return [
      accepted("AAA", { follow_up_question: question, confidence: 0.6 }),
      exhausted("BBB", ["confidence"]),
      accepted("CCC"),
    ];
  }

  test("consolidates only accepted results that carry a question", async () => {
    const results = pending();
    const llm = new ScriptedLlm(() =>
      validReply({ confidence: 0.9, follow_up_answer: answer })
    );
    const resolved = await dispatcherFor(llm).runFollowUps(results);

    expect(llm.calls.map((c) => c.symbol)).toEqual(["AAA"]);
    expect(llm.calls[0].prompt).toContain(`Follow-up question:\n${question}`);
    expect(resolved.map((r) => r.symbol)).toEqual(["AAA", "BBB", "CCC"]);
    expect(resolved[1]).toBe(results[1]);
    expect(resolved[2]).toBe(results[2]);

    const [first] = resolved;
    expect(isAccepted(first)).toBe(true);
    if (isAccepted(first)) {
      expect(first.analysis.confidence).toBe(0.9);
      expect(first.analysis.follow_up_answer).toBe(answer);
      expect(first.analysis.follow_up_question).toBeUndefined();
      expect(first.followUp).toEqual({ question, answer, attempts: 1 });
      expect(first.attempts).toBe(1);
    }
  });

  test("corrects an invalid follow-up reply like any other run", async () => {
    const llm = new ScriptedLlm((_prompt, call) =>
      call === 1
        ? '{"recommendation": "HOLD"}'
        : validReply({ follow_up_answer: answer })
    );
    const [first] = await dispatcherFor(llm).runFollowUps(pending());

    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1].prompt).toContain("Follow-up question:");
    expect(isAccepted(first) && first.followUp?.attempts).toBe(2);
  });

  test("keeps the original result when the follow-up is exhausted", async () => {
    const results = pending();
    const llm = new ScriptedLlm(() => "no json at all");
    const resolved = await dispatcherFor(llm, { maxRetries: 1 }).runFollowUps(
      results
    );

    expect(llm.calls).toHaveLength(2);
    expect(resolved[0]).toBe(results[0]);
  });

  test("keeps the original result when the model call fails", async () => {
    const results = pending();
    const llm = new ScriptedLlm(() => new Error("rate limited"));
    const resolved = await dispatcherFor(llm).runFollowUps(results);

    expect(resolved).toEqual(results);
    expect(resolved[0]).toBe(results[0]);
  });

  test("keeps the original result when the deadline passes", async () => {
    const results = pending();
    const llm = new ScriptedLlm(() => hangUntilAborted());
    const resolved = await dispatcherFor(llm, { deadlineMs: 20 }).runFollowUps(
      results
    );
    expect(resolved[0]).toBe(results[0]);
  });

  test("makes no calls when no question was raised", async () => {
    const results = [accepted("AAA"), exhausted("BBB", ["confidence"])];
    const llm = new ScriptedLlm(() => validReply());
    const resolved = await dispatcherFor(llm).runFollowUps(results);

    expect(llm.calls).toHaveLength(0);
    expect(resolved).toEqual(results);
    expect(resolved).not.toBe(results);
  });
});
