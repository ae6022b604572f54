import type {
  AnalysisContext,
  FieldIssue,
  Holding,
  MarketFacts,
} from "../domain/types";
import {
  FOLLOW_UP_ANALYSIS_EXAMPLE,
  HOLDING_ANALYSIS_EXAMPLE,
  PORTFOLIO_ANALYSIS_EXAMPLE,
} from "../prompts/schema";
import { priceVariationPercent } from "./holdings_filter";

export const MAX_PREVIOUS_OUTPUT_CHARS = 4000;

const UNSPECIFIED = "N/A";

function buildRole(): string {
  return [
    "You are a senior equity research analyst.",
    "Recommend whether to BUY more, SELL, or RETAIN each holding, with an estimated 1-year return and the key risks.",
  ].join("\n");
}

function buildFollowUpRole(): string {
  return [
    "You are a senior equity research analyst.",
    "You previously analysed this holding and now need to answer a follow-up question and consolidate the results.",
  ].join("\n");
}

function buildFollowUpInstructions(): string {
  return [
    "Instructions:",
    "1. Answer the follow-up question using the holding data and your original analysis.",
    "2. Consolidate the original analysis with any new insight from the answer.",
    "3. Update confidence if the answer changes your assessment.",
    "4. Put the answer in follow_up_answer; leave follow_up_question empty unless a deeper question emerges.",
  ].join("\n");
}

function exampleFor(context: AnalysisContext): object {
  switch (context.kind) {
    case "portfolio":
      return PORTFOLIO_ANALYSIS_EXAMPLE;
    case "follow_up":
      return FOLLOW_UP_ANALYSIS_EXAMPLE;
    case "holding":
      return HOLDING_ANALYSIS_EXAMPLE;
  }
}

function buildRules(context: AnalysisContext): string {
  const example = exampleFor(context);
  const rules = [
    "Respond with a single JSON object and no other text, in this format:",
    JSON.stringify(example, null, 2),
    "Rules:",
    "- recommendation must be one of BUY, SELL, RETAIN.",
    "- confidence must be a number between 0.0 and 1.0.",
    "- estimated_return is a number (percent) or null when unknown.",
    "- sources is a list of strings.",
  ];
  if (context.kind === "portfolio") {
    rules.push(
      "- include exactly one entry in holdings for every symbol listed above."
    );
  }
  return rules.join("\n");
}

export function buildInitialPrompt(context: AnalysisContext): string {
  if (context.kind === "follow_up") return buildFollowUpPrompt(context);
  const body =
    context.kind === "portfolio"
      ? formatPortfolio(context.holdings)
      : formatHolding(context.holding);
  return [
    buildRole(),
    "",
    body,
    ...formatFacts(context.facts),
    "",
    buildRules(context),
  ].join("\n");
}

/**
 * Second-pass prompt: the accepted analysis plus its follow-up question,
 * asking for one consolidated analysis in the same shape.
 */
export function buildFollowUpPrompt(
  context: Extract<AnalysisContext, { kind: "follow_up" }>
): string {
  return [
    buildFollowUpRole(),
    "",
    "Original analysis:",
    JSON.stringify(context.original, null, 2),
    "",
    "Follow-up question:",
    context.question,
    "",
    formatHolding(context.holding),
    ...formatFacts(context.facts),
    "",
    buildFollowUpInstructions(),
    "",
    buildRules(context),
  ].join("\n");
}

/**
 * Self-correction prompt. Names exactly the fields that failed, in the order
 * the validator reported them, then repeats the original task.
 */
export function buildCorrectivePrompt(
  context: AnalysisContext,
  previousOutput: string,
  issues: readonly FieldIssue[]
): string {
  return [
    "Your previous response could not be used. These fields were missing or invalid:",
    ...issues.map((issue) => `- ${issue.field}: ${issue.detail}`),
    "",
    "Previous response:",
    "<<<",
    truncate(previousOutput, MAX_PREVIOUS_OUTPUT_CHARS),
    ">>>",
    "",
    "Fix every field listed above and return the complete analysis again.",
    "",
    buildInitialPrompt(context),
  ].join("\n");
}

function formatHolding(holding: Holding): string {
  const lines = [
    "Holding:",
    `Symbol: ${holding.symbol}`,
    `Company: ${holding.companyName || UNSPECIFIED}`,
    `Sector: ${holding.sector || UNSPECIFIED}`,
    `Quantity: ${holding.quantity}`,
    `Price: ${formatAmount(holding.price)}`,
    `Value: ${formatAmount(holding.value)}`,
  ];
  const change = priceVariationPercent(holding);
  if (holding.previousPrice !== undefined && change !== undefined) {
    lines.push(`Previous price: ${formatAmount(holding.previousPrice)}`);
    lines.push(`Price change: ${formatSigned(change)}%`);
  }
  return lines.join("\n");
}

function formatPortfolio(holdings: Holding[]): string {
  const total = holdings.reduce((sum, h) => sum + h.value, 0);
  const average = holdings.length > 0 ? total / holdings.length : 0;

  const sectors = new Map<string, { count: number; value: number }>();
  for (const h of holdings) {
    const sector = h.sector?.trim() || "Uncategorized";
    const entry = sectors.get(sector) ?? { count: 0, value: 0 };
    entry.count += 1;
    entry.value += h.value;
    sectors.set(sector, entry);
  }

  const lines = [
    "Portfolio summary:",
    `Total holdings: ${holdings.length}`,
    `Total value: ${formatAmount(total)}`,
    `Average holding value: ${formatAmount(average)}`,
    "",
    "Sector breakdown:",
  ];
  const bySectorValue = [...sectors.entries()].sort(
    (a, b) => b[1].value - a[1].value
  );
  for (const [sector, { count, value }] of bySectorValue) {
    const pct = total > 0 ? (value / total) * 100 : 0;
    lines.push(
      `- ${sector}: ${count} holdings, ${formatAmount(value)} (${pct.toFixed(1)}%)`
    );
  }

  lines.push("", "Holdings:");
  const byValue = [...holdings].sort((a, b) => b.value - a.value);
  byValue.forEach((h, i) => {
    lines.push(
      `${i + 1}. ${h.symbol} - ${h.companyName || UNSPECIFIED} | quantity ${h.quantity} | price ${formatAmount(h.price)} | value ${formatAmount(h.value)} | sector ${h.sector || UNSPECIFIED}`
    );
  });
  return lines.join("\n");
}

function formatFacts(facts: MarketFacts | undefined): string[] {
  if (!facts) return [];
  const lines = ["", `Market context as of ${facts.asOfDate}:`];
  for (const index of facts.indices ?? []) {
    const change =
      index.changePercent === undefined
        ? ""
        : ` (${formatSigned(index.changePercent)}%)`;
    lines.push(`- ${index.name}: ${formatAmount(index.level)}${change}`);
  }
  for (const note of facts.notes ?? []) {
    lines.push(`- ${note}`);
  }
  return lines;
}

function formatAmount(value: number): string {
  return value.toFixed(2);
}

function formatSigned(value: number): string {
  const fixed = value.toFixed(2);
  return value > 0 ? `+${fixed}` : fixed;
}

function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max)}\n...[truncated ${text.length - max} characters]`;
}
