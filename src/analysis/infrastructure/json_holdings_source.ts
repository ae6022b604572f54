import { readFile } from "fs/promises";
import { z } from "zod";

import type { Holding } from "../domain/types";
import type { HoldingsSource } from "../types/contracts";

const numeric = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite()
);

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : undefined));

const HoldingRecordSchema = z
  .object({
    symbol: z.string().trim().min(1),
    company_name: optionalText,
    companyName: optionalText,
    quantity: numeric,
    price: numeric,
    value: numeric.optional(),
    sector: optionalText,
    exchange: optionalText,
    previous_price: numeric.nullish(),
    previousPrice: numeric.nullish(),
  })
  .transform(
    (r): Holding => ({
      symbol: r.symbol.toUpperCase(),
      companyName: r.companyName ?? r.company_name,
      quantity: r.quantity,
      price: r.price,
      value: r.value ?? r.quantity * r.price,
      sector: r.sector,
      exchange: r.exchange,
      previousPrice: r.previousPrice ?? r.previous_price ?? undefined,
    })
  );

const HoldingsFileSchema = z.preprocess(
  (input) =>
    typeof input === "object" &&
    input !== null &&
    !Array.isArray(input) &&
    "holdings" in input
      ? input.holdings
      : input,
  z.array(HoldingRecordSchema)
);

export function parseHoldings(input: unknown): Holding[] {
  const parsed = HoldingsFileSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.length ? first.path.join(".") : "root";
    throw new Error(
      `Invalid holdings file at ${where}: ${first?.message ?? "unknown error"}`
    );
  }
  return parsed.data;
}

/**
 * Holdings from a JSON file: either an array or `{ holdings: [...] }`.
 * `value` defaults to quantity × price.
 */
export function createJsonHoldingsSource(params: {
  filePath: string;
}): HoldingsSource {
  return {
    async loadHoldings() {
      const raw = await readFile(params.filePath, "utf8");
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (error) {
        throw new Error(`Holdings file ${params.filePath} is not valid JSON`, {
          cause: error,
        });
      }
      return parseHoldings(json);
    },
  };
}
