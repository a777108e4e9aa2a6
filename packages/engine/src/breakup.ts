/**
 * @gst-recalc/engine — Item-wise tax breakup.
 *
 * One breakup per tax kind, keyed by item code, holding the [rate, amount]
 * pair each item contributed. Stored on the tax row as JSON text and read
 * back by print formats.
 */

import { z } from "zod";
import type { TaxDetailEntry, TaxDetailPair } from "@gst-recalc/types";
import { EngineError } from "./types.js";

const TaxDetailSchema: z.ZodType<Readonly<Record<string, TaxDetailPair>>> = z.record(
  z.string(),
  z.tuple([z.number(), z.number()]),
);

/**
 * Ordered builder for one tax kind's breakup.
 *
 * Entries keep the order items were first recorded. Recording an item
 * code again replaces its pair in place.
 */
export class TaxBreakup {
  private readonly _entries = new Map<string, TaxDetailEntry>();

  record(itemCode: string, rate: number, amount: number): void {
    this._entries.set(itemCode, { itemCode, rate, amount });
  }

  get size(): number {
    return this._entries.size;
  }

  entries(): readonly TaxDetailEntry[] {
    return [...this._entries.values()];
  }

  serialize(): string {
    return serializeItemWiseTaxDetail(this._entries.values());
  }
}

/**
 * Serialize entries to `{"code":[rate,amount],...}` in the given order.
 *
 * Written by hand because plain objects move integer-like keys
 * ("1001") ahead of the rest.
 */
export function serializeItemWiseTaxDetail(entries: Iterable<TaxDetailEntry>): string {
  const parts: string[] = [];
  for (const { itemCode, rate, amount } of entries) {
    const pair: TaxDetailPair = [rate, amount];
    parts.push(`${JSON.stringify(itemCode)}:${JSON.stringify(pair)}`);
  }
  return `{${parts.join(",")}}`;
}

/**
 * Parse an item-wise tax detail back into entries.
 *
 * Entry order is that of `JSON.parse`: integer-like item codes first,
 * ascending, then the rest in text order.
 *
 * @throws {EngineError} INVALID_TAX_DETAIL on malformed text
 */
export function parseItemWiseTaxDetail(text: string): readonly TaxDetailEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EngineError("INVALID_TAX_DETAIL", `Item-wise tax detail is not JSON: ${reason}`);
  }

  const result = TaxDetailSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new EngineError(
      "INVALID_TAX_DETAIL",
      `Item-wise tax detail must map item codes to [rate, amount]${where}`,
    );
  }

  return Object.entries(result.data).map(([itemCode, [rate, amount]]) => ({
    itemCode,
    rate,
    amount,
  }));
}
