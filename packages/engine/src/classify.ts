/**
 * @gst-recalc/engine — Tax row classification.
 *
 * Rows are recognised by substring on their label, case-insensitively.
 * Order matters: "cgst" is tested before "sgst" so that a label can
 * only ever land in one kind.
 */

import type { TaxKind, TaxRow } from "@gst-recalc/types";

const MATCHERS: readonly { readonly kind: TaxKind; readonly needles: readonly string[] }[] = [
  { kind: "central", needles: ["cgst"] },
  { kind: "state", needles: ["sgst", "utgst"] },
  { kind: "integrated", needles: ["igst"] },
];

/**
 * The lower-cased label a row is classified by:
 * `gstTaxType`, or `accountHead` when the tag is absent or empty.
 */
export function taxRowLabel(row: TaxRow): string {
  const tag = row.gstTaxType ?? "";
  const label = tag !== "" ? tag : (row.accountHead ?? "");
  return label.toLowerCase();
}

/**
 * Classify a label. First match wins.
 *
 * "Output Tax CGST - K" → "central"
 * "utgst"               → "state"
 * "Freight"             → "unrecognized"
 */
export function classifyTaxLabel(label: string): TaxKind {
  const lowered = label.toLowerCase();
  for (const { kind, needles } of MATCHERS) {
    if (needles.some((needle) => lowered.includes(needle))) {
      return kind;
    }
  }
  return "unrecognized";
}

export function classifyTaxRow(row: TaxRow): TaxKind {
  return classifyTaxLabel(taxRowLabel(row));
}
