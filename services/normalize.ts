import type { NormalizedRecord, RawReceiptRecord } from "./shared-types";

// First number in the string, e.g. "100" in "Rs.100" or "12.50" in "12.50."
// A leading "." only starts a number when it does not close an abbreviation.
const AMOUNT_PATTERN = /-?(?:\d+(?:\.\d+)?|(?<![A-Za-z.])\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * Coerces an extracted amount to a finite number. Strings may carry
 * currency symbols, codes and thousands separators; "(12.00)" is read as a
 * refund of 12. Anything that does not parse becomes 0.
 */
export function parseAmount(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string") {
    return 0;
  }

  const trimmed = value.trim();
  if (!trimmed) return 0;

  const parenNegative = /^\(.*\)$/.test(trimmed);
  const match = AMOUNT_PATTERN.exec(trimmed.replace(/,/g, ""));
  if (!match) return 0;

  const parsed = Number(match[0]);
  if (!Number.isFinite(parsed)) return 0;

  return parenNegative ? -Math.abs(parsed) : parsed;
}

export function normalizeCompanyName(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function normalizeRecord(raw: RawReceiptRecord): NormalizedRecord {
  return {
    company_name: normalizeCompanyName(raw.company_name),
    total_amount: parseAmount(raw.total_amount),
  };
}

export const normalizeRecords = (raws: readonly RawReceiptRecord[]): NormalizedRecord[] =>
  raws.map(normalizeRecord);
