import type {
  AggregateDocument,
  AggregateMap,
  NormalizedRecord,
} from "./shared-types";

/**
 * Sums `total_amount` per exact `company_name`. Keys keep the order in which
 * each company was first seen.
 */
export function aggregateTotals(records: Iterable<NormalizedRecord>): AggregateMap {
  const totals: AggregateMap = new Map();

  for (const { company_name, total_amount } of records) {
    totals.set(company_name, (totals.get(company_name) ?? 0) + total_amount);
  }

  return totals;
}

// Integer-like company names are listed first by JSON.stringify, as with any object key.
export const toAggregateDocument = (totals: AggregateMap): AggregateDocument =>
  Object.fromEntries(totals);

export function sumAggregate(totals: AggregateMap | AggregateDocument): number {
  const values = totals instanceof Map ? [...totals.values()] : Object.values(totals);
  return values.reduce((sum, value) => sum + value, 0);
}
