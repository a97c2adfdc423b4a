import type { AggregateDocument } from "./shared-types";
import { sumAggregate } from "./aggregate";

export const UNKNOWN_COMPANY_LABEL = "(unknown company)";

const formatAmount = (amount: number) => `$${amount.toFixed(2)}`;

export function buildSpendingSummary(document: AggregateDocument): {
  lines: string[];
  total: number;
} {
  const lines = Object.entries(document).map(
    ([company, amount]) => `${company || UNKNOWN_COMPANY_LABEL}: ${formatAmount(amount)}`
  );
  const total = sumAggregate(document);
  lines.push(`Total Spending: ${formatAmount(total)}`);

  return { lines, total };
}
