import { z } from "zod";

export const receiptRecordsSchema = z.array(z.record(z.unknown()), {
  invalid_type_error: "expected an array of receipt records",
});

export const aggregateDocumentSchema = z.record(z.number().finite(), {
  invalid_type_error: "expected an object of company totals",
});

const isTotalEntry = (entry: [string, unknown]): entry is [string, number] =>
  typeof entry[1] === "number";

/**
 * `z.record` leaves out an own "__proto__" key, which is still a company
 * name. Once the document validates, the totals are copied from the input's
 * own entries instead.
 */
export function parseAggregateDocument(value: unknown) {
  const result = aggregateDocumentSchema.safeParse(value);
  if (!result.success || typeof value !== "object" || value === null) {
    return result;
  }

  return {
    success: true as const,
    data: Object.fromEntries(Object.entries(value).filter(isTotalEntry)),
  };
}
