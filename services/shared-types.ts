/** A record as produced by the extraction step. Nothing about its shape is guaranteed. */
export type RawReceiptRecord = Record<string, unknown>;

export interface NormalizedRecord {
  company_name: string;
  total_amount: number;
}

export type AggregateMap = Map<string, number>;

/** JSON form of an {@link AggregateMap}: company name to total. */
export type AggregateDocument = Record<string, number>;

export interface ReceiptFailure {
  file: string;
  reason: string;
}
