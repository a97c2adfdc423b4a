import type {
  AggregateDocument,
  NormalizedRecord,
  RawReceiptRecord,
} from "../shared-types";

export type JsonDocument =
  | AggregateDocument
  | readonly RawReceiptRecord[]
  | readonly NormalizedRecord[];

export interface DocumentStore {
  /** Reads a JSON array of objects. Rejects with `MalformedDocumentError` on any other shape. */
  loadRecords(source: string): Promise<RawReceiptRecord[]>;
  loadAggregate(source: string): Promise<AggregateDocument>;
  /** Atomically replaces `destination`. Resolves to the absolute path written. */
  save(document: JsonDocument, destination: string): Promise<string>;
}

export class MalformedDocumentError extends Error {
  readonly source: string;
  readonly reason: string;

  constructor(source: string, reason: string) {
    super(`Malformed document ${source}: ${reason}`);
    this.name = "MalformedDocumentError";
    this.source = source;
    this.reason = reason;
  }
}
