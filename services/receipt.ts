import path from "node:path";
import type {
  AggregateDocument,
  NormalizedRecord,
  RawReceiptRecord,
  ReceiptFailure,
} from "./shared-types";
import type { ReceiptFieldExtractor } from "./gen-ai";
import type { PdfSource } from "./pdf-text";
import type { DocumentStore } from "./storage";
import { normalizeRecords } from "./normalize";
import { aggregateTotals, toAggregateDocument } from "./aggregate";
import { logger } from "../utils/logger";

export type ReceiptProgressHandler = (event: string, data?: unknown) => void | Promise<void>;

export interface ReceiptPipelineDependencies {
  pdfSource: PdfSource;
  extractor: ReceiptFieldExtractor;
  store: DocumentStore;
}

export interface ReceiptPipelineOptions {
  extractedFileName?: string;
  aggregatedFileName?: string;
}

export interface ReceiptPipelineResult {
  extracted: RawReceiptRecord[];
  records: NormalizedRecord[];
  aggregate: AggregateDocument;
  failures: ReceiptFailure[];
  extractedPath: string;
  aggregatedPath: string;
}

export class ReceiptExtractionError extends Error {
  constructor(fileName: string) {
    super(`No extractable text in ${fileName}`);
    this.name = "ReceiptExtractionError";
  }
}

export const extractReceipt = async (
  filePath: string,
  { pdfSource, extractor }: Pick<ReceiptPipelineDependencies, "pdfSource" | "extractor">
): Promise<RawReceiptRecord> => {
  const fileName = path.basename(filePath);
  const text = await pdfSource.readText(filePath);
  if (!text) {
    throw new ReceiptExtractionError(fileName);
  }
  return extractor.extractFields(text, fileName);
};

/**
 * Extracts every PDF receipt in `directory`, stores the raw records, then
 * reads them back and stores the per-company totals. A receipt that fails
 * is reported in `failures` and does not stop the run.
 */
export const processReceipts = async (
  directory: string,
  dependencies: ReceiptPipelineDependencies,
  options: ReceiptPipelineOptions = {},
  onProgress?: ReceiptProgressHandler
): Promise<ReceiptPipelineResult> => {
  const {
    extractedFileName = "extracted_receipts.json",
    aggregatedFileName = "aggregated_receipts.json",
  } = options;
  const { pdfSource, store } = dependencies;

  logger.debug("processReceipts called", { directory, extractedFileName, aggregatedFileName });

  const files = await pdfSource.listPdfFiles(directory);
  logger.info(`Found ${files.length} PDF receipt(s) in ${directory}`);
  await onProgress?.("files-listed", files);

  const extracted: RawReceiptRecord[] = [];
  const failures: ReceiptFailure[] = [];

  for (const file of files) {
    try {
      const record = await extractReceipt(path.join(directory, file), dependencies);
      extracted.push(record);
      await onProgress?.("receipt-extracted", { file, record });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to extract ${file}:`, err);
      failures.push({ file, reason });
      await onProgress?.("receipt-failed", { file, reason });
    }
  }

  const extractedPath = await store.save(extracted, extractedFileName);
  logger.info(`Saved ${extracted.length} extracted receipt(s) to ${extractedPath}`);
  await onProgress?.("records-saved", extractedPath);

  const records = normalizeRecords(await store.loadRecords(extractedFileName));
  const aggregate = toAggregateDocument(aggregateTotals(records));

  const aggregatedPath = await store.save(aggregate, aggregatedFileName);
  logger.info(`Saved totals for ${Object.keys(aggregate).length} company(ies) to ${aggregatedPath}`);
  await onProgress?.("aggregate-saved", aggregatedPath);

  logger.debug("processReceipts completed", { failures });
  return { extracted, records, aggregate, failures, extractedPath, aggregatedPath };
};
