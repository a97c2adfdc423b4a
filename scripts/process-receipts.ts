#!/usr/bin/env node
/*
 * Batch run over a directory of PDF receipts.
 * Usage:
 *   process-receipts [receiptsDirectory]
 *
 * Writes the extracted records and the per-company totals to OUTPUT_DIRECTORY,
 * then prints a spending summary.
 */
import "dotenv/config";
import { loadEnv } from "../utils/env-vars";
import { logger } from "../utils/logger";
import { createReceiptExtractor } from "../services/gen-ai";
import { localPdfSource } from "../services/pdf-text";
import { processReceipts } from "../services/receipt";
import { buildSpendingSummary } from "../services/report";
import { getDocumentStore } from "../services/storage";

async function main() {
  const env = loadEnv();
  const directory = process.argv[2] || env.RECEIPTS_DIRECTORY;
  const store = getDocumentStore(env);

  const result = await processReceipts(
    directory,
    {
      pdfSource: localPdfSource,
      extractor: createReceiptExtractor(env),
      store,
    },
    {
      extractedFileName: env.EXTRACTED_FILE_NAME,
      aggregatedFileName: env.AGGREGATED_FILE_NAME,
    }
  );

  console.log("\nExtracted records:");
  console.log(JSON.stringify(result.extracted, null, 2));

  for (const failure of result.failures) {
    console.log(`[skip] ${failure.file}: ${failure.reason}`);
  }

  const aggregate = await store.loadAggregate(env.AGGREGATED_FILE_NAME);
  const { lines } = buildSpendingSummary(aggregate);
  console.log("\nSpending summary:");
  console.log("-".repeat(30));
  for (const line of lines) {
    console.log(line);
  }
}

main().catch((err: unknown) => {
  logger.error("Error processing receipts:", err);
  console.error("\nTroubleshooting:");
  console.error("1. Make sure GEMINI_API_KEY is set and valid");
  console.error("2. Check that PDF files exist in the receipts directory");
  console.error("3. Ensure all dependencies are installed");
  process.exitCode = 1;
});
