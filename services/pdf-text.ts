import { mkdir, readdir, readFile } from "node:fs/promises";
import { logger } from "../utils/logger";

export interface PdfSource {
  listPdfFiles(directory: string): Promise<string[]>;
  readText(filePath: string): Promise<string>;
}

/** Names of the `.pdf` files directly inside `directory`, sorted. Creates the directory if needed. */
export async function listPdfFiles(directory: string): Promise<string[]> {
  await mkdir(directory, { recursive: true });
  const entries = await readdir(directory, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".pdf"))
    .map((entry) => entry.name)
    .sort();
}

export async function extractPdfText(data: Buffer): Promise<string> {
  // Loaded on first use
  const { default: pdfParse } = await import("pdf-parse");
  const result = await pdfParse(data);
  logger.debug("Extracted PDF text", { pages: result.numpages, length: result.text.length });
  return result.text.trim();
}

export async function readPdfText(filePath: string): Promise<string> {
  const data = await readFile(filePath);
  return extractPdfText(data);
}

export const localPdfSource: PdfSource = {
  listPdfFiles,
  readText: readPdfText,
};
