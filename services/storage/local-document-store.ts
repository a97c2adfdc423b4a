import { z } from "zod";
import * as fs from "node:fs/promises";
import path from "node:path";
import type { AggregateDocument, RawReceiptRecord } from "../shared-types";
import {
  MalformedDocumentError,
  type DocumentStore,
  type JsonDocument,
} from "./document-store";
import { parseAggregateDocument, receiptRecordsSchema } from "./document-schemas";
import { createTemporaryPath, describeIssuePath } from "./helpers";
import { logger } from "../../utils/logger";

export const localDocumentStoreOptionsSchema = z.object({
  directory: z.string().nonempty(),
});

export type DocumentFileSystem = Pick<typeof fs, "open" | "rename" | "rm" | "mkdir">;

export class LocalDocumentStore implements DocumentStore {
  #directory: string;
  #fs: DocumentFileSystem;

  constructor(
    options: z.input<typeof localDocumentStoreOptionsSchema>,
    fileSystem: DocumentFileSystem = fs
  ) {
    const parsed = localDocumentStoreOptionsSchema.parse(options);
    this.#directory = path.resolve(parsed.directory);
    this.#fs = fileSystem;
  }

  resolve(name: string): string {
    return path.resolve(this.#directory, name);
  }

  async loadRecords(source: string): Promise<RawReceiptRecord[]> {
    const { filePath, value } = await this.#readJson(source);
    const result = receiptRecordsSchema.safeParse(value);

    if (!result.success) {
      const [issue] = result.error.issues;
      throw new MalformedDocumentError(
        filePath,
        issue.path.length
          ? `${describeIssuePath(issue.path)} is not an object`
          : issue.message
      );
    }

    logger.debug("Loaded receipt records", { filePath, count: result.data.length });
    return result.data;
  }

  async loadAggregate(source: string): Promise<AggregateDocument> {
    const { filePath, value } = await this.#readJson(source);
    const result = parseAggregateDocument(value);

    if (!result.success) {
      const [issue] = result.error.issues;
      throw new MalformedDocumentError(
        filePath,
        issue.path.length
          ? `${describeIssuePath(issue.path)} is not a finite number`
          : issue.message
      );
    }

    return result.data;
  }

  async save(document: JsonDocument, destination: string): Promise<string> {
    const filePath = this.resolve(destination);
    const contents = `${JSON.stringify(document, null, 2)}\n`;

    await this.#fs.mkdir(path.dirname(filePath), { recursive: true });

    const temporaryPath = createTemporaryPath(filePath);
    try {
      const handle = await this.#fs.open(temporaryPath, "w");
      try {
        await handle.writeFile(contents, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await this.#fs.rename(temporaryPath, filePath);
    } catch (err) {
      logger.error(`Failed to write ${filePath}:`, err);
      await this.#fs.rm(temporaryPath, { force: true });
      throw err;
    }

    logger.debug("Saved document", { filePath });
    return filePath;
  }

  async #readJson(source: string): Promise<{ filePath: string; value: unknown }> {
    const filePath = this.resolve(source);
    const handle = await this.#fs.open(filePath, "r");

    let text: string;
    try {
      text = await handle.readFile("utf8");
    } finally {
      await handle.close();
    }

    try {
      const value: unknown = JSON.parse(text);
      return { filePath, value };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MalformedDocumentError(filePath, `not valid JSON (${reason})`);
    }
  }
}
