import { Hono, type Context, type Next } from "hono";
import { basicAuth } from "hono/basic-auth";
import { logger as requestLogger } from "hono/logger";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { EnvVars } from "./utils/env-vars";
import { logger } from "./utils/logger";
import type { ReceiptFieldExtractor } from "./services/gen-ai";
import { normalizeRecord, normalizeRecords } from "./services/normalize";
import { aggregateTotals, toAggregateDocument } from "./services/aggregate";
import { receiptRecordsSchema } from "./services/storage/document-schemas";

export interface AppDependencies {
  env: Pick<EnvVars, "APP_API_KEY" | "APP_API_SECRET" | "MAX_FILE_SIZE">;
  extractor: ReceiptFieldExtractor | null;
  extractPdfText: (data: Buffer) => Promise<string>;
}

export function createApp({ env, extractor, extractPdfText }: AppDependencies) {
  const app = new Hono();

  app.use(requestLogger((message) => logger.info(message)));

  const requireAuth = async (c: Context, next: Next) => {
    if (!env.APP_API_KEY || !env.APP_API_SECRET) {
      await next();
      return;
    }

    await basicAuth({
      username: env.APP_API_KEY,
      password: env.APP_API_SECRET,
    })(c, next);
  };

  app.post(
    "/aggregate",
    requireAuth,
    zValidator("json", receiptRecordsSchema),
    (c) => {
      const records = normalizeRecords(c.req.valid("json"));
      const aggregate = toAggregateDocument(aggregateTotals(records));
      logger.info(`Aggregated ${records.length} receipt record(s)`);
      return c.json(aggregate, 200);
    }
  );

  app.post(
    "/parse-receipt",
    requireAuth,
    zValidator(
      "form",
      z.object({
        file: z
          .instanceof(File)
          .refine(
            (f) => f.size <= env.MAX_FILE_SIZE,
            `Max file size is ${env.MAX_FILE_SIZE / 1024 / 1024}MB`
          )
          .refine((f) => f.type === "application/pdf", "Only PDF receipts are supported"),
      })
    ),
    async (c) => {
      if (!extractor) {
        return c.json({ error: "Receipt extraction is not configured" }, 503);
      }

      const { file } = c.req.valid("form");
      try {
        const text = await extractPdfText(Buffer.from(await file.arrayBuffer()));
        if (!text) {
          return c.json({ error: "No extractable text" }, 422);
        }

        const raw = await extractor.extractFields(text, file.name);
        const record = normalizeRecord(raw);
        logger.info("Parsed receipt", file.name);
        return c.json({ raw, record }, 200);
      } catch (err) {
        logger.error("Error parsing receipt:", err);
        return c.json(
          { error: err instanceof Error ? err.message : "An unknown error occurred." },
          500
        );
      }
    }
  );

  app.get("/healthz", async (c) => {
    return c.text("OK", 200);
  });

  return app;
}
