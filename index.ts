import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadEnv } from "./utils/env-vars";
import { logger } from "./utils/logger";
import { createReceiptExtractor } from "./services/gen-ai";
import { extractPdfText } from "./services/pdf-text";

const env = loadEnv();

const extractor = env.GEMINI_API_KEY ? createReceiptExtractor(env) : null;
if (!extractor) {
  logger.warn("GEMINI_API_KEY is not set. /parse-receipt will respond with 503.");
}

const app = createApp({ env, extractor, extractPdfText });

serve({ fetch: app.fetch, port: env.APP_PORT }, (info) => {
  logger.info(`Listening on http://localhost:${info.port}`);
});
