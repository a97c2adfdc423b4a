import {
  GoogleGenerativeAI,
  SchemaType,
  type GenerationConfig,
  type Part,
} from "@google/generative-ai";
import pRetry from "p-retry";
import { z } from "zod";
import type { RawReceiptRecord } from "./shared-types";
import type { EnvVars } from "../utils/env-vars";
import { logger } from "../utils/logger";

export const SYSTEM_INSTRUCTION = `You are an expert at reading and parsing receipt documents. Extract the main company or store name (not addresses or other details) and the final total amount of the receipt. Look for keywords like "Total", "Amount", "Bill Total" or "Grand Total" and be careful to take the final total, not subtotals or tax amounts. Return the total as a number only, without currency symbols such as $ or ₹. If you can't find a field, use an empty string "".`;

export const geminiOptionsSchema = z.object({
  apiKey: z.string().nonempty("GEMINI_API_KEY is required to extract receipts"),
  model: z.string().nonempty(),
  temperature: z.number().min(0).max(2).optional().default(0.1),
});

/** The slice of a Gemini model the extractor needs. */
export interface ReceiptModel {
  generateContent(
    request: Array<string | Part>
  ): Promise<{ response: { text(): string } }>;
}

export interface ReceiptFieldExtractor {
  extractFields(text: string, fileName: string): Promise<RawReceiptRecord>;
}

export interface ExtractorRetryOptions {
  retries?: number;
  minTimeout?: number;
}

const getGenerationConfig = (temperature: number): GenerationConfig => ({
  temperature,
  responseMimeType: "application/json",
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      company_name: {
        type: SchemaType.STRING,
      },
      total_amount: {
        type: SchemaType.STRING,
      },
    },
    required: ["company_name", "total_amount"],
  },
});

export function createGeminiModel(
  options: z.input<typeof geminiOptionsSchema>
): ReceiptModel {
  const { apiKey, model, temperature } = geminiOptionsSchema.parse(options);
  const genAI = new GoogleGenerativeAI(apiKey);

  return genAI.getGenerativeModel({
    model,
    systemInstruction: SYSTEM_INSTRUCTION,
    generationConfig: getGenerationConfig(temperature),
  });
}

export class ReceiptParseError extends Error {
  constructor(fileName: string) {
    super(`Failed to parse the receipt fields for ${fileName}`);
    this.name = "ReceiptParseError";
  }
}

function toRawRecord(value: unknown): RawReceiptRecord | null {
  const candidate: unknown = Array.isArray(value) ? value[0] : value;
  if (typeof candidate !== "object" || candidate === null || Array.isArray(candidate)) {
    return null;
  }
  return { ...candidate };
}

export class GeminiReceiptExtractor implements ReceiptFieldExtractor {
  #model: ReceiptModel;
  #retries: number;
  #minTimeout: number;

  constructor(model: ReceiptModel, retryOptions: ExtractorRetryOptions = {}) {
    this.#model = model;
    this.#retries = retryOptions.retries ?? 2;
    this.#minTimeout = retryOptions.minTimeout ?? 1000;
  }

  async extractFields(text: string, fileName: string): Promise<RawReceiptRecord> {
    const result = await pRetry(
      () =>
        this.#model.generateContent([
          `Extract the company name and total amount from this receipt (${fileName}). Respond with {"company_name": "name", "total_amount": "amount"}.`,
          text,
        ]),
      {
        retries: this.#retries,
        minTimeout: this.#minTimeout,
        onFailedAttempt: (error) => {
          logger.warn(
            `Gemini request for ${fileName} failed (attempt ${error.attemptNumber}, ${error.retriesLeft} retries left):`,
            error.message
          );
        },
      }
    );

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.response.text());
    } catch (err) {
      logger.error(`Failed to parse the Gemini response for ${fileName}:`, err);
      throw new ReceiptParseError(fileName);
    }

    const record = toRawRecord(parsed);
    if (!record) {
      logger.error(`Gemini returned no receipt object for ${fileName}`, parsed);
      throw new ReceiptParseError(fileName);
    }

    logger.debug("Extracted receipt fields", { fileName, record });
    return record;
  }
}

export const createReceiptExtractor = (
  env: Pick<EnvVars, "GEMINI_API_KEY" | "GEMINI_MODEL" | "GEMINI_TEMPERATURE" | "GEMINI_RETRIES">
): GeminiReceiptExtractor =>
  new GeminiReceiptExtractor(
    createGeminiModel({
      apiKey: env.GEMINI_API_KEY ?? "",
      model: env.GEMINI_MODEL,
      temperature: env.GEMINI_TEMPERATURE,
    }),
    { retries: env.GEMINI_RETRIES }
  );
