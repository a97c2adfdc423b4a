import { z } from "zod";

const optionalNumber = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((str) => {
      const value = str === undefined || str.trim() === "" ? NaN : Number(str);
      return Number.isFinite(value) ? value : fallback;
    });

export const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  // Only needed when receipts are actually extracted
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().nonempty().optional().default("gemini-1.5-flash"),
  GEMINI_TEMPERATURE: optionalNumber(0.1),
  GEMINI_RETRIES: optionalNumber(2),
  APP_PORT: z
    .string()
    .optional()
    .transform((str) => (str && parseInt(str)) || 3000),
  APP_API_KEY: z.string().optional(),
  APP_API_SECRET: z.string().optional(),
  MAX_FILE_SIZE: z
    .string()
    .optional()
    // Default file size is 5MB
    .transform((str) => (str && parseInt(str)) || 5242880),
  RECEIPTS_DIRECTORY: z.string().nonempty().optional().default("./receipt_pdfs"),
  OUTPUT_DIRECTORY: z.string().nonempty().optional().default("."),
  EXTRACTED_FILE_NAME: z
    .string()
    .nonempty()
    .optional()
    .default("extracted_receipts.json"),
  AGGREGATED_FILE_NAME: z
    .string()
    .nonempty()
    .optional()
    .default("aggregated_receipts.json"),
});

export type EnvVars = z.infer<typeof envSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): EnvVars =>
  envSchema.parse(source);
